export { loadSupervisorConfig, loadSettings, writeDefaultConfig, resolveNetwork, networkFlag } from "./config/index.js";
export { Supervisor, ElectrumClient, ChildProcessRunner, Logger } from "./daemon/index.js";
export { installRelease, prepareDataLayout, verifyDetachedSignature } from "./release/index.js";
export * from "./errors.js";
export type {
    Network,
    RpcCredentials,
    SupervisorConfig,
    SupervisorEnv,
    SupervisorSettings,
} from "./config/index.js";
