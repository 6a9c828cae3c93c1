export {
    loadSettings,
    loadSupervisorConfig,
    writeDefaultConfig,
    validateSettings,
    getConfigHome,
} from "./loader.js";
export { resolveNetwork, networkFlag, networkFlags, walletDirectory } from "./network.js";
export type { NetworkSelection } from "./network.js";
export type {
    Network,
    RpcCredentials,
    SupervisorConfig,
    SupervisorEnv,
    SupervisorSettings,
} from "./types.js";
export { CONFIG_DEFAULTS, NETWORKS } from "./types.js";
