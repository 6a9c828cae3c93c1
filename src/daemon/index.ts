export { Logger } from "./logger.js";
export type { LoggerOptions, LogOutput } from "./logger.js";
export { ChildProcessRunner, formatCommandLine } from "./command.js";
export type { CommandRunner, RunOptions } from "./command.js";
export {
    ElectrumClient,
    setConfigArgs,
    daemonStartArgs,
    daemonStopArgs,
    getInfoArgs,
} from "./electrum.js";
export { Supervisor, runForeground } from "./runner.js";
export type { SupervisorDeps } from "./runner.js";
export {
    findDaemonProcesses,
    filterDaemonProcesses,
    parseProcessList,
    isProcessRunning,
    killProcess,
    systemProcessControl,
} from "./process.js";
export type { ProcessControl, ProcessInfo } from "./process.js";
