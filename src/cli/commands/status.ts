import { loadSettings, getConfigHome } from "../../config/loader.js";
import { networkFlag, resolveNetwork } from "../../config/network.js";
import { findDaemonProcesses } from "../../daemon/process.js";
import { errorMessage, exitCodeOf } from "../../errors.js";

interface StatusOptions {
    config?: string;
}

export function statusCommand(options: StatusOptions = {}): void {
    try {
        const configDir = options.config ?? getConfigHome();
        const settings = loadSettings(configDir);
        const selection = resolveNetwork(process.env);

        console.log("=== electrum-supervisor status ===\n");

        console.log(`Config dir: ${configDir}`);
        console.log(`Binary: ${settings.binary}`);
        console.log(`Network: ${selection.network} (flag: ${networkFlag(selection.network) ?? "none"})`);
        if (selection.unrecognized !== undefined) {
            console.log(`  (ignored ELECTRUM_NETWORK="${selection.unrecognized}")`);
        }
        console.log(`RPC endpoint: ${settings.rpcHost}:${settings.rpcPort}`);
        console.log(`RPC user: ${process.env.ELECTRUM_USER || "(not set)"}`);
        console.log(`RPC password: ${process.env.ELECTRUM_PASSWORD ? "********" : "(not set)"}`);
        console.log();

        const daemons = findDaemonProcesses(settings.binary);
        if (daemons.length === 0) {
            console.log("Daemon: not running");
        } else {
            for (const proc of daemons) {
                console.log(`Daemon: running (PID: ${proc.pid}) ${proc.commandLine}`);
            }
        }
    } catch (err) {
        console.error(`Error: ${errorMessage(err)}`);
        process.exit(exitCodeOf(err));
    }
}
