import { networkFlags } from "../config/network.js";
import type { Network, RpcCredentials } from "../config/types.js";
import { SupervisorError } from "../errors.js";
import type { CommandRunner } from "./command.js";

/**
 * `setconfig <key> <value> [flag] --offline`: writes the daemon's config file
 * without a running daemon.
 */
export function setConfigArgs(key: string, value: string, network: Network): string[] {
    return ["setconfig", key, value, ...networkFlags(network), "--offline"];
}

/** `daemon -d [flag]`: start the daemon detached */
export function daemonStartArgs(network: Network): string[] {
    return ["daemon", "-d", ...networkFlags(network)];
}

/** `daemon stop [flag]`: ask a running daemon to shut down */
export function daemonStopArgs(network: Network): string[] {
    return ["daemon", "stop", ...networkFlags(network)];
}

/** `getinfo [flag]`: succeeds only while the daemon is up */
export function getInfoArgs(network: Network): string[] {
    return ["getinfo", ...networkFlags(network)];
}

/**
 * Thin wrapper over the electrum executable, bound to one network.
 */
export class ElectrumClient {
    constructor(
        private readonly binary: string,
        private readonly network: Network,
        private readonly runner: CommandRunner,
    ) {}

    async setConfig(key: string, value: string): Promise<void> {
        await this.runner.run(this.binary, setConfigArgs(key, value, this.network));
    }

    /**
     * Persist the JSON-RPC credentials and endpoint. Must run before the daemon
     * is started, since the daemon reads its config only at startup.
     */
    async applyRpcConfig(credentials: RpcCredentials, host: string, port: number): Promise<void> {
        await this.setConfig("rpcuser", credentials.user);
        await this.setConfig("rpcpassword", credentials.password);
        await this.setConfig("rpchost", host);
        await this.setConfig("rpcport", String(port));
    }

    async startDaemon(): Promise<void> {
        await this.runner.run(this.binary, daemonStartArgs(this.network));
    }

    async stopDaemon(timeoutMs: number): Promise<void> {
        await this.runner.run(this.binary, daemonStopArgs(this.network), { timeoutMs });
    }

    /**
     * Probe the daemon once. Any failure of the probe command means "not ready".
     */
    async isReady(timeoutMs?: number): Promise<boolean> {
        try {
            await this.runner.run(this.binary, getInfoArgs(this.network), { quiet: true, timeoutMs });
            return true;
        } catch (err) {
            if (err instanceof SupervisorError) {
                return false;
            }
            throw err;
        }
    }
}
