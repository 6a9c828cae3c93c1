import * as path from "node:path";
import type { Network, SupervisorEnv } from "./types.js";

export interface NetworkSelection {
    network: Network;
    /** Set when ELECTRUM_NETWORK held a value that selects nothing */
    unrecognized?: string;
}

/**
 * Pick the network from the environment. The checks form a first-match chain:
 * ELECTRUM_TESTNET=true, then ELECTRUM_NETWORK=testnet|regtest|simnet, else mainnet.
 */
export function resolveNetwork(env: SupervisorEnv): NetworkSelection {
    if (env.ELECTRUM_TESTNET === "true" || env.ELECTRUM_NETWORK === "testnet") {
        return { network: "testnet" };
    } else if (env.ELECTRUM_NETWORK === "regtest") {
        return { network: "regtest" };
    } else if (env.ELECTRUM_NETWORK === "simnet") {
        return { network: "simnet" };
    }

    const raw = env.ELECTRUM_NETWORK;
    if (raw !== undefined && raw !== "" && raw !== "mainnet") {
        return { network: "mainnet", unrecognized: raw };
    }
    return { network: "mainnet" };
}

/**
 * The command-line flag for a network; mainnet has none.
 */
export function networkFlag(network: Network): string | null {
    return network === "mainnet" ? null : `--${network}`;
}

/**
 * The flag as an argument list, ready to spread into argv.
 */
export function networkFlags(network: Network): string[] {
    const flag = networkFlag(network);
    return flag === null ? [] : [flag];
}

/**
 * Wallet directory for a network under the Electrum base directory.
 */
export function walletDirectory(base: string, network: Network): string {
    return network === "mainnet"
        ? path.join(base, "wallets")
        : path.join(base, network, "wallets");
}
