/**
 * Blockchain network the daemon operates against.
 * - `mainnet`: the default, selected by passing no flag
 * - `testnet`, `regtest`, `simnet`: selected by `--<name>`
 */
export type Network = "mainnet" | "testnet" | "regtest" | "simnet";

export const NETWORKS: readonly Network[] = ["mainnet", "testnet", "regtest", "simnet"];

/**
 * Environment variables the supervisor reads. Only these keys are looked at.
 */
export interface SupervisorEnv {
    [key: string]: string | undefined;
    ELECTRUM_TESTNET?: string;
    ELECTRUM_NETWORK?: string;
    ELECTRUM_USER?: string;
    ELECTRUM_PASSWORD?: string;
}

export interface RpcCredentials {
    user: string;
    password: string;
}

/**
 * Tunables read from .electrum-supervisor.yml. Every key is optional in the file.
 */
export interface SupervisorSettings {
    /** Electrum executable name or path */
    binary: string;
    /** Interface the JSON-RPC server binds to */
    rpcHost: string;
    /** Port the JSON-RPC server listens on */
    rpcPort: number;
    /** How many times to probe the daemon after launch (0 disables the check) */
    readyAttempts: number;
    /** Delay between readiness probes in milliseconds */
    readyIntervalMs: number;
    /** Upper bound on each shutdown phase in milliseconds */
    shutdownTimeoutMs: number;
    /** Directory for the rotated log file; stdout only when absent */
    logDir?: string;
    /** Maximum size of a single log file in MB before rotation */
    maxLogSizeMB: number;
    /** Maximum number of rotated log files to keep */
    maxLogFiles: number;
}

/**
 * Everything the supervisor needs, resolved once at startup.
 */
export interface SupervisorConfig extends SupervisorSettings {
    network: Network;
    /** Raw ELECTRUM_NETWORK value that matched no known network */
    unrecognizedNetwork?: string;
    credentials: RpcCredentials;
}

/** Default configuration values */
export const CONFIG_DEFAULTS = {
    binary: "electrum",
    rpcHost: "0.0.0.0",
    rpcPort: 7000,
    readyAttempts: 30,
    readyIntervalMs: 1000,
    shutdownTimeoutMs: 8000,
    maxLogSizeMB: 10,
    maxLogFiles: 5,
    configFileName: ".electrum-supervisor.yml",
} as const;
