import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import * as yaml from "yaml";
import { ConfigError } from "../errors.js";
import { resolveNetwork } from "./network.js";
import type { SupervisorConfig, SupervisorEnv, SupervisorSettings } from "./types.js";
import { CONFIG_DEFAULTS } from "./types.js";

/**
 * Returns the supervisor's config home directory: ~/.electrum-supervisor
 */
export function getConfigHome(): string {
    return path.join(os.homedir(), ".electrum-supervisor");
}

function readNumber(
    raw: Record<string, unknown>,
    key: keyof SupervisorSettings,
    fallback: number,
): number {
    const value = raw[key];
    if (value === undefined || value === null) {
        return fallback;
    }
    if (typeof value !== "number" || !Number.isFinite(value)) {
        throw new ConfigError(`${key} must be a finite number`);
    }
    return value;
}

function readString(
    raw: Record<string, unknown>,
    key: keyof SupervisorSettings,
): string | undefined {
    const value = raw[key];
    if (value === undefined || value === null) {
        return undefined;
    }
    if (typeof value !== "string" || value.trim() === "") {
        throw new ConfigError(`${key} must be a non-empty string`);
    }
    return value.trim();
}

/**
 * Validate a loaded settings object. Throws on invalid settings.
 */
export function validateSettings(config: unknown): SupervisorSettings {
    // An empty YAML document parses to null
    if (config === null || config === undefined) {
        config = {};
    }
    if (typeof config !== "object" || Array.isArray(config)) {
        throw new ConfigError("Configuration must be a YAML object");
    }

    const raw = config as Record<string, unknown>;

    const rpcPort = readNumber(raw, "rpcPort", CONFIG_DEFAULTS.rpcPort);
    if (!Number.isInteger(rpcPort) || rpcPort < 1 || rpcPort > 65535) {
        throw new ConfigError("rpcPort must be an integer between 1 and 65535");
    }

    const readyAttempts = readNumber(raw, "readyAttempts", CONFIG_DEFAULTS.readyAttempts);
    if (readyAttempts < 0 || !Number.isInteger(readyAttempts)) {
        throw new ConfigError("readyAttempts must be a non-negative integer");
    }

    const readyIntervalMs = readNumber(raw, "readyIntervalMs", CONFIG_DEFAULTS.readyIntervalMs);
    if (readyIntervalMs <= 0) {
        throw new ConfigError("readyIntervalMs must be a positive number");
    }

    const shutdownTimeoutMs = readNumber(raw, "shutdownTimeoutMs", CONFIG_DEFAULTS.shutdownTimeoutMs);
    if (shutdownTimeoutMs <= 0) {
        throw new ConfigError("shutdownTimeoutMs must be a positive number");
    }

    const maxLogSizeMB = readNumber(raw, "maxLogSizeMB", CONFIG_DEFAULTS.maxLogSizeMB);
    if (maxLogSizeMB <= 0) {
        throw new ConfigError("maxLogSizeMB must be a positive number");
    }

    const maxLogFiles = readNumber(raw, "maxLogFiles", CONFIG_DEFAULTS.maxLogFiles);
    if (maxLogFiles <= 0 || !Number.isInteger(maxLogFiles)) {
        throw new ConfigError("maxLogFiles must be a positive integer");
    }

    const settings: SupervisorSettings = {
        binary: readString(raw, "binary") ?? CONFIG_DEFAULTS.binary,
        rpcHost: readString(raw, "rpcHost") ?? CONFIG_DEFAULTS.rpcHost,
        rpcPort,
        readyAttempts,
        readyIntervalMs,
        shutdownTimeoutMs,
        maxLogSizeMB,
        maxLogFiles,
    };

    const logDir = readString(raw, "logDir");
    if (logDir !== undefined) {
        settings.logDir = logDir;
    }

    return settings;
}

/**
 * Load and validate the settings file. A missing file yields the defaults.
 * @param configDir Directory containing the settings file (defaults to ~/.electrum-supervisor)
 */
export function loadSettings(configDir?: string): SupervisorSettings {
    const dir = configDir ?? getConfigHome();
    const configPath = path.join(dir, CONFIG_DEFAULTS.configFileName);

    if (!fs.existsSync(configPath)) {
        return validateSettings({});
    }

    const raw = fs.readFileSync(configPath, "utf-8");
    let parsed: unknown;
    try {
        parsed = yaml.parse(raw);
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new ConfigError(`Invalid YAML in ${configPath}: ${message}`);
    }
    return validateSettings(parsed);
}

/**
 * Build the full supervisor configuration from the environment and the
 * settings file. This is the only place environment variables are read.
 */
export function loadSupervisorConfig(env: SupervisorEnv, configDir?: string): SupervisorConfig {
    const settings = loadSettings(configDir);
    const selection = resolveNetwork(env);

    const user = env.ELECTRUM_USER;
    if (user === undefined || user === "") {
        throw new ConfigError("ELECTRUM_USER must be set");
    }
    const password = env.ELECTRUM_PASSWORD;
    if (password === undefined || password === "") {
        throw new ConfigError("ELECTRUM_PASSWORD must be set");
    }

    const config: SupervisorConfig = {
        ...settings,
        network: selection.network,
        credentials: { user, password },
    };
    if (selection.unrecognized !== undefined) {
        config.unrecognizedNetwork = selection.unrecognized;
    }
    return config;
}

/**
 * Write a default .electrum-supervisor.yml settings file.
 * @param configDir Directory to write the file to (defaults to ~/.electrum-supervisor)
 * @returns The path of the created file
 */
export function writeDefaultConfig(configDir?: string): string {
    const dir = configDir ?? getConfigHome();
    const configPath = path.join(dir, CONFIG_DEFAULTS.configFileName);

    if (fs.existsSync(configPath)) {
        throw new ConfigError(`Config file already exists: ${configPath}`);
    }

    fs.mkdirSync(dir, { recursive: true });

    const template = [
        "# electrum-supervisor settings",
        "# Credentials and network come from ELECTRUM_USER, ELECTRUM_PASSWORD,",
        "# ELECTRUM_NETWORK and ELECTRUM_TESTNET; everything here is optional.",
        "",
        "# Electrum executable",
        `binary: ${CONFIG_DEFAULTS.binary}`,
        "",
        "# JSON-RPC endpoint written with setconfig before launch",
        `rpcHost: ${CONFIG_DEFAULTS.rpcHost}`,
        `rpcPort: ${CONFIG_DEFAULTS.rpcPort}`,
        "",
        "# Readiness probe after launch (set readyAttempts to 0 to skip it)",
        `readyAttempts: ${CONFIG_DEFAULTS.readyAttempts}`,
        `readyIntervalMs: ${CONFIG_DEFAULTS.readyIntervalMs}`,
        "",
        "# Bound on each shutdown phase before the daemon is killed",
        `shutdownTimeoutMs: ${CONFIG_DEFAULTS.shutdownTimeoutMs}`,
        "",
        "# File logging (optional; stdout is always written)",
        "# logDir: /data/logs",
        "# maxLogSizeMB: 10    # Max log file size in MB before rotation (default: 10)",
        "# maxLogFiles: 5      # Max number of rotated log files to keep (default: 5)",
    ].join("\n") + "\n";

    fs.writeFileSync(configPath, template, "utf-8");
    return configPath;
}
