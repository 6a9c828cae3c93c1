import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import {
    loadSettings,
    loadSupervisorConfig,
    validateSettings,
    writeDefaultConfig,
} from "../src/config/loader.js";
import { ConfigError } from "../src/errors.js";

function createTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), "electrum-supervisor-test-"));
}

function cleanupDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}

describe("Config Loader", () => {
    let tempDir: string;

    beforeEach(() => {
        tempDir = createTempDir();
    });

    afterEach(() => {
        cleanupDir(tempDir);
    });

    describe("writeDefaultConfig", () => {
        it("should create a default settings file", () => {
            const configPath = writeDefaultConfig(tempDir);
            expect(configPath).toBe(path.join(tempDir, ".electrum-supervisor.yml"));

            const content = fs.readFileSync(configPath, "utf-8");
            expect(content).toContain("rpcPort: 7000");
            expect(content).toContain("rpcHost: 0.0.0.0");
            expect(content).toContain("shutdownTimeoutMs: 8000");
        });

        it("should throw if the file already exists", () => {
            writeDefaultConfig(tempDir);
            expect(() => writeDefaultConfig(tempDir)).toThrow("already exists");
        });

        it("should round-trip to the defaults", () => {
            writeDefaultConfig(tempDir);
            expect(loadSettings(tempDir)).toEqual(validateSettings({}));
        });
    });

    describe("loadSettings", () => {
        it("should return defaults when no file exists", () => {
            expect(loadSettings(tempDir)).toEqual({
                binary: "electrum",
                rpcHost: "0.0.0.0",
                rpcPort: 7000,
                readyAttempts: 30,
                readyIntervalMs: 1000,
                shutdownTimeoutMs: 8000,
                maxLogSizeMB: 10,
                maxLogFiles: 5,
            });
        });

        it("should read overrides from YAML", () => {
            fs.writeFileSync(
                path.join(tempDir, ".electrum-supervisor.yml"),
                ["binary: /usr/local/bin/electrum", "rpcPort: 7777", "logDir: /data/logs"].join("\n") + "\n",
            );
            const settings = loadSettings(tempDir);
            expect(settings.binary).toBe("/usr/local/bin/electrum");
            expect(settings.rpcPort).toBe(7777);
            expect(settings.logDir).toBe("/data/logs");
        });

        it("should treat an empty file as defaults", () => {
            fs.writeFileSync(path.join(tempDir, ".electrum-supervisor.yml"), "# nothing here\n");
            expect(loadSettings(tempDir).rpcPort).toBe(7000);
        });

        it("should reject malformed YAML", () => {
            fs.writeFileSync(path.join(tempDir, ".electrum-supervisor.yml"), "rpcPort: [1, 2\n");
            expect(() => loadSettings(tempDir)).toThrow("Invalid YAML");
        });
    });

    describe("validateSettings", () => {
        it("should reject a non-object document", () => {
            expect(() => validateSettings("string")).toThrow("must be a YAML object");
            expect(() => validateSettings([1, 2])).toThrow("must be a YAML object");
        });

        it("should reject a port out of range", () => {
            expect(() => validateSettings({ rpcPort: 70000 })).toThrow(
                "rpcPort must be an integer between 1 and 65535",
            );
        });

        it("should reject a non-numeric port", () => {
            expect(() => validateSettings({ rpcPort: "7000" })).toThrow("rpcPort must be a finite number");
        });

        it("should accept zero readiness attempts", () => {
            expect(validateSettings({ readyAttempts: 0 }).readyAttempts).toBe(0);
        });

        it("should reject negative readiness attempts", () => {
            expect(() => validateSettings({ readyAttempts: -1 })).toThrow(
                "readyAttempts must be a non-negative integer",
            );
        });

        it("should reject non-positive timeouts", () => {
            expect(() => validateSettings({ shutdownTimeoutMs: 0 })).toThrow(
                "shutdownTimeoutMs must be a positive number",
            );
        });

        it("should reject infinite durations", () => {
            expect(() => validateSettings({ shutdownTimeoutMs: Infinity })).toThrow(
                "shutdownTimeoutMs must be a finite number",
            );
            expect(() => validateSettings({ readyIntervalMs: Number.NaN })).toThrow(
                "readyIntervalMs must be a finite number",
            );
        });

        it("should reject .inf in a settings file", () => {
            fs.writeFileSync(path.join(tempDir, ".electrum-supervisor.yml"), "readyIntervalMs: .inf\n");
            expect(() => loadSettings(tempDir)).toThrow("readyIntervalMs must be a finite number");
        });

        it("should reject non-integer maxLogFiles", () => {
            expect(() => validateSettings({ maxLogFiles: 2.5 })).toThrow(
                "maxLogFiles must be a positive integer",
            );
        });

        it("should reject an empty binary", () => {
            expect(() => validateSettings({ binary: "  " })).toThrow("binary must be a non-empty string");
        });
    });

    describe("loadSupervisorConfig", () => {
        it("should combine environment and settings", () => {
            const config = loadSupervisorConfig(
                { ELECTRUM_NETWORK: "regtest", ELECTRUM_USER: "bob", ELECTRUM_PASSWORD: "hunter2" },
                tempDir,
            );
            expect(config.network).toBe("regtest");
            expect(config.credentials).toEqual({ user: "bob", password: "hunter2" });
            expect(config.rpcHost).toBe("0.0.0.0");
            expect(config.rpcPort).toBe(7000);
            expect(config.unrecognizedNetwork).toBeUndefined();
        });

        it("should carry an unrecognized network name", () => {
            const config = loadSupervisorConfig(
                { ELECTRUM_NETWORK: "signet", ELECTRUM_USER: "bob", ELECTRUM_PASSWORD: "hunter2" },
                tempDir,
            );
            expect(config.network).toBe("mainnet");
            expect(config.unrecognizedNetwork).toBe("signet");
        });

        it("should require credentials", () => {
            expect(() => loadSupervisorConfig({ ELECTRUM_PASSWORD: "hunter2" }, tempDir)).toThrow(
                "ELECTRUM_USER must be set",
            );
            expect(() => loadSupervisorConfig({ ELECTRUM_USER: "bob", ELECTRUM_PASSWORD: "" }, tempDir)).toThrow(
                ConfigError,
            );
        });
    });
});
