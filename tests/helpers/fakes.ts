import { EventEmitter } from "node:events";
import { formatCommandLine, type CommandRunner, type RunOptions } from "../../src/daemon/command.js";
import { Logger } from "../../src/daemon/logger.js";
import type { ProcessControl, ProcessInfo } from "../../src/daemon/process.js";
import type { SupervisorConfig } from "../../src/config/types.js";
import { CommandError } from "../../src/errors.js";

export type Handler = (line: string) => Promise<void> | void;

/**
 * Records every command line and lets a test decide how each one ends.
 */
export class FakeRunner implements CommandRunner {
    readonly calls: string[] = [];
    /** Timeout each call was given, keyed by command line */
    readonly timeouts = new Map<string, number | undefined>();
    readonly terminations: NodeJS.Signals[] = [];
    handler: Handler = () => undefined;
    private readonly pending: Array<{ line: string; reject: (err: Error) => void }> = [];

    async run(command: string, args: string[], options: RunOptions = {}): Promise<void> {
        const line = formatCommandLine(command, args);
        this.calls.push(line);
        this.timeouts.set(line, options.timeoutMs);
        await this.handler(line);
    }

    /** A command that only ends when terminateAll() kills it */
    block(line: string): Promise<void> {
        return new Promise((_resolve, reject) => {
            this.pending.push({ line, reject });
        });
    }

    terminateAll(signal: NodeJS.Signals = "SIGTERM"): void {
        this.terminations.push(signal);
        for (const entry of this.pending.splice(0)) {
            entry.reject(CommandError.fromSignal(entry.line, signal));
        }
    }
}

export class FakeProcessControl implements ProcessControl {
    found: ProcessInfo[] = [];
    readonly running = new Set<number>();
    readonly killed: Array<{ pid: number; timeoutMs: number }> = [];
    /** When false, killProcess leaves the process running and reports failure */
    killable = true;

    findDaemonProcesses(_binary: string): ProcessInfo[] {
        return this.found;
    }

    isProcessRunning(pid: number): boolean {
        return this.running.has(pid);
    }

    async killProcess(pid: number, timeoutMs: number): Promise<boolean> {
        this.killed.push({ pid, timeoutMs });
        if (!this.killable) return false;
        this.running.delete(pid);
        return true;
    }
}

export function memoryLogger(): { logger: Logger; lines: string[] } {
    const lines: string[] = [];
    const logger = new Logger({ output: { write: (chunk: string) => lines.push(chunk) } });
    return { logger, lines };
}

/** Strip the "[timestamp] " prefix from a log line */
export function withoutTimestamp(line: string): string {
    return line.replace(/^\[[^\]]+\] /, "").trimEnd();
}

export function makeConfig(overrides: Partial<SupervisorConfig> = {}): SupervisorConfig {
    return {
        binary: "electrum",
        rpcHost: "0.0.0.0",
        rpcPort: 7000,
        readyAttempts: 1,
        readyIntervalMs: 1,
        shutdownTimeoutMs: 50,
        maxLogSizeMB: 10,
        maxLogFiles: 5,
        network: "mainnet",
        credentials: { user: "bob", password: "hunter2" },
        ...overrides,
    };
}

export function signalSource(): EventEmitter {
    return new EventEmitter();
}
