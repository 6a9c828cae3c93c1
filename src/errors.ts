import * as os from "node:os";

/**
 * Base class for every failure the supervisor reports. `exitCode` is the
 * status the CLI exits with when the error reaches the top of a command.
 */
export class SupervisorError extends Error {
    public readonly exitCode: number;
    public readonly metadata?: Record<string, unknown>;

    constructor(message: string, exitCode: number = 1, metadata?: Record<string, unknown>) {
        super(message);
        Object.setPrototypeOf(this, new.target.prototype);
        this.name = new.target.name;
        this.exitCode = exitCode;
        this.metadata = metadata;
    }
}

export class ConfigError extends SupervisorError {
    constructor(message: string) {
        super(message, 1);
    }
}

/**
 * A child command exited unsuccessfully. The exit code is propagated so the
 * container reports the same status as the failing sub-command.
 */
export class CommandError extends SupervisorError {
    public readonly commandLine: string;

    constructor(commandLine: string, exitCode: number, reason?: string) {
        super(
            `Command failed with exit code ${exitCode}: ${commandLine}${reason ? ` (${reason})` : ""}`,
            exitCode,
            { commandLine },
        );
        this.commandLine = commandLine;
    }

    /**
     * Build an error for a child that was killed by a signal, using the shell
     * convention of 128 + signal number.
     */
    static fromSignal(commandLine: string, signal: NodeJS.Signals): CommandError {
        const signalNumber = os.constants.signals[signal];
        return new CommandError(commandLine, 128 + signalNumber, `terminated by ${signal}`);
    }
}

export class CommandTimeoutError extends SupervisorError {
    constructor(commandLine: string, timeoutMs: number) {
        super(`Command timed out after ${timeoutMs}ms: ${commandLine}`, 1, { commandLine, timeoutMs });
    }
}

export class ReadinessError extends SupervisorError {
    constructor(attempts: number) {
        super(`Electrum daemon did not become ready after ${attempts} attempt(s)`, 1, { attempts });
    }
}

export class DownloadError extends SupervisorError {
    constructor(url: string, status: number) {
        super(`Failed to download ${url}: HTTP ${status}`, 1, { url, status });
    }
}

export class VerificationError extends SupervisorError {
    constructor(message: string) {
        super(`Signature verification failed: ${message}`, 1);
    }
}

/**
 * Human-readable message for anything thrown.
 */
export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * Exit status for anything thrown: the error's own code, or 1.
 */
export function exitCodeOf(err: unknown): number {
    return err instanceof SupervisorError ? err.exitCode : 1;
}
