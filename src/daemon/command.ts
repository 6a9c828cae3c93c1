import * as child_process from "node:child_process";
import type { ChildProcess } from "node:child_process";
import { CommandError, CommandTimeoutError } from "../errors.js";

export interface RunOptions {
    /** Kill the child and reject once this many milliseconds have passed */
    timeoutMs?: number;
    /** Discard the child's output instead of passing it through */
    quiet?: boolean;
}

/**
 * Runs external commands on behalf of the supervisor. Every failure rejects,
 * so a sequence of awaited calls stops at the first failing command.
 */
export interface CommandRunner {
    run(command: string, args: string[], options?: RunOptions): Promise<void>;
    /** Signal every child that is still running */
    terminateAll(signal?: NodeJS.Signals): void;
}

export function formatCommandLine(command: string, args: string[]): string {
    return [command, ...args].join(" ");
}

/**
 * CommandRunner backed by child_process.spawn. Output goes straight to the
 * supervisor's own stdout/stderr, so the container log shows it unchanged.
 */
export class ChildProcessRunner implements CommandRunner {
    private readonly active = new Set<ChildProcess>();

    run(command: string, args: string[], options: RunOptions = {}): Promise<void> {
        const commandLine = formatCommandLine(command, args);

        return new Promise((resolve, reject) => {
            const child = child_process.spawn(command, args, {
                stdio: options.quiet ? "ignore" : "inherit",
            });
            this.active.add(child);

            let timedOut = false;
            const timer =
                options.timeoutMs !== undefined
                    ? setTimeout(() => {
                        timedOut = true;
                        child.kill("SIGKILL");
                    }, options.timeoutMs)
                    : undefined;

            const settle = (): void => {
                if (timer !== undefined) clearTimeout(timer);
                this.active.delete(child);
            };

            child.once("error", (err) => {
                settle();
                reject(new CommandError(commandLine, 127, err.message));
            });

            // "exit" rather than "close": a daemonising child leaves a grandchild
            // holding the inherited stdio open long after the command returns.
            child.once("exit", (code, signal) => {
                settle();
                if (timedOut && options.timeoutMs !== undefined) {
                    reject(new CommandTimeoutError(commandLine, options.timeoutMs));
                } else if (code === 0) {
                    resolve();
                } else if (signal !== null) {
                    reject(CommandError.fromSignal(commandLine, signal));
                } else {
                    reject(new CommandError(commandLine, code ?? 1));
                }
            });
        });
    }

    terminateAll(signal: NodeJS.Signals = "SIGTERM"): void {
        for (const child of this.active) {
            child.kill(signal);
        }
    }

    /** Number of children currently running */
    get activeCount(): number {
        return this.active.size;
    }
}
