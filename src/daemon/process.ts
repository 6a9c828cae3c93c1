/**
 * Process discovery and termination for the Electrum daemon.
 *
 * `electrum daemon -d` forks and detaches, so the supervisor never holds the
 * daemon's handle; it finds the process again by command line when it has to
 * force a shutdown.
 */
import * as child_process from "node:child_process";
import * as fs from "node:fs";
import * as path from "node:path";

export interface ProcessInfo {
    pid: number;
    commandLine: string;
}

/**
 * Operations the supervisor needs on processes it did not spawn directly.
 */
export interface ProcessControl {
    findDaemonProcesses(binary: string): ProcessInfo[];
    isProcessRunning(pid: number): boolean;
    killProcess(pid: number, timeoutMs: number): Promise<boolean>;
}

const CHECK_INTERVAL_MS = 100;

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Parse `ps -eo pid,args` output into { pid, commandLine } records.
 */
export function parseProcessList(output: string): ProcessInfo[] {
    const results: ProcessInfo[] = [];
    for (const line of output.split("\n")) {
        const trimmed = line.trim();
        if (!trimmed) continue;
        const match = trimmed.match(/^(\d+)\s+(.+)$/);
        if (match) {
            const pid = parseInt(match[1], 10);
            if (!isNaN(pid)) {
                results.push({ pid, commandLine: match[2] });
            }
        }
    }
    return results;
}

/**
 * Keep only processes running `<binary> daemon ...`, excluding the current PID.
 * The binary may appear as an argument of an interpreter (python3 /usr/local/bin/electrum daemon).
 */
export function filterDaemonProcesses(processes: ProcessInfo[], binary: string): ProcessInfo[] {
    const name = path.basename(binary);
    const currentPid = process.pid;
    return processes.filter((p) => {
        if (p.pid === currentPid) return false;
        const words = p.commandLine.split(/\s+/);
        const index = words.findIndex((word) => path.basename(word) === name);
        return index !== -1 && words[index + 1] === "daemon";
    });
}

/**
 * Find running Electrum daemon processes. Returns an empty list when `ps`
 * cannot be run.
 */
export function findDaemonProcesses(binary: string): ProcessInfo[] {
    let output: string;
    try {
        output = child_process.execSync("ps -eo pid,args", { encoding: "utf-8", timeout: 5000 });
    } catch {
        return [];
    }
    return filterDaemonProcesses(parseProcessList(output), binary);
}

/**
 * Extract the one-letter state from a /proc/<pid>/stat line. The command name
 * sits in parentheses and may itself contain spaces or parentheses, so the
 * state is read after the last ")".
 */
export function parseProcessState(statLine: string): string | null {
    const end = statLine.lastIndexOf(")");
    if (end === -1) return null;
    const match = statLine.slice(end + 1).match(/^\s+(\S)/);
    return match ? match[1] : null;
}

/**
 * State letter of a process from procfs, or null where procfs has no entry.
 */
export function readProcessState(pid: number): string | null {
    try {
        return parseProcessState(fs.readFileSync(`/proc/${pid}/stat`, "utf-8"));
    } catch {
        return null;
    }
}

/**
 * Check whether a process with the given PID is alive. A zombie counts as
 * dead: it has exited and only waits for its parent to reap it, which a
 * detached daemon's adoptive parent may never do.
 */
export function isProcessRunning(pid: number): boolean {
    try {
        process.kill(pid, 0);
    } catch {
        return false;
    }
    return readProcessState(pid) !== "Z";
}

/**
 * Kill a process by PID: SIGTERM first, then SIGKILL after a timeout.
 * Returns true if the process was killed or was already dead.
 */
export async function killProcess(pid: number, timeoutMs: number = 5000): Promise<boolean> {
    if (!isProcessRunning(pid)) {
        return true;
    }

    try {
        process.kill(pid, "SIGTERM");
    } catch {
        return !isProcessRunning(pid);
    }

    const deadline = Date.now() + timeoutMs;
    while (Date.now() < deadline) {
        if (!isProcessRunning(pid)) {
            return true;
        }
        await sleep(CHECK_INTERVAL_MS);
    }

    if (isProcessRunning(pid)) {
        try {
            process.kill(pid, "SIGKILL");
        } catch {
            return !isProcessRunning(pid);
        }
        await sleep(CHECK_INTERVAL_MS);
    }

    return !isProcessRunning(pid);
}

export const systemProcessControl: ProcessControl = {
    findDaemonProcesses,
    isProcessRunning,
    killProcess,
};
