import * as fs from "node:fs";
import * as path from "node:path";

const DEFAULT_MAX_LOG_SIZE_MB = 10;
const DEFAULT_MAX_LOG_FILES = 5;
const LOG_BASENAME = "electrum-supervisor";

export interface LogOutput {
    write(chunk: string): unknown;
}

export interface LoggerOptions {
    /** Directory for the log file; no file is written when absent */
    logDir?: string;
    maxLogSizeMB?: number;
    maxLogFiles?: number;
    /** Where every line is echoed (defaults to stdout, the container log) */
    output?: LogOutput;
}

export class Logger {
    private logDir: string | undefined;
    private logFile: string | undefined;
    private maxLogSize: number;
    private maxLogFiles: number;
    private output: LogOutput;

    constructor(options: LoggerOptions = {}) {
        this.logDir = options.logDir;
        this.maxLogSize = (options.maxLogSizeMB ?? DEFAULT_MAX_LOG_SIZE_MB) * 1024 * 1024;
        this.maxLogFiles = options.maxLogFiles ?? DEFAULT_MAX_LOG_FILES;
        this.output = options.output ?? process.stdout;
        if (this.logDir !== undefined) {
            this.logFile = path.join(this.logDir, `${LOG_BASENAME}.log`);
            fs.mkdirSync(this.logDir, { recursive: true });
        }
    }

    /**
     * Get the path to the current log file, if file logging is enabled.
     */
    getLogFilePath(): string | undefined {
        return this.logFile;
    }

    info(message: string): void {
        this.write("INFO", message);
    }

    warn(message: string): void {
        this.write("WARN", message);
    }

    error(message: string): void {
        this.write("ERROR", message);
    }

    private write(level: string, message: string): void {
        const timestamp = new Date().toISOString();
        const line = `[${timestamp}] [${level}] ${message}\n`;

        this.output.write(line);

        if (this.logFile !== undefined) {
            this.rotateIfNeeded(this.logFile);
            fs.appendFileSync(this.logFile, line, "utf-8");
        }
    }

    private rotateIfNeeded(logFile: string): void {
        if (this.logDir === undefined) return;
        const logDir = this.logDir;

        try {
            if (!fs.existsSync(logFile)) return;

            const stat = fs.statSync(logFile);
            if (stat.size < this.maxLogSize) return;

            // Shift numbered logs up, dropping the oldest
            for (let i = this.maxLogFiles - 1; i > 0; i--) {
                const from = path.join(logDir, `${LOG_BASENAME}.${i}.log`);
                const to = path.join(logDir, `${LOG_BASENAME}.${i + 1}.log`);
                if (fs.existsSync(from)) {
                    if (i + 1 >= this.maxLogFiles) {
                        fs.unlinkSync(from);
                    } else {
                        fs.renameSync(from, to);
                    }
                }
            }

            fs.renameSync(logFile, path.join(logDir, `${LOG_BASENAME}.1.log`));
        } catch (err) {
            // Keep appending to the current file
            const message = err instanceof Error ? err.message : String(err);
            this.output.write(`[${new Date().toISOString()}] [WARN] Log rotation failed: ${message}\n`);
        }
    }
}
