import type { EventEmitter } from "node:events";
import { loadSupervisorConfig } from "../config/loader.js";
import { networkFlag } from "../config/network.js";
import type { SupervisorConfig } from "../config/types.js";
import { ReadinessError, errorMessage, exitCodeOf } from "../errors.js";
import { ChildProcessRunner, type CommandRunner } from "./command.js";
import { ElectrumClient } from "./electrum.js";
import { Logger } from "./logger.js";
import { systemProcessControl, type ProcessControl } from "./process.js";

/** Keeps the event loop alive while idling; the callback does nothing */
const IDLE_TICK_MS = 60 * 60 * 1000;
const READY_PROBE_TIMEOUT_MS = 10000;
const EXIT_POLL_MS = 100;

export interface SupervisorDeps {
    runner: CommandRunner;
    processes: ProcessControl;
    logger: Logger;
    /** Source of SIGTERM, normally the process object */
    signals: EventEmitter;
    exit: (code: number) => void;
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

function remainingUntil(deadline: number, floor: number): number {
    return Math.max(floor, deadline - Date.now());
}

/**
 * Configures, launches and watches over one Electrum daemon.
 *
 * Startup runs strictly in order: register SIGTERM, apply the RPC config
 * offline, launch the daemon detached, wait for it to answer, then idle.
 * A failure at any step rejects `run()`; nothing is retried.
 */
export class Supervisor {
    private readonly electrum: ElectrumClient;
    private shutdownPromise: Promise<void> | null = null;
    private releaseIdle: (() => void) | null = null;

    constructor(
        private readonly config: SupervisorConfig,
        private readonly deps: SupervisorDeps,
    ) {
        this.electrum = new ElectrumClient(config.binary, config.network, deps.runner);
    }

    get stopping(): boolean {
        return this.shutdownPromise !== null;
    }

    async run(): Promise<void> {
        const { config } = this;
        const { logger } = this.deps;

        logger.info(`Supervisor started (PID: ${process.pid})`);
        if (config.unrecognizedNetwork !== undefined) {
            logger.warn(`Unrecognized ELECTRUM_NETWORK "${config.unrecognizedNetwork}", using mainnet`);
        }
        logger.info(`Network: ${config.network} (flag: ${networkFlag(config.network) ?? "none"})`);

        this.deps.signals.on("SIGTERM", this.onSignal);

        try {
            logger.info(`Applying RPC configuration (${config.rpcHost}:${config.rpcPort})...`);
            await this.electrum.applyRpcConfig(config.credentials, config.rpcHost, config.rpcPort);
            if (this.stopping) return await this.idle();

            logger.info("Starting electrum daemon...");
            await this.electrum.startDaemon();
            if (this.stopping) return await this.idle();

            await this.waitUntilReady();
        } catch (err) {
            // A child killed by the shutdown sequence is not a startup failure
            if (this.stopping) return await this.idle();
            this.deps.signals.off("SIGTERM", this.onSignal);
            throw err;
        }

        await this.idle();
    }

    /**
     * Stop the daemon and exit 0. Safe to call more than once; later calls
     * share the first shutdown.
     */
    shutdown(signal: NodeJS.Signals = "SIGTERM"): Promise<void> {
        if (this.shutdownPromise === null) {
            this.shutdownPromise = this.performShutdown(signal);
        }
        return this.shutdownPromise;
    }

    private readonly onSignal = (signal: NodeJS.Signals): void => {
        this.shutdown(signal).catch((err: unknown) => {
            this.deps.logger.error(`Shutdown failed: ${errorMessage(err)}`);
            this.deps.exit(1);
        });
    };

    private async waitUntilReady(): Promise<void> {
        const { readyAttempts, readyIntervalMs } = this.config;
        const { logger } = this.deps;

        if (readyAttempts === 0) {
            logger.info("Readiness check disabled. Daemon launched.");
            return;
        }

        for (let attempt = 1; attempt <= readyAttempts; attempt++) {
            if (this.stopping) return;
            if (await this.electrum.isReady(READY_PROBE_TIMEOUT_MS)) {
                logger.info(`Electrum daemon is ready (attempt ${attempt}/${readyAttempts}).`);
                return;
            }
            if (attempt < readyAttempts) {
                await sleep(readyIntervalMs);
            }
        }

        throw new ReadinessError(readyAttempts);
    }

    private idle(): Promise<void> {
        if (this.shutdownPromise !== null) {
            return this.shutdownPromise;
        }
        this.deps.logger.info("Supervisor idle. Waiting for SIGTERM.");
        return new Promise((resolve) => {
            const timer = setInterval(() => undefined, IDLE_TICK_MS);
            this.releaseIdle = () => {
                clearInterval(timer);
                resolve();
            };
        });
    }

    /**
     * Every phase draws on one budget of `shutdownTimeoutMs`, so the whole
     * sequence ends within it plus one SIGKILL round.
     */
    private async performShutdown(signal: NodeJS.Signals): Promise<void> {
        const { logger, runner } = this.deps;
        const deadline = Date.now() + this.config.shutdownTimeoutMs;

        logger.info(`${signal} received. Stopping...`);
        runner.terminateAll("SIGTERM");

        try {
            await this.electrum.stopDaemon(remainingUntil(deadline, 1));
            logger.info("Daemon stop requested.");
        } catch (err) {
            logger.warn(`Daemon stop request failed: ${errorMessage(err)}`);
        }

        await this.reapDaemons(deadline);

        this.deps.signals.off("SIGTERM", this.onSignal);
        logger.info("Supervisor stopped.");
        this.releaseIdle?.();
        this.deps.exit(0);
    }

    /**
     * Give remaining daemon processes until `deadline` to exit on their own,
     * then kill whatever is left.
     */
    private async reapDaemons(deadline: number): Promise<void> {
        const { logger, processes } = this.deps;
        const remaining = processes.findDaemonProcesses(this.config.binary);
        if (remaining.length === 0) return;

        logger.info(`Waiting for ${remaining.length} daemon process(es) to exit...`);
        let alive = remaining.filter((p) => processes.isProcessRunning(p.pid));
        while (alive.length > 0 && Date.now() < deadline) {
            await sleep(Math.min(EXIT_POLL_MS, remainingUntil(deadline, 1)));
            alive = alive.filter((p) => processes.isProcessRunning(p.pid));
        }

        for (const proc of alive) {
            logger.warn(
                `Daemon (PID: ${proc.pid}) still running after ${this.config.shutdownTimeoutMs}ms. Killing...`,
            );
            const killed = await processes.killProcess(proc.pid, remainingUntil(deadline, 0));
            if (!killed) {
                logger.error(`Failed to kill daemon (PID: ${proc.pid}).`);
            }
        }
    }
}

/**
 * Run the supervisor in the foreground; this is the container entrypoint.
 * @param configDir Directory containing the settings file
 */
export async function runForeground(configDir?: string): Promise<void> {
    let config: SupervisorConfig;
    try {
        config = loadSupervisorConfig(process.env, configDir);
    } catch (err) {
        new Logger().error(`Failed to load config: ${errorMessage(err)}`);
        process.exit(exitCodeOf(err));
    }

    const logger = new Logger({
        logDir: config.logDir,
        maxLogSizeMB: config.maxLogSizeMB,
        maxLogFiles: config.maxLogFiles,
    });

    const supervisor = new Supervisor(config, {
        runner: new ChildProcessRunner(),
        processes: systemProcessControl,
        logger,
        signals: process,
        exit: (code) => process.exit(code),
    });

    try {
        await supervisor.run();
    } catch (err) {
        logger.error(`Startup failed: ${errorMessage(err)}`);
        process.exit(exitCodeOf(err));
    }
}
