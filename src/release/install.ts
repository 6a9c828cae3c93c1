import * as fs from "node:fs";
import * as path from "node:path";
import type { CommandRunner } from "../daemon/command.js";
import type { Logger } from "../daemon/logger.js";
import { archiveName, releaseUrls } from "./constants.js";
import type { Fetcher } from "./fetcher.js";
import { fetchSigningKey, verifyDetachedSignature } from "./verify.js";

export interface InstallOptions {
    version: string;
    host: string;
    fingerprint: string;
    keyserver: string;
    /** Scratch directory for the downloaded archive and signature */
    workDir: string;
    fetcher: Fetcher;
    runner: CommandRunner;
    logger: Logger;
    /** pip executable (defaults to pip3) */
    pip?: string;
}

/**
 * Download, verify and pip-install an Electrum release.
 *
 * The archive is verified from the bytes on disk that pip will read, and
 * nothing is installed unless verification passed. Downloaded files are
 * removed afterwards whatever the outcome.
 */
export async function installRelease(options: InstallOptions): Promise<void> {
    const { version, fetcher, runner, logger } = options;
    const pip = options.pip ?? "pip3";
    const urls = releaseUrls(version, options.host);

    fs.mkdirSync(options.workDir, { recursive: true });
    const archivePath = path.join(options.workDir, archiveName(version));
    const signaturePath = `${archivePath}.asc`;

    try {
        logger.info(`Downloading ${urls.archive}`);
        fs.writeFileSync(archivePath, await fetcher.get(urls.archive));

        logger.info(`Downloading ${urls.signature}`);
        fs.writeFileSync(signaturePath, await fetcher.get(urls.signature));

        logger.info(`Fetching signing key ${options.fingerprint} from ${options.keyserver}`);
        const key = await fetchSigningKey(fetcher, options.fingerprint, options.keyserver);

        await verifyDetachedSignature(
            fs.readFileSync(archivePath),
            fs.readFileSync(signaturePath, "utf-8"),
            key,
        );
        logger.info(`Good signature on ${archiveName(version)} from ${key.getFingerprint().toUpperCase()}`);

        await runner.run(pip, ["install", "--no-cache-dir", "cryptography"]);
        await runner.run(pip, ["install", "--no-cache-dir", archivePath]);
        logger.info(`Electrum ${version} installed.`);
    } finally {
        fs.rmSync(archivePath, { force: true });
        fs.rmSync(signaturePath, { force: true });
    }
}
