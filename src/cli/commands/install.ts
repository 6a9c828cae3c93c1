import * as os from "node:os";
import * as path from "node:path";
import { ChildProcessRunner } from "../../daemon/command.js";
import { Logger } from "../../daemon/logger.js";
import { errorMessage, exitCodeOf } from "../../errors.js";
import {
    DOWNLOAD_HOST,
    ELECTRUM_VERSION,
    KEYSERVER,
    SIGNING_KEY_FINGERPRINT,
} from "../../release/constants.js";
import { httpFetcher } from "../../release/fetcher.js";
import { installRelease } from "../../release/install.js";

interface InstallCommandOptions {
    electrumVersion?: string;
    workdir?: string;
    pip?: string;
}

export async function installCommand(options: InstallCommandOptions): Promise<void> {
    const logger = new Logger();
    try {
        await installRelease({
            version: options.electrumVersion ?? ELECTRUM_VERSION,
            host: DOWNLOAD_HOST,
            fingerprint: SIGNING_KEY_FINGERPRINT,
            keyserver: KEYSERVER,
            workDir: options.workdir ?? path.join(os.tmpdir(), "electrum-release"),
            fetcher: httpFetcher,
            runner: new ChildProcessRunner(),
            logger,
            pip: options.pip,
        });
    } catch (err) {
        console.error(`Error: ${errorMessage(err)}`);
        process.exit(exitCodeOf(err));
    }
}
