import { errorMessage, exitCodeOf } from "../../errors.js";
import { DATA_LINK, ELECTRUM_HOME } from "../../release/constants.js";
import { parseOwner, prepareDataLayout } from "../../release/layout.js";

interface LayoutCommandOptions {
    home?: string;
    data?: string;
    owner?: string;
}

export function layoutCommand(options: LayoutCommandOptions): void {
    try {
        const result = prepareDataLayout({
            base: options.home ?? ELECTRUM_HOME,
            dataLink: options.data ?? DATA_LINK,
            owner: options.owner !== undefined ? parseOwner(options.owner) : undefined,
        });
        for (const dir of result.walletDirs) {
            console.log(`Created ${dir}`);
        }
        console.log(`Linked ${result.link} -> ${options.home ?? ELECTRUM_HOME}`);
    } catch (err) {
        console.error(`Error: ${errorMessage(err)}`);
        process.exit(exitCodeOf(err));
    }
}
