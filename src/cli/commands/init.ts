import { writeDefaultConfig } from "../../config/loader.js";
import { errorMessage, exitCodeOf } from "../../errors.js";

interface InitOptions {
    config?: string;
}

export function initCommand(options: InitOptions): void {
    try {
        const configPath = writeDefaultConfig(options.config);
        console.log(`Created configuration file: ${configPath}`);
        console.log("Edit the file if needed, then run 'electrum-supervisor run'.");
    } catch (err) {
        console.error(`Error: ${errorMessage(err)}`);
        process.exit(exitCodeOf(err));
    }
}
