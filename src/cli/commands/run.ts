import { getConfigHome } from "../../config/loader.js";
import { runForeground } from "../../daemon/runner.js";

interface RunOptions {
    config?: string;
}

export async function runCommand(options: RunOptions): Promise<void> {
    await runForeground(options.config ?? getConfigHome());
}
