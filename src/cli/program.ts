import { Command } from "commander";
import { initCommand } from "./commands/init.js";
import { runCommand } from "./commands/run.js";
import { statusCommand } from "./commands/status.js";
import { installCommand } from "./commands/install.js";
import { layoutCommand } from "./commands/layout.js";

export const CLI_VERSION = "0.1.0";

/**
 * Build the command tree. Program options are only read before the
 * subcommand, so `--version` after `install` is not the program's flag.
 */
export function createProgram(): Command {
    const program = new Command();

    program
        .name("electrum-supervisor")
        .description("Bootstrap and supervise an Electrum wallet daemon inside a container")
        .version(CLI_VERSION)
        .enablePositionalOptions();

    program
        .command("run")
        .description("Configure and start the Electrum daemon, then wait for SIGTERM")
        .option("--config <dir>", "Directory containing the settings file (defaults to ~/.electrum-supervisor)")
        .action(runCommand);

    program
        .command("init")
        .description("Create a .electrum-supervisor.yml settings file")
        .option("--config <dir>", "Directory to write the settings file to (defaults to ~/.electrum-supervisor)")
        .action(initCommand);

    program
        .command("status")
        .description("Show the resolved configuration and any running daemon")
        .option("--config <dir>", "Directory containing the settings file (defaults to ~/.electrum-supervisor)")
        .action(statusCommand);

    program
        .command("install")
        .description("Download, verify and install the Electrum release (image build step)")
        .option("--electrum-version <version>", "Electrum version to install")
        .option("--workdir <dir>", "Scratch directory for downloads")
        .option("--pip <path>", "pip executable to install with (defaults to pip3)")
        .action(installCommand);

    program
        .command("layout")
        .description("Create the wallet directories and the data volume link (image build step)")
        .option("--home <dir>", "Electrum base directory")
        .option("--data <path>", "Data volume path to link to the base directory")
        .option("--owner <uid:gid>", "Hand the tree to this owner")
        .action(layoutCommand);

    return program;
}
