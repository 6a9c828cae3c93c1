import { describe, it, expect } from "vitest";
import { ChildProcessRunner, formatCommandLine } from "../src/daemon/command.js";
import { CommandError, CommandTimeoutError } from "../src/errors.js";

const node = process.execPath;

describe("ChildProcessRunner", () => {
    it("should resolve when the command exits 0", async () => {
        const runner = new ChildProcessRunner();
        await expect(runner.run(node, ["-e", "process.exit(0)"], { quiet: true })).resolves.toBeUndefined();
        expect(runner.activeCount).toBe(0);
    });

    it("should reject with the command's exit code", async () => {
        const runner = new ChildProcessRunner();
        const error = await runner.run(node, ["-e", "process.exit(3)"], { quiet: true }).catch((err: unknown) => err);

        expect(error).toBeInstanceOf(CommandError);
        expect(error instanceof CommandError ? error.exitCode : null).toBe(3);
    });

    it("should reject with 127 when the binary does not exist", async () => {
        const runner = new ChildProcessRunner();
        const error = await runner
            .run("electrum-supervisor-missing-binary", ["getinfo"], { quiet: true })
            .catch((err: unknown) => err);

        expect(error instanceof CommandError ? error.exitCode : null).toBe(127);
    });

    it("should kill the command once the timeout passes", async () => {
        const runner = new ChildProcessRunner();
        await expect(
            runner.run(node, ["-e", "setTimeout(() => {}, 10000)"], { quiet: true, timeoutMs: 200 }),
        ).rejects.toBeInstanceOf(CommandTimeoutError);
        expect(runner.activeCount).toBe(0);
    });

    it("should terminate running children with SIGTERM", async () => {
        const runner = new ChildProcessRunner();
        const pending = runner
            .run(node, ["-e", "setTimeout(() => {}, 10000)"], { quiet: true })
            .catch((err: unknown) => err);
        expect(runner.activeCount).toBe(1);

        runner.terminateAll();
        const error = await pending;

        expect(error instanceof CommandError ? error.exitCode : null).toBe(143);
    });

    it("should format command lines with single spaces", () => {
        expect(formatCommandLine("electrum", ["daemon", "-d"])).toBe("electrum daemon -d");
    });
});
