import { describe, expect, it, vi } from "vitest";

import { makeTempDir } from "../../test/helpers/temp-dir.js";
import type { RuntimeEnv } from "../runtime.js";
import { VERSION } from "../version.js";
import { buildProgram } from "./program.js";

function createRuntime() {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const runtime: RuntimeEnv = {
    stdout: { write: (chunk: string) => stdout.push(chunk) },
    error: (...args: unknown[]) => {
      stderr.push(args.map(String).join(" "));
    },
  };
  return { runtime, stdout, stderr };
}

describe("logtint program", () => {
  it("renders the file named by the first argument", async () => {
    const tmp = makeTempDir();
    try {
      const file = tmp.write(
        "app.log",
        '{"level":"info","message":"hi","timestamp":"2024-01-01T00:00:00Z"}\nraw\n',
      );
      const { runtime, stdout } = createRuntime();
      const program = buildProgram({ runtime, offsetMinutesAt: () => 0 });
      program.exitOverride();

      await program.parseAsync([file, "--no-color"], { from: "user" });

      expect(stdout).toEqual(["2024-01-01T00:00:00.000Z|info : hi \n", "raw\n"]);
    } finally {
      tmp.cleanup();
    }
  });

  it("ignores arguments after the file", async () => {
    const openLines = vi.fn(() => ["only"]);
    const { runtime, stdout } = createRuntime();
    const program = buildProgram({ runtime, openLines });
    program.exitOverride();

    await program.parseAsync(["first.log", "second.log", "--no-color"], { from: "user" });

    expect(openLines).toHaveBeenCalledWith("first.log");
    expect(stdout).toEqual(["only\n"]);
  });

  it("reads a dash-prefixed argument as the file path", async () => {
    const openLines = vi.fn(() => ["from dash file"]);
    const { runtime, stdout } = createRuntime();
    const program = buildProgram({ runtime, openLines });
    program.exitOverride();

    await program.parseAsync(["-weird.log"], { from: "user" });

    expect(openLines).toHaveBeenCalledWith("-weird.log");
    expect(stdout).toEqual(["from dash file\n"]);
  });

  it("prints the missing-input notice without a file argument", async () => {
    const { runtime, stdout, stderr } = createRuntime();
    const program = buildProgram({ runtime });
    program.exitOverride();

    await program.parseAsync([], { from: "user" });

    expect(stderr).toEqual(["No input."]);
    expect(stdout).toEqual([]);
  });

  it("reports its version", async () => {
    const written: string[] = [];
    const program = buildProgram();
    program.exitOverride();
    program.configureOutput({ writeOut: (text) => written.push(text) });

    await expect(program.parseAsync(["--version"], { from: "user" })).rejects.toMatchObject({
      code: "commander.version",
    });
    expect(written).toEqual([`${VERSION}\n`]);
  });
});
