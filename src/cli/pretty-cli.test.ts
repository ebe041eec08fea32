import { Writable } from "node:stream";
import { Chalk } from "chalk";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { makeTempDir, type TempDir } from "../../test/helpers/temp-dir.js";
import type { RuntimeEnv } from "../runtime.js";
import { createTheme, plainTheme } from "../terminal/theme.js";
import { runPretty } from "./pretty-cli.js";

const TIME = "2024-01-01T00:00:00.000Z";

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

describe("runPretty", () => {
  let tmp: TempDir;

  beforeEach(() => {
    tmp = makeTempDir();
  });

  afterEach(() => {
    tmp.cleanup();
  });

  it("reports missing input and does nothing else", () => {
    const { runtime, stdout, stderr } = createRuntime();
    const openLines = vi.fn(() => []);

    runPretty(undefined, { runtime, openLines });

    expect(stderr).toEqual(["No input."]);
    expect(stdout).toEqual([]);
    expect(openLines).not.toHaveBeenCalled();
  });

  it("prints nothing when the file cannot be opened", () => {
    const { runtime, stdout, stderr } = createRuntime();

    runPretty(`${tmp.dir}/missing.log`, { runtime, theme: plainTheme });

    expect(stdout).toEqual([]);
    expect(stderr).toEqual([]);
  });

  it("treats an empty path as an unopenable file", () => {
    const { runtime, stdout, stderr } = createRuntime();

    runPretty("", { runtime, theme: plainTheme });

    expect(stdout).toEqual([]);
    expect(stderr).toEqual([]);
  });

  it("renders records and passes other lines through in order", () => {
    const file = tmp.write(
      "app.log",
      [
        '{"level":"info","message":"started","timestamp":"2024-01-01T00:00:00Z","file":"main.ts","line":3}',
        "plain text line",
        '{"level":"warn","message":"slow","timestamp":"later","metadata":{"ms":950}}',
        '{"level":"info"}',
        "",
      ].join("\n"),
    );
    const { runtime, stdout, stderr } = createRuntime();

    runPretty(file, { runtime, theme: plainTheme, offsetMinutesAt: () => 0 });

    expect(stdout).toEqual([
      `${TIME}|info |main.ts:3: started \n`,
      "plain text line\n",
      'later|warn : slow {"ms":950}\n',
      '{"level":"info"}\n',
    ]);
    expect(stderr).toEqual([]);
  });

  it("colors the whole line by severity", () => {
    const file = tmp.write(
      "app.log",
      '{"level":"error","message":"boom","timestamp":"2024-01-01T00:00:00Z"}\n',
    );
    const { runtime, stdout } = createRuntime();

    runPretty(file, {
      runtime,
      theme: createTheme(new Chalk({ level: 1 })),
      offsetMinutesAt: () => 0,
    });

    expect(stdout).toEqual([`\u001b[31m\u001b[35m${TIME}\u001b[31m|error: boom \u001b[39m\n`]);
  });

  it("stops after the output pipe closes", () => {
    const { runtime, stderr } = createRuntime();
    const write = vi.fn(() => {
      throw Object.assign(new Error("EPIPE"), { code: "EPIPE" });
    });
    runtime.stdout = { write };

    runPretty("input.log", {
      runtime,
      theme: plainTheme,
      openLines: () => ["one", "two", "three"],
    });

    expect(write).toHaveBeenCalledTimes(1);
    expect(stderr).toEqual(["logtint: output stdout closed (EPIPE)."]);
  });

  it("stops when stdout breaks without throwing", async () => {
    const { runtime, stderr } = createRuntime();
    const received: string[] = [];
    const stdout = new Writable({
      write(chunk: Buffer, _encoding, _callback) {
        received.push(chunk.toString());
        this.destroy(Object.assign(new Error("write EPIPE"), { code: "EPIPE" }));
      },
    });
    const emitted: unknown[] = [];
    stdout.on("error", (err) => emitted.push(err));
    runtime.stdout = stdout;
    const openLines = vi.fn(() => ["one", "two", "three"]);

    runPretty("input.log", { runtime, theme: plainTheme, openLines });

    expect(received).toEqual(["one\n"]);
    expect(stderr).toEqual(["logtint: output stdout closed (EPIPE)."]);

    await new Promise((resolve) => setImmediate(resolve));
    expect(emitted).toHaveLength(1);
  });
});
