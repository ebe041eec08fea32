import { extractErrorCode } from "../infra/errors.js";
import { readLines } from "../infra/line-source.js";
import { renderLogLine } from "../logging/format-log-line.js";
import { getChildLogger } from "../logging/logger.js";
import type { OffsetLookup } from "../logging/timestamp.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { createSafeStreamWriter } from "../terminal/stream-writer.js";
import { theme as defaultTheme, type Theme } from "../terminal/theme.js";
import { CLI_NAME } from "./cli-name.js";

export type PrettyCliDeps = {
  runtime?: RuntimeEnv;
  theme?: Theme;
  openLines?: (filePath: string) => Iterable<string>;
  offsetMinutesAt?: OffsetLookup;
};

export function runPretty(filePath: string | undefined, deps: PrettyCliDeps = {}): void {
  const runtime = deps.runtime ?? defaultRuntime;
  if (filePath === undefined) {
    runtime.error("No input.");
    return;
  }

  const log = getChildLogger("pretty");
  const openLines = deps.openLines ?? readLines;
  let lines: Iterable<string>;
  try {
    lines = openLines(filePath);
  } catch (err) {
    // Unreadable input ends the run without output.
    log.debug("could not open input", { path: filePath, code: extractErrorCode(err) });
    return;
  }

  const theme = deps.theme ?? defaultTheme;
  const writer = createSafeStreamWriter({
    onClosed: (code) => {
      log.debug("output closed", { code });
      runtime.error(`${CLI_NAME}: output stdout closed (${code}).`);
    },
  });

  for (const raw of lines) {
    const rendered = renderLogLine(raw, theme, { offsetMinutesAt: deps.offsetMinutesAt });
    if (!writer.writeLine(runtime.stdout, rendered)) return;
  }
}
