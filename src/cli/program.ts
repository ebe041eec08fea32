import { Command } from "commander";

import { resolveTheme } from "../terminal/theme.js";
import { VERSION } from "../version.js";
import { CLI_NAME } from "./cli-name.js";
import { type PrettyCliDeps, runPretty } from "./pretty-cli.js";

type ProgramOptions = {
  color?: boolean;
};

export function buildProgram(deps: PrettyCliDeps = {}): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description("Render a JSON-lines log file as colored, human-readable terminal output")
    .version(VERSION)
    .argument("[file]", "Log file with one JSON record per line")
    .option("--no-color", "Disable ANSI colors")
    // Unrecognized dash-prefixed tokens are file paths, not errors.
    .allowUnknownOption(true)
    .allowExcessArguments(true)
    .action((file: string | undefined, opts: ProgramOptions) => {
      runPretty(file, {
        ...deps,
        theme: deps.theme ?? resolveTheme(opts.color !== false),
      });
    });

  return program;
}
