#!/usr/bin/env node
import process from "node:process";

import { CLI_NAME } from "./cli/cli-name.js";
import { formatUncaughtError } from "./infra/errors.js";

process.title = CLI_NAME;

// Chalk reads the environment when it loads, so settle this before importing the CLI.
if (process.argv.includes("--no-color")) {
  process.env.NO_COLOR = "1";
  process.env.FORCE_COLOR = "0";
}

import("./cli/run-main.js")
  .then(({ runCli }) => runCli(process.argv))
  .catch((error: unknown) => {
    console.error(`[${CLI_NAME}] Failed to start CLI:`, formatUncaughtError(error));
    process.exitCode = 1;
  });
