import process from "node:process";

import { formatUncaughtError } from "../infra/errors.js";
import { getLogger } from "../logging/logger.js";
import { isBrokenPipeError } from "../terminal/stream-writer.js";
import { CLI_NAME } from "./cli-name.js";
import { buildProgram } from "./program.js";

export async function runCli(argv: string[] = process.argv) {
  // A reader such as `head` may close stdout while buffered writes are still in flight.
  process.stdout.on("error", (err) => {
    if (isBrokenPipeError(err)) {
      getLogger().debug("stdout closed", { code: err.code });
      return;
    }
    console.error(`[${CLI_NAME}] Output error:`, formatUncaughtError(err));
    process.exitCode = 1;
  });

  process.on("uncaughtException", (error) => {
    console.error(`[${CLI_NAME}] Uncaught exception:`, formatUncaughtError(error));
    process.exit(1);
  });

  const program = buildProgram();
  await program.parseAsync(argv);
}
