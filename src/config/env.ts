import { z } from "zod";

import { type LogLevel, normalizeLogLevel } from "../logging/levels.js";

export const LOG_LEVEL_ENV = "LOGTINT_LOG_LEVEL";

const EnvSchema = z.object({
  NO_COLOR: z.string().optional(),
  FORCE_COLOR: z.string().optional(),
  [LOG_LEVEL_ENV]: z.string().optional(),
});

export type LogtintEnvConfig = {
  /** Minimum level for internal diagnostics written to stderr. */
  logLevel: LogLevel;
  /** True when NO_COLOR asks for plain output and FORCE_COLOR does not override it. */
  colorDisabled: boolean;
};

export function hasForceColor(value?: string): boolean {
  return typeof value === "string" && value.trim().length > 0 && value.trim() !== "0";
}

export function resolveEnvConfig(env: NodeJS.ProcessEnv = process.env): LogtintEnvConfig {
  const parsed = EnvSchema.parse(env);
  return {
    logLevel: normalizeLogLevel(parsed[LOG_LEVEL_ENV], "silent"),
    colorDisabled: Boolean(parsed.NO_COLOR) && !hasForceColor(parsed.FORCE_COLOR),
  };
}
