import { Logger as TsLogger } from "tslog";

import { resolveEnvConfig } from "../config/env.js";
import { type LogLevel, levelToMinLevel } from "./levels.js";

type LogObj = { date?: Date } & Record<string, unknown>;

export type DiagnosticLogger = TsLogger<LogObj>;
export type DiagnosticSink = (line: string) => void;

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function extractMessage(logObj: Record<string, unknown>): string {
  const parts: string[] = [];
  for (const key of Object.keys(logObj)) {
    if (!/^\d+$/.test(key)) continue;
    const item = logObj[key];
    if (typeof item === "string") parts.push(item);
  }
  return parts.join(" ");
}

function extractMetadata(logObj: Record<string, unknown>): Record<string, unknown> | undefined {
  for (const key of Object.keys(logObj)) {
    if (!/^\d+$/.test(key)) continue;
    const item = logObj[key];
    if (isRecord(item)) return item;
  }
  return undefined;
}

/**
 * Diagnostics are emitted in the same JSON-lines shape logtint reads, so a
 * captured stderr can be piped back through the tool.
 */
export function toDiagnosticLine(logObj: Record<string, unknown>): string {
  const meta = isRecord(logObj._meta) ? logObj._meta : {};
  const level = typeof meta.logLevelName === "string" ? meta.logLevelName.toLowerCase() : "info";
  const date = meta.date instanceof Date ? meta.date : new Date();
  const subsystem = typeof meta.name === "string" ? meta.name : undefined;
  const details = extractMetadata(logObj);
  const metadata = subsystem || details ? { subsystem, ...details } : undefined;
  return JSON.stringify({
    level,
    message: extractMessage(logObj),
    timestamp: date.toISOString(),
    metadata,
  });
}

const writeToStderr: DiagnosticSink = (line) => {
  process.stderr.write(`${line}\n`);
};

export function createDiagnosticLogger(
  level: LogLevel,
  sink: DiagnosticSink = writeToStderr,
): DiagnosticLogger {
  const logger = new TsLogger<LogObj>({
    name: "logtint",
    minLevel: levelToMinLevel(level),
    type: "hidden", // no ansi formatting
    hideLogPositionForProduction: true,
  });

  logger.attachTransport((logObj: LogObj) => {
    sink(toDiagnosticLine(logObj));
  });

  return logger;
}

let cached: { level: LogLevel; logger: DiagnosticLogger } | null = null;

export function getLogger(): DiagnosticLogger {
  const { logLevel } = resolveEnvConfig();
  if (!cached || cached.level !== logLevel) {
    cached = { level: logLevel, logger: createDiagnosticLogger(logLevel) };
  }
  return cached.logger;
}

export function getChildLogger(subsystem: string): DiagnosticLogger {
  return getLogger().getSubLogger({ name: subsystem });
}
