export const ALLOWED_LOG_LEVELS = [
  "silent",
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
] as const;

export type LogLevel = (typeof ALLOWED_LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return ALLOWED_LOG_LEVELS.some((entry) => entry === value);
}

export function normalizeLogLevel(level?: string, fallback: LogLevel = "silent"): LogLevel {
  const candidate = (level ?? fallback).trim().toLowerCase();
  return isLogLevel(candidate) ? candidate : fallback;
}

export function levelToMinLevel(level: LogLevel): number {
  // tslog level ordering: trace=1, debug=2, info=3, warn=4, error=5, fatal=6
  const map: Record<LogLevel, number> = {
    trace: 1,
    debug: 2,
    info: 3,
    warn: 4,
    error: 5,
    fatal: 6,
    silent: Number.POSITIVE_INFINITY,
  };
  return map[level];
}

export type LevelColor = "green" | "yellow" | "red" | "cyan";

// Record levels are matched exactly; "INFO" or "Warn" stay uncolored.
const LEVEL_COLORS: Readonly<Record<string, LevelColor>> = {
  info: "green",
  warn: "yellow",
  error: "red",
  debug: "cyan",
};

export function levelColor(level: string): LevelColor | undefined {
  return Object.hasOwn(LEVEL_COLORS, level) ? LEVEL_COLORS[level] : undefined;
}
