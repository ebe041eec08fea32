import type { Theme } from "../terminal/theme.js";
import { compactJson } from "./json-source.js";
import { levelColor } from "./levels.js";
import { type LogRecord, parseLogLine } from "./parse-log-line.js";
import { type OffsetLookup, toLocalTimestamp } from "./timestamp.js";

export const LEVEL_WIDTH = 5;

export type FormatOptions = {
  offsetMinutesAt?: OffsetLookup;
};

/** Centers a label in `width` columns; the odd space goes on the right. */
export function centerLabel(label: string, width: number = LEVEL_WIDTH): string {
  const length = Array.from(label).length;
  if (length >= width) return label;
  const padding = width - length;
  const left = Math.floor(padding / 2);
  return `${" ".repeat(left)}${label}${" ".repeat(padding - left)}`;
}

/** Compacts the metadata source text; absent or unreadable metadata renders as "". */
export function formatMetadata(source: string | undefined): string {
  if (source === undefined) return "";
  return compactJson(source) ?? "";
}

export function formatLogRecord(
  record: LogRecord,
  theme: Theme,
  opts: FormatOptions = {},
): string {
  const meta = formatMetadata(record.metadata);
  const time = theme.time(toLocalTimestamp(record.timestamp, opts.offsetMinutesAt));
  const level = centerLabel(record.level);

  if (record.file === undefined || record.line === undefined) {
    return `${time}|${level}: ${record.message} ${meta}`;
  }
  const file = theme.source(record.file);
  const line = theme.source(String(record.line));
  return `${time}|${level}|${file}:${line}: ${record.message} ${meta}`;
}

/** Formats and colors one input line, or returns it unchanged when it is not a record. */
export function renderLogLine(raw: string, theme: Theme, opts: FormatOptions = {}): string {
  const parsed = parseLogLine(raw);
  if (!parsed.ok) return parsed.raw;
  const formatted = formatLogRecord(parsed.record, theme, opts);
  const color = levelColor(parsed.record.level);
  return color ? theme.severity[color](formatted) : formatted;
}
