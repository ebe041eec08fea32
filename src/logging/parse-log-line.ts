import { z } from "zod";

import { findPropertySource } from "./json-source.js";

const INT32_MIN = -2_147_483_648;
const INT32_MAX = 2_147_483_647;
const INTEGER_LITERAL_RE = /^-?\d+$/;

const LogRecordSchema = z.object({
  level: z.string(),
  message: z.string(),
  timestamp: z.string(),
  file: z.string().nullish(),
  line: z.number().int().min(INT32_MIN).max(INT32_MAX).nullish(),
  metadata: z.unknown().optional(),
});

export type LogRecord = {
  readonly level: string;
  readonly message: string;
  readonly timestamp: string;
  readonly file?: string;
  readonly line?: number;
  /** JSON source text of the `metadata` value, as written in the input line. */
  readonly metadata?: string;
};

export type ParsedLogLine = { ok: true; record: LogRecord } | { ok: false; raw: string };

export function parseLogLine(raw: string): ParsedLogLine {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return { ok: false, raw };
  }
  const parsed = LogRecordSchema.safeParse(value);
  if (!parsed.success) return { ok: false, raw };
  const { level, message, timestamp, file, line, metadata } = parsed.data;

  // `5.0` and `1e3` parse to integers but are not integer literals.
  if (typeof line === "number") {
    const lineSource = findPropertySource(raw, "line");
    if (!lineSource || !INTEGER_LITERAL_RE.test(lineSource.text)) return { ok: false, raw };
  }

  const metadataSource =
    metadata === undefined || metadata === null ? undefined : findPropertySource(raw, "metadata");

  return {
    ok: true,
    record: {
      level,
      message,
      timestamp,
      file: file ?? undefined,
      line: line ?? undefined,
      metadata: metadataSource?.text,
    },
  };
}
