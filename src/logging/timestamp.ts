/** Minutes east of UTC for the given instant. */
export type OffsetLookup = (epochMs: number) => number;

export const hostOffsetMinutes: OffsetLookup = (epochMs) =>
  -new Date(epochMs).getTimezoneOffset();

const RFC3339_RE =
  /^(\d{4})-(\d{2})-(\d{2})[Tt ](\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?(?:([Zz])|([+-])(\d{2}):(\d{2}))$/;

function daysInMonth(year: number, month: number): number {
  const date = new Date(0);
  date.setUTCFullYear(year, month, 0);
  return date.getUTCDate();
}

type ParsedInstant = {
  epochMs: number;
  /** Second 60; `epochMs` then points into second 59. */
  leapSecond: boolean;
};

function parseInstant(value: string): ParsedInstant | undefined {
  const match = RFC3339_RE.exec(value);
  if (!match) return undefined;
  const [, y, mo, d, h, mi, s, fraction, zulu, sign, oh, om] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  if (month < 1 || month > 12) return undefined;
  if (day < 1 || day > daysInMonth(year, month)) return undefined;
  if (hour > 23 || minute > 59 || second > 60) return undefined;
  const leapSecond = second === 60;

  let offsetMinutes = 0;
  if (!zulu) {
    const offsetHours = Number(oh);
    const offsetMins = Number(om);
    if (offsetHours > 23 || offsetMins > 59) return undefined;
    offsetMinutes = (sign === "-" ? -1 : 1) * (offsetHours * 60 + offsetMins);
  }

  const millis = fraction ? Number(fraction.slice(0, 3).padEnd(3, "0")) : 0;
  const utc = new Date(0);
  utc.setUTCFullYear(year, month - 1, day);
  utc.setUTCHours(hour, minute, leapSecond ? 59 : second, millis);
  return { epochMs: utc.getTime() - offsetMinutes * 60_000, leapSecond };
}

/** Parses an RFC 3339 date-time into epoch milliseconds; fractions past ms are truncated. */
export function parseRfc3339(value: string): number | undefined {
  return parseInstant(value)?.epochMs;
}

const pad = (value: number, width = 2) => String(value).padStart(width, "0");

function formatYear(year: number): string {
  if (year < 0) return `-${pad(-year, 4)}`;
  if (year > 9999) return `+${year}`;
  return pad(year, 4);
}

function formatOffset(offsetMinutes: number): string {
  if (offsetMinutes === 0) return "Z";
  const sign = offsetMinutes < 0 ? "-" : "+";
  const abs = Math.abs(offsetMinutes);
  return `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`;
}

/** Renders an instant as `YYYY-MM-DDTHH:MM:SS.mmm±HH:MM` in the given offset. */
export function formatWithOffset(
  epochMs: number,
  offsetMinutes: number,
  leapSecond = false,
): string {
  const shifted = new Date(epochMs + offsetMinutes * 60_000);
  const seconds = leapSecond ? 60 : shifted.getUTCSeconds();
  const date = `${formatYear(shifted.getUTCFullYear())}-${pad(shifted.getUTCMonth() + 1)}-${pad(shifted.getUTCDate())}`;
  const time = `${pad(shifted.getUTCHours())}:${pad(shifted.getUTCMinutes())}:${pad(seconds)}.${pad(shifted.getUTCMilliseconds(), 3)}`;
  return `${date}T${time}${formatOffset(offsetMinutes)}`;
}

/**
 * Converts an RFC 3339 timestamp to local time. Anything that does not parse
 * is returned as given.
 */
export function toLocalTimestamp(
  value: string,
  offsetMinutesAt: OffsetLookup = hostOffsetMinutes,
): string {
  const instant = parseInstant(value);
  if (!instant) return value;
  const offsetMinutes = Math.round(offsetMinutesAt(instant.epochMs));
  return formatWithOffset(instant.epochMs, offsetMinutes, instant.leapSecond);
}
