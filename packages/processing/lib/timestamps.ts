import * as chrono from "chrono-node";

// =============================================================================
// Timezone Convention
// =============================================================================
// Trip exports carry naive local wall-clock times. They are held as UTC Dates
// (wall clock == UTC fields) so the host timezone never shifts a value, and
// they are written back out the same way.
//
// Fractions of a second are dropped on parse. Output has whole seconds only,
// so every stage has to see the same instant the written file will carry.

type TimestampParts = {
  year: number;
  month: number; // 1-12
  day: number;
  hour: number;
  minute: number;
  second: number;
};

// Known export layouts, tried in order before falling back to chrono
const KNOWN_LAYOUTS: Array<{ pattern: RegExp; toParts: (m: RegExpExecArray) => TimestampParts }> = [
  // 2021-04-01T08:00:00, 2021-04-01 08:00, 2021-04-01T08:00:00.123, 2021/04/01 08:00:00
  {
    pattern: /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?$/,
    toParts: (m) => ({
      year: Number(m[1]),
      month: Number(m[2]),
      day: Number(m[3]),
      hour: Number(m[4] ?? 0),
      minute: Number(m[5] ?? 0),
      second: Number(m[6] ?? 0),
    }),
  },
  // 01.04.2021 08:00, 01.04.2021 08:00:00
  {
    pattern: /^(\d{1,2})\.(\d{1,2})\.(\d{4})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/,
    toParts: (m) => ({
      year: Number(m[3]),
      month: Number(m[2]),
      day: Number(m[1]),
      hour: Number(m[4] ?? 0),
      minute: Number(m[5] ?? 0),
      second: Number(m[6] ?? 0),
    }),
  },
];

// Rejects values like Feb 30 that Date.UTC would silently roll over
function partsToDate(parts: TimestampParts): Date | null {
  const { year, month, day, hour, minute, second } = parts;
  if (month < 1 || month > 12 || day < 1 || hour > 23 || minute > 59 || second > 59) {
    return null;
  }
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  // Date.UTC maps years 0-99 to 1900-1999
  date.setUTCFullYear(year);
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

function parseWithChrono(text: string): Date | null {
  const [result] = chrono.strict.parse(text);
  // Only accept a parse that explains the whole cell
  if (!result || result.index !== 0 || result.text.length !== text.length) {
    return null;
  }
  const { start } = result;
  const year = start.get("year");
  const month = start.get("month");
  const day = start.get("day");
  if (typeof year !== "number" || typeof month !== "number" || typeof day !== "number") {
    return null;
  }

  // chrono implies noon for date-only values; a bare date means midnight here
  const certain = (component: "hour" | "minute" | "second") =>
    start.isCertain(component) ? (start.get(component) ?? 0) : 0;

  return partsToDate({
    year,
    month,
    day,
    hour: certain("hour"),
    minute: certain("minute"),
    second: certain("second"),
  });
}

/**
 * Parses a free-form trip timestamp. Returns null for anything that can't be
 * interpreted; never throws.
 */
export function parseTimestamp(value: string | null | undefined): Date | null {
  if (value === null || value === undefined) return null;
  const text = value.trim();
  if (text === "") return null;

  for (const layout of KNOWN_LAYOUTS) {
    const match = layout.pattern.exec(text);
    if (match) return partsToDate(layout.toParts(match));
  }

  return parseWithChrono(text);
}

const pad = (n: number, width = 2) => String(n).padStart(width, "0");

// YYYY-MM-DDTHH:MM:SS, no offset, no fractional seconds
export function formatTimestamp(date: Date): string {
  return (
    `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}` +
    `T${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  );
}

// Monday=1 ... Sunday=7
export function isoWeekday(date: Date): number {
  const day = date.getUTCDay();
  return day === 0 ? 7 : day;
}

export const WEEKDAY_NAMES = [
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
  "sunday",
] as const;

export type WeekdayName = (typeof WEEKDAY_NAMES)[number];
