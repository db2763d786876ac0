// engine/normalizeFields.ts
// Cell and header normalization helpers for the Diagnosis Engine

// ---- Types (imported first) ----
import type { CellValue, Maybe } from './types';

// ---- Constants ----
import { MONTH_NAMES, UNSET } from './constants';
import {
  DATE_DAY_MONTH_NAME,
  DATE_MONTH_FIRST,
  DATE_MONTH_NAME_FIRST,
  DATE_YEAR_FIRST,
  HEADER_NOISE,
  NUMERIC_LITERAL,
  UTC_OFFSET
} from './regex';

// ------------------------------------------------------------
// Core string helper
// ------------------------------------------------------------

/**
 * Safely convert any unknown value to a trimmed string.
 * Never returns null/undefined; always returns a string (possibly empty).
 */
export function toSafeTrimmedString(value: unknown): string {
  return (value ?? '').toString().trim();
}

// ------------------------------------------------------------
// Cell normalization (JSON rows → CellValue)
// ------------------------------------------------------------

/**
 * Normalize a transport-level cell into a CellValue.
 *  - finite numbers are kept
 *  - strings are trimmed; blank → null
 *  - booleans become "true" / "false"
 *  - anything else (objects, arrays, NaN) → null
 */
export function toCellValue(value: unknown): CellValue {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' ? null : trimmed;
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  return null;
}

// ------------------------------------------------------------
// Numeric coercion
// ------------------------------------------------------------

/**
 * Parse one cell as a real number. Unparseable → null (never 0, never throws).
 */
export function parseNumericCell(value: CellValue | undefined): Maybe<number> {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') return null;

  const safe = value.trim();
  if (!NUMERIC_LITERAL.test(safe)) return null;

  const parsed = Number(safe);
  return Number.isFinite(parsed) ? parsed : null;
}

// ------------------------------------------------------------
// Date coercion
// ------------------------------------------------------------

function offsetMinutes(raw: string | undefined): number {
  if (!raw || raw.toUpperCase() === 'Z') return 0;
  const m = raw.match(UTC_OFFSET);
  if (!m) return 0;
  const sign = m[1] === '-' ? -1 : 1;
  return sign * (Number(m[2]) * 60 + Number(m[3]));
}

interface DateParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millis: number;
  offset: string | undefined;
}

// "jan", "january", "Sept" → 1..12; unknown → null
function monthFromName(raw: string): Maybe<number> {
  const name = raw.toLowerCase();
  const abbreviated = name.length >= 3 && name.length <= 4;
  const index = MONTH_NAMES.findIndex(
    (full) => full === name || (abbreviated && full.startsWith(name))
  );
  return index === -1 ? null : index + 1;
}

function timeParts(m: RegExpMatchArray): Pick<DateParts, 'hour' | 'minute' | 'second' | 'millis' | 'offset'> {
  return {
    hour: m[5] ? Number(m[5]) : 0,
    minute: m[6] ? Number(m[6]) : 0,
    second: m[7] ? Number(m[7]) : 0,
    millis: m[8] ? Number(m[8].slice(0, 3).padEnd(3, '0')) : 0,
    offset: m[9]
  };
}

function matchDateParts(text: string): DateParts | null {
  let m = text.match(DATE_YEAR_FIRST);
  if (m) {
    return { year: Number(m[1]), month: Number(m[3]), day: Number(m[4]), ...timeParts(m) };
  }

  m = text.match(DATE_MONTH_FIRST);
  if (m) {
    return { year: Number(m[4]), month: Number(m[1]), day: Number(m[3]), ...timeParts(m) };
  }

  const noTime = { hour: 0, minute: 0, second: 0, millis: 0, offset: undefined };

  m = text.match(DATE_MONTH_NAME_FIRST);
  if (m) {
    const month = monthFromName(m[1]);
    return month === null ? null : { year: Number(m[3]), month, day: Number(m[2]), ...noTime };
  }

  m = text.match(DATE_DAY_MONTH_NAME);
  if (m) {
    const month = monthFromName(m[2]);
    return month === null ? null : { year: Number(m[3]), month, day: Number(m[1]), ...noTime };
  }

  return null;
}

/**
 * Parse one cell as a point in time (epoch milliseconds).
 *
 * Accepted inputs:
 * - YYYY-MM-DD, YYYY/MM/DD, YYYY.MM.DD (1–2 digit month/day)
 * - MM/DD/YYYY, MM-DD-YYYY (month first)
 * - the numeric forms above + time (HH:MM, HH:MM:SS, HH:MM:SS.fff) after "T"
 *   or a space, and an optional "Z" or ±HH:MM offset; no offset = UTC
 * - "Jan 10, 2024", "January 10 2024", "10 Jan 2024" (UTC midnight)
 *
 * Numbers are never treated as dates.
 */
export function parseDateCell(value: CellValue | undefined): Maybe<number> {
  if (typeof value !== 'string') return null;

  const parts = matchDateParts(value.trim());
  if (!parts) return null;

  const { year, month, day, hour, minute, second, millis } = parts;
  if (hour > 23 || minute > 59 || second > 59) return null;

  const dt = new Date(Date.UTC(year, month - 1, day, hour, minute, second, millis));
  const ok =
    dt.getUTCFullYear() === year &&
    dt.getUTCMonth() === month - 1 &&
    dt.getUTCDate() === day;
  if (!ok) return null;

  return dt.getTime() - offsetMinutes(parts.offset) * 60_000;
}

// ------------------------------------------------------------
// Group keys
// ------------------------------------------------------------

/**
 * String form of a cell used as a breakdown group key. Blank → null.
 */
export function toGroupKey(value: CellValue | undefined): Maybe<string> {
  if (value === null || value === undefined) return null;
  const key = String(value).trim();
  return key === '' ? null : key;
}

// ------------------------------------------------------------
// Headers
// ------------------------------------------------------------

/**
 * Canonical header form used for synonym matching:
 * trimmed, lower-cased, whitespace / underscores / hyphens removed.
 */
export function normalizeHeader(raw: unknown): string {
  return toSafeTrimmedString(raw).toLowerCase().replace(HEADER_NOISE, '');
}

/**
 * Make raw header cells usable as unique column names.
 *  - blank header at position i → "Unnamed: i"
 *  - repeated header → "name.1", "name.2", ...
 *  - a header spelled like the unset marker "(none)" becomes "(none).1"
 */
export function toUniqueHeaders(rawHeaders: readonly unknown[]): string[] {
  const seen = new Map<string, number>();
  const taken = new Set<string>([UNSET]);
  const headers: string[] = [];

  rawHeaders.forEach((raw, index) => {
    const base = toSafeTrimmedString(raw) || `Unnamed: ${index}`;
    let name = base;
    let dup = seen.get(base) ?? 0;

    while (taken.has(name)) {
      dup += 1;
      name = `${base}.${dup}`;
    }

    seen.set(base, dup);
    taken.add(name);
    headers.push(name);
  });

  return headers;
}
