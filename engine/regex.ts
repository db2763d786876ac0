// engine/regex.ts
// Centralized regular expressions for the Diagnosis Engine

// ------------------------------------------------------------
// Numeric cells
// ------------------------------------------------------------

// Plain decimal literal: 12, -3.5, .25, 1e3, +4.
// Thousands separators and currency symbols are NOT accepted.
export const NUMERIC_LITERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

// ------------------------------------------------------------
// Date cells
// ------------------------------------------------------------

// Year-first date with one separator used twice (2024-01-10, 2024/1/10,
// 2024.01.10), optional time (T or space) and optional UTC offset.
//   1: year  2: separator  3: month  4: day
//   5: hour  6: minute  7: second  8: fraction  9: offset
export const DATE_YEAR_FIRST =
  /^(\d{4})([-/.])(\d{1,2})\2(\d{1,2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;

// Month-first numeric date (01/10/2024, 1-10-2024), same optional time and
// offset as above.
//   1: month  2: separator  3: day  4: year
//   5: hour  6: minute  7: second  8: fraction  9: offset
export const DATE_MONTH_FIRST =
  /^(\d{1,2})([-/])(\d{1,2})\2(\d{4})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;

// Month name then day: "Jan 10, 2024", "January 10 2024", "Sep. 3, 2024"
//   1: month name  2: day  3: year
export const DATE_MONTH_NAME_FIRST = /^([a-z]{3,9})\.?\s+(\d{1,2}),?\s+(\d{4})$/i;

// Day then month name: "10 Jan 2024", "10 January, 2024"
//   1: day  2: month name  3: year
export const DATE_DAY_MONTH_NAME = /^(\d{1,2})\s+([a-z]{3,9})\.?,?\s+(\d{4})$/i;

// Offset part: +09:00, -0530
export const UTC_OFFSET = /^([+-])(\d{2}):?(\d{2})$/;

// ------------------------------------------------------------
// Header normalisation
// ------------------------------------------------------------

// Whitespace, underscores and hyphens are ignored when matching headers.
export const HEADER_NOISE = /[\s_-]+/g;
