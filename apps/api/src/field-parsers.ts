/**
 * Value parsers used when cleaning extracted fields.
 *
 * A parse either succeeds (`Parsed`) or keeps the raw text (`Unparsed`).
 * Nothing here falls back to a default value: degrading an unparsed field
 * to `0` or to a truncated string happens only when a field set is
 * serialized for storage (see `serializeField` in extraction.ts).
 */

export type Parsed<T> = { readonly parsed: true; readonly value: T };
export type Unparsed = { readonly parsed: false; readonly raw: string };
export type FieldOutcome<T> = Parsed<T> | Unparsed;

export function parsed<T>(value: T): Parsed<T> {
  return { parsed: true, value };
}

export function unparsed(raw: string): Unparsed {
  return { parsed: false, raw };
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

const PLAIN_NUMBER_RE = /^\d+(?:\.\d+)?$/;

/** Accepts Indian digit grouping ("1,20,000") and surrounding whitespace. */
export function parseNumber(raw: string): FieldOutcome<number> {
  const compact = raw.replace(/[,\s]/g, "");
  if (!PLAIN_NUMBER_RE.test(compact)) return unparsed(raw);
  const value = Number(compact);
  return Number.isFinite(value) ? parsed(value) : unparsed(raw);
}

// Two-digit years at or above the pivot belong to the 1900s.
export const TWO_DIGIT_YEAR_PIVOT = 70;

const YMD_RE = /^(\d{4})[-/](\d{2})[-/](\d{2})/;
const DMY_RE = /^(\d{2})[-/](\d{2})[-/](\d{4})/;
const DMYY_RE = /^(\d{2})[-/](\d{2})[-/](\d{2})(?!\d)/;

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

function isoDate(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12 || day < 1) return null;
  const candidate = new Date(Date.UTC(year, month - 1, day));
  if (candidate.getUTCMonth() !== month - 1 || candidate.getUTCDate() !== day) return null;
  return `${String(year).padStart(4, "0")}-${pad2(month)}-${pad2(day)}`;
}

export function expandTwoDigitYear(twoDigitYear: number): number {
  return twoDigitYear >= TWO_DIGIT_YEAR_PIVOT ? 1900 + twoDigitYear : 2000 + twoDigitYear;
}

/**
 * Normalizes `YYYY-MM-DD`, `YYYY/MM/DD`, `DD-MM-YYYY`, `DD/MM/YYYY` and
 * `DD-MM-YY` to `YYYY-MM-DD`. Calendar-invalid dates stay unparsed.
 */
export function normalizeDate(raw: string): FieldOutcome<string> {
  const text = raw.trim();

  const ymd = YMD_RE.exec(text);
  if (ymd) {
    const value = isoDate(Number(ymd[1]), Number(ymd[2]), Number(ymd[3]));
    return value ? parsed(value) : unparsed(raw);
  }

  const dmy = DMY_RE.exec(text);
  if (dmy) {
    const value = isoDate(Number(dmy[3]), Number(dmy[2]), Number(dmy[1]));
    return value ? parsed(value) : unparsed(raw);
  }

  const dmyy = DMYY_RE.exec(text);
  if (dmyy) {
    const year = expandTwoDigitYear(Number(dmyy[3]));
    const value = isoDate(year, Number(dmyy[2]), Number(dmyy[1]));
    return value ? parsed(value) : unparsed(raw);
  }

  return unparsed(raw);
}

export function cleanString(raw: string, maxLength: number): string {
  return raw.replace(/\s+/g, " ").trim().slice(0, maxLength);
}

export function cleanDigits(raw: string, maxDigits?: number): string {
  const digits = raw.replace(/\D/g, "");
  return maxDigits === undefined ? digits : digits.slice(0, maxDigits);
}

export function cleanUpperAlnum(raw: string, maxLength: number): string {
  return raw.toUpperCase().replace(/[^A-Z0-9]/g, "").slice(0, maxLength);
}

/** Completed years between an ISO date of birth and `asOf`; null when not a date. */
export function ageOn(dateOfBirth: string, asOf: Date): number | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(dateOfBirth);
  if (!match) return null;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (isoDate(year, month, day) === null) return null;

  let age = asOf.getUTCFullYear() - year;
  const beforeBirthday =
    asOf.getUTCMonth() + 1 < month ||
    (asOf.getUTCMonth() + 1 === month && asOf.getUTCDate() < day);
  if (beforeBirthday) age -= 1;
  return age >= 0 ? age : null;
}
