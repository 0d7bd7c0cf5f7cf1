/**
 * Type coercion for values headed into a live target column.
 *
 * The category comes from the introspected target schema. Anything that
 * cannot be represented in the column throws `CoercionError`; the row
 * transformer turns that into a failure for the whole row.
 */

import { TargetColumn } from '../database/schema-introspector.service';

export type CoercedValue = string | number | null;

export class CoercionError extends Error {
  constructor(
    readonly column: string,
    readonly value: unknown,
    message: string,
  ) {
    super(message);
    this.name = 'CoercionError';
  }
}

// ─── Excel Serial Date Epoch ───────────────────────────────────────────────
// Excel serial 1 = 1900-01-01 (with the 1900 leap-year bug); 25569 is
// 1970-01-01.
const EXCEL_EPOCH_OFFSET_DAYS = 25569;
const MS_PER_DAY = 86_400_000;
const EXCEL_SERIAL_MIN = 1;
const EXCEL_SERIAL_MAX = 2_958_465;

const DMY_RE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;
const ISO_RE = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(?:Z)?)?$/;
const INTEGER_TEXT_RE = /^[+-]?\d+$/;
const NUMERIC_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

interface DateParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

// ─── Helpers ──────────────────────────────────────────────────────────────

/**
 * Null, undefined, NaN, the empty string and the literal `nan` are all
 * "no value" for non-text columns.
 */
export function isAbsent(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'number') return Number.isNaN(value);
  if (typeof value === 'string') {
    const s = value.trim();
    return s === '' || s.toLowerCase() === 'nan';
  }
  return false;
}

/**
 * Strips thousand separators, currency symbols and whitespace; `(123)` → `-123`.
 */
function normaliseNumericString(raw: string): string {
  let s = raw.trim();
  const parenMatch = /^\(\s*([0-9.,]+)\s*\)$/.exec(s);
  if (parenMatch) {
    s = `-${parenMatch[1]}`;
  }
  return s.replace(/[$€£]/g, '').replace(/,/g, '').trim();
}

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

function isRealDate({ year, month, day, hour, minute, second }: DateParts): boolean {
  const d = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  return (
    d.getUTCFullYear() === year &&
    d.getUTCMonth() === month - 1 &&
    d.getUTCDate() === day &&
    d.getUTCHours() === hour &&
    d.getUTCMinutes() === minute &&
    d.getUTCSeconds() === second
  );
}

function fromExcelSerial(serial: number): DateParts | null {
  if (serial < EXCEL_SERIAL_MIN || serial > EXCEL_SERIAL_MAX) {
    return null;
  }
  const d = new Date(Math.round((serial - EXCEL_EPOCH_OFFSET_DAYS) * MS_PER_DAY));
  if (isNaN(d.getTime())) return null;
  return {
    year: d.getUTCFullYear(),
    month: d.getUTCMonth() + 1,
    day: d.getUTCDate(),
    hour: d.getUTCHours(),
    minute: d.getUTCMinutes(),
    second: d.getUTCSeconds(),
  };
}

/**
 * `DD/MM/YYYY` first, then `YYYY-MM-DD`, each with an optional time of day.
 */
function parseDateText(text: string): DateParts | null {
  const dmy = DMY_RE.exec(text);
  if (dmy) {
    const parts: DateParts = {
      day: Number(dmy[1]),
      month: Number(dmy[2]),
      year: Number(dmy[3]),
      hour: Number(dmy[4] ?? 0),
      minute: Number(dmy[5] ?? 0),
      second: Number(dmy[6] ?? 0),
    };
    if (isRealDate(parts)) return parts;
  }

  const iso = ISO_RE.exec(text);
  if (iso) {
    const parts: DateParts = {
      year: Number(iso[1]),
      month: Number(iso[2]),
      day: Number(iso[3]),
      hour: Number(iso[4] ?? 0),
      minute: Number(iso[5] ?? 0),
      second: Number(iso[6] ?? 0),
    };
    if (isRealDate(parts)) return parts;
  }

  return null;
}

function toDateParts(value: unknown, column: string): DateParts {
  const parts = typeof value === 'number'
    ? fromExcelSerial(value)
    : parseDateText(String(value).trim());
  if (!parts) {
    throw new CoercionError(column, value, `Invalid date format for column '${column}': ${String(value)}`);
  }
  return parts;
}

function toNumeric(value: unknown, column: string, kind: 'integer' | 'decimal'): number {
  let n: number;
  if (typeof value === 'number') {
    n = value;
  } else if (typeof value === 'boolean') {
    n = value ? 1 : 0;
  } else {
    const s = normaliseNumericString(String(value));
    n = NUMERIC_RE.test(s) ? Number(s) : NaN;
  }

  if (!Number.isFinite(n) || (kind === 'integer' && !Number.isInteger(n))) {
    throw new CoercionError(column, value, `Invalid ${kind} value for column '${column}': ${String(value)}`);
  }
  return n;
}

// ─── Public API ───────────────────────────────────────────────────────────

/** `YYYY-MM-DD`, or null when absent. */
export function coerceDate(value: unknown, column = 'value'): string | null {
  if (isAbsent(value)) return null;
  const { year, month, day } = toDateParts(value, column);
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

/** `YYYY-MM-DD HH:MM:SS`, or null when absent. */
export function coerceTimestamp(value: unknown, column = 'value'): string | null {
  if (isAbsent(value)) return null;
  const { year, month, day, hour, minute, second } = toDateParts(value, column);
  return `${pad(year, 4)}-${pad(month)}-${pad(day)} ${pad(hour)}:${pad(minute)}:${pad(second)}`;
}

/**
 * Integer text beyond `Number.MAX_SAFE_INTEGER` is returned as its digit
 * string so BIGINT values bind exactly.
 */
export function coerceInteger(value: unknown, column = 'value'): number | string | null {
  if (isAbsent(value)) return null;
  if (typeof value === 'string') {
    const digits = normaliseNumericString(value);
    if (INTEGER_TEXT_RE.test(digits) && !Number.isSafeInteger(Number(digits))) {
      return digits.replace(/^\+/, '');
    }
  }
  return toNumeric(value, column, 'integer');
}

export function coerceDecimal(value: unknown, column = 'value'): number | null {
  if (isAbsent(value)) return null;
  return toNumeric(value, column, 'decimal');
}

/**
 * Date-like: a date-typed column, or a text column whose name mentions "date".
 * Numeric columns keep their numeric coercion whatever they are called.
 */
export function isDateLike(column: TargetColumn): boolean {
  return (
    column.category === 'date' ||
    (column.category === 'text' && column.name.toLowerCase().includes('date'))
  );
}

/**
 * Converts a value to what the target column accepts.
 *
 * @throws CoercionError when the value cannot be represented.
 */
export function coerceValue(value: unknown, column: TargetColumn): CoercedValue {
  if (isDateLike(column)) {
    return coerceDate(value, column.name);
  }

  switch (column.category) {
    case 'timestamp':
      return coerceTimestamp(value, column.name);
    case 'integer':
    case 'auto_increment':
      return coerceInteger(value, column.name);
    case 'decimal':
      return coerceDecimal(value, column.name);
    default:
      if (value === null || value === undefined) return null;
      if (typeof value === 'number' && Number.isNaN(value)) return null;
      return typeof value === 'number' ? value : String(value);
  }
}
