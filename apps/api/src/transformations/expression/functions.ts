import { EXPRESSION_LIMITS, ExprValue, TransformationError } from './expression.types';

export interface ExprFunction {
  minArgs: number;
  maxArgs: number;
  call: (args: ExprValue[]) => ExprValue;
}

export function toText(value: ExprValue): string {
  if (value === null) return '';
  return String(value);
}

export function toNumber(value: ExprValue, context: string): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value.trim());
    if (Number.isFinite(n)) return n;
  }
  throw new TransformationError(`${context}: ${JSON.stringify(value)} is not a number`);
}

function toInteger(value: ExprValue, context: string): number {
  const n = toNumber(value, context);
  if (!Number.isInteger(n)) {
    throw new TransformationError(`${context}: ${n} is not an integer`);
  }
  return n;
}

function fixed(minArgs: number, maxArgs: number, call: ExprFunction['call']): ExprFunction {
  return { minArgs, maxArgs, call };
}

const text = (fn: (s: string) => ExprValue): ExprFunction => fixed(1, 1, ([s]) => fn(toText(s)));

/**
 * The complete set of callable names. Nothing outside this map is reachable
 * from an expression.
 */
export const FUNCTIONS: ReadonlyMap<string, ExprFunction> = new Map<string, ExprFunction>([
  // ── Strings ──────────────────────────────────────────────────────────────
  ['upper', text((s) => s.toUpperCase())],
  ['lower', text((s) => s.toLowerCase())],
  ['trim', text((s) => s.trim())],
  ['ltrim', text((s) => s.trimStart())],
  ['rtrim', text((s) => s.trimEnd())],
  ['length', text((s) => s.length)],
  ['len', text((s) => s.length)],
  [
    'substr',
    fixed(2, 3, ([s, start, len]) => {
      const str = toText(s);
      const from = toInteger(start, 'substr');
      const begin = from < 0 ? Math.max(0, str.length + from) : from;
      if (len === undefined || len === null) return str.slice(begin);
      const count = toInteger(len, 'substr');
      return count <= 0 ? '' : str.slice(begin, begin + count);
    }),
  ],
  ['left', fixed(2, 2, ([s, n]) => toText(s).slice(0, Math.max(0, toInteger(n, 'left'))))],
  [
    'right',
    fixed(2, 2, ([s, n]) => {
      const count = toInteger(n, 'right');
      return count <= 0 ? '' : toText(s).slice(-count);
    }),
  ],
  [
    'replace',
    fixed(3, 3, ([s, search, replacement]) => {
      const find = toText(search);
      if (find === '') return toText(s);
      const parts = toText(s).split(find);
      const insert = toText(replacement);
      const size = parts.reduce((sum, part) => sum + part.length, 0) + (parts.length - 1) * insert.length;
      if (size > EXPRESSION_LIMITS.maxStringLength) {
        throw new TransformationError(
          `replace: result of ${size} characters exceeds ${EXPRESSION_LIMITS.maxStringLength}`,
        );
      }
      return parts.join(insert);
    }),
  ],
  [
    'split_part',
    fixed(3, 3, ([s, delimiter, index]) => {
      const delim = toText(delimiter);
      if (delim === '') {
        throw new TransformationError('split_part: delimiter must not be empty');
      }
      return toText(s).split(delim)[toInteger(index, 'split_part')] ?? '';
    }),
  ],
  [
    'pad_left',
    fixed(2, 3, ([s, width, fill]) => {
      const size = toInteger(width, 'pad_left');
      if (size > EXPRESSION_LIMITS.maxStringLength) {
        throw new TransformationError(`pad_left: width ${size} is too large`);
      }
      const padChar = fill === undefined ? ' ' : toText(fill);
      if (padChar.length !== 1) {
        throw new TransformationError('pad_left: fill must be a single character');
      }
      return toText(s).padStart(size, padChar);
    }),
  ],
  ['concat', fixed(1, 32, (args) => args.map(toText).join(''))],
  ['contains', fixed(2, 2, ([s, sub]) => toText(s).includes(toText(sub)))],
  ['starts_with', fixed(2, 2, ([s, prefix]) => toText(s).startsWith(toText(prefix)))],
  ['ends_with', fixed(2, 2, ([s, suffix]) => toText(s).endsWith(toText(suffix)))],

  // ── Null handling ────────────────────────────────────────────────────────
  ['coalesce', fixed(1, 32, (args) => args.find((v) => v !== null && v !== '') ?? null)],
  ['is_empty', fixed(1, 1, ([v]) => v === null || v === '' || v === undefined)],

  // ── Numbers ──────────────────────────────────────────────────────────────
  ['int', fixed(1, 1, ([v]) => Math.trunc(toNumber(v, 'int')))],
  ['float', fixed(1, 1, ([v]) => toNumber(v, 'float'))],
  ['str', fixed(1, 1, ([v]) => toText(v))],
  [
    'round',
    fixed(1, 2, ([v, digits]) => {
      const places = digits === undefined ? 0 : toInteger(digits, 'round');
      if (places < 0 || places > 10) {
        throw new TransformationError('round: digits must be between 0 and 10');
      }
      const factor = 10 ** places;
      return Math.round(toNumber(v, 'round') * factor) / factor;
    }),
  ],
  ['abs', fixed(1, 1, ([v]) => Math.abs(toNumber(v, 'abs')))],
  ['min', fixed(1, 32, (args) => Math.min(...args.map((v) => toNumber(v, 'min'))))],
  ['max', fixed(1, 32, (args) => Math.max(...args.map((v) => toNumber(v, 'max'))))],
]);

/** `if(test, then, else)` is evaluated lazily by the evaluator, not through FUNCTIONS. */
export const CONDITIONAL_FUNCTION = 'if';
