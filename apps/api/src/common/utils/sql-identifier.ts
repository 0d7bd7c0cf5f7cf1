import { InvalidIdentifierException } from '../exceptions/etl.exceptions';

// MySQL caps identifiers at 64 characters
const IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_]{0,63}$/;

export function isValidIdentifier(identifier: string): boolean {
  return IDENTIFIER_RE.test(identifier);
}

/**
 * Validate a table or column name against the allow-list pattern and return it
 * back-tick quoted, ready to be interpolated into a statement.
 */
export function quoteIdentifier(identifier: string, kind: 'table' | 'column' = 'column'): string {
  if (!isValidIdentifier(identifier)) {
    throw new InvalidIdentifierException(identifier, kind);
  }
  return `\`${identifier}\``;
}

export function quoteTable(table: string): string {
  return quoteIdentifier(table, 'table');
}

export function quoteColumns(columns: string[]): string {
  return columns.map((c) => quoteIdentifier(c, 'column')).join(', ');
}

export function placeholders(count: number): string {
  return Array.from({ length: count }, () => '?').join(', ');
}
