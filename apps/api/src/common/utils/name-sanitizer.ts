/**
 * Normalises a free-text column label into a lower-case identifier.
 *
 * Every character outside `[A-Za-z0-9]` becomes `_`, a leading digit gets a
 * `col_` prefix. Pure and idempotent; distinct labels may collide
 * (`"a b"` and `"a-b"` both give `a_b`) and that is left to the caller.
 */
export function sanitizeColumnName(name: unknown): string {
  const sanitized = String(name ?? '').replace(/[^a-zA-Z0-9]/g, '_');
  const prefixed = /^[0-9]/.test(sanitized) ? `col_${sanitized}` : sanitized;
  return prefixed.toLowerCase();
}

/**
 * Derive a table name from an uploaded file name: extension stripped, then sanitized.
 */
export function tableNameFromFileName(fileName: string): string {
  const base = fileName.replace(/^.*[\\/]/, '').replace(/\.[^.]+$/, '');
  return sanitizeColumnName(base.trim());
}
