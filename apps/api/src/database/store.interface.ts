/**
 * Data-store collaborator used by every ETL component.
 *
 * Components never hold a connection themselves: they run their work inside
 * `Store.withSession()`, which acquires one pooled connection and releases it
 * on every exit path.
 */

export const STORE = Symbol('STORE');

export type SqlValue = string | number | boolean | null;

/** One result row, keys in column order. */
export type Row = Record<string, unknown>;

export interface ColumnDescription {
  name: string;
  /** Declared type as reported by the store, e.g. `varchar(255)`, `int`. */
  declaredType: string;
  isNullable: boolean;
  isPrimaryKey: boolean;
  isAutoIncrement: boolean;
}

export interface ExecuteResult {
  affectedRows: number;
  insertId: number;
}

export interface StoreSession {
  /** Column list of a table; `TableNotFoundException` when it does not exist. */
  describe(table: string): Promise<ColumnDescription[]>;
  tableExists(table: string): Promise<boolean>;
  query(sql: string, params?: SqlValue[]): Promise<Row[]>;
  execute(sql: string, params?: SqlValue[]): Promise<ExecuteResult>;
  /** Begin, run `work`, commit; roll back and rethrow when `work` throws. */
  transaction<T>(work: () => Promise<T>): Promise<T>;
}

export interface Store {
  withSession<T>(work: (session: StoreSession) => Promise<T>): Promise<T>;
  ping(): Promise<void>;
}
