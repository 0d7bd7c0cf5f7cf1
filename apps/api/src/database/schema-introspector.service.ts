import { Injectable } from '@nestjs/common';
import { ColumnDescription, StoreSession } from './store.interface';

export type ColumnCategory =
  | 'text'
  | 'integer'
  | 'decimal'
  | 'date'
  | 'timestamp'
  | 'auto_increment';

export interface TargetColumn {
  name: string;
  declaredType: string;
  category: ColumnCategory;
}

/** Ordered column list of a live table. Re-read on every run, never cached. */
export type TargetSchema = TargetColumn[];

const INTEGER_TYPE_RE = /^(tinyint|smallint|mediumint|int|integer|bigint|year)\b/;
const DECIMAL_TYPE_RE = /^(decimal|numeric|float|double|real)\b/;

export function classifyColumn(column: ColumnDescription): ColumnCategory {
  const type = column.declaredType.toLowerCase();

  if (column.isAutoIncrement) return 'auto_increment';
  if (INTEGER_TYPE_RE.test(type)) return 'integer';
  if (DECIMAL_TYPE_RE.test(type)) return 'decimal';
  if (type.includes('date')) return 'date';
  if (type.startsWith('timestamp')) return 'timestamp';
  return 'text';
}

@Injectable()
export class SchemaIntrospector {
  async getSchema(session: StoreSession, table: string): Promise<TargetSchema> {
    const columns = await session.describe(table);
    return columns.map((column) => ({
      name: column.name,
      declaredType: column.declaredType,
      category: classifyColumn(column),
    }));
  }

  async getColumnNames(session: StoreSession, table: string): Promise<string[]> {
    const columns = await session.describe(table);
    return columns.map((column) => column.name);
  }
}
