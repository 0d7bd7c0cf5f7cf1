/**
 * One declared source → target column mapping, as stored in `mapping_table`.
 */
export interface ColumnMapping {
  id?: number;
  sourceTable: string;
  sourceColumn: string;
  targetTable: string;
  targetColumn: string;
  /** Expression evaluated with `source` bound to the raw value as text. */
  transformationLogic: string | null;
}

/** A row that could not be transformed or written, with the reason. */
export interface RowError {
  row: Record<string, unknown>;
  error: string;
}

export interface MappingTableResult {
  tableName: string;
  rowsLoaded: number;
  unmappedColumns: string[];
  failedRows: RowError[];
}

export interface MappingTableSummary {
  name: string;
  columns: string[];
}

export interface TableRows {
  tableName: string;
  columns: string[];
  data: Record<string, unknown>[];
  totalRows: number;
}
