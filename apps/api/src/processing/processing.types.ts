import { RowError } from '../mappings/mapping.types';

export interface ProcessRequest {
  targetTable: string;
  /** Inclusive `YYYY-MM-DD` bounds on the date column. */
  startDate?: string;
  endDate?: string;
  /** Source column the window applies to; falls back to configuration. */
  dateColumn?: string;
}

export interface BatchResult {
  message: string;
  insertedCount: number;
  failedRows: RowError[];
}
