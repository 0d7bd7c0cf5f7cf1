import { RowError } from '../mappings/mapping.types';

export interface UploadResult {
  message: string;
  insertedCount: number;
  updatedCount: number;
  failedRows: RowError[];
}
