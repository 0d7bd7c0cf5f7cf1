import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import * as XLSX from 'xlsx';
import { CellValue, SheetRow, SheetTable, UploadedFile } from './spreadsheet.types';

// ─── File type constants ─────────────────────────────────────────────────────

const ALLOWED_EXTENSIONS = new Set(['.csv', '.xlsx', '.xls']);
const ALLOWED_MIME_TYPES = new Set([
  'text/csv',
  'application/csv',
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  'application/vnd.ms-excel',
  'application/octet-stream', // Generic binary, allowed by extension check
]);

const CSV_DELIMITERS = [',', ';', '\t', '|'];

export function getExtension(filename: string): string {
  const match = /\.([^.]+)$/.exec(filename);
  return match ? `.${match[1].toLowerCase()}` : '';
}

function toCell(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (value instanceof Date) return formatDateCell(value);
  return String(value);
}

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

/**
 * Date cells as `YYYY-MM-DD`, or `YYYY-MM-DD HH:MM:SS` when they carry a time.
 * The workbook parser builds dates in local time, so local fields are read
 * back; sub-second drift from the serial conversion is rounded away.
 */
export function formatDateCell(value: Date): string {
  const d = new Date(Math.round(value.getTime() / 1000) * 1000);
  const date = `${pad(d.getFullYear(), 4)}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
  if (d.getHours() === 0 && d.getMinutes() === 0 && d.getSeconds() === 0) {
    return date;
  }
  return `${date} ${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

@Injectable()
export class SpreadsheetReader {
  private readonly logger = new Logger(SpreadsheetReader.name);

  /**
   * Reject anything that is not a CSV or Excel workbook before parsing.
   */
  assertSupported(file: UploadedFile, maxBytes: number): void {
    const ext = getExtension(file.filename);
    if (!ALLOWED_EXTENSIONS.has(ext)) {
      throw new BadRequestException(
        `Invalid file format '${ext || file.filename}'. Please upload an Excel (.xls, .xlsx) or CSV file`,
      );
    }

    // Extension is the primary guard
    if (!ALLOWED_MIME_TYPES.has(file.mimetype)) {
      this.logger.warn(`Unexpected MIME type '${file.mimetype}' for file '${file.filename}'`);
    }

    if (file.buffer.length > maxBytes) {
      throw new BadRequestException(
        `File too large: ${file.buffer.length} bytes. Max allowed: ${maxBytes} bytes`,
      );
    }
  }

  /**
   * Parse the first sheet of a workbook (or a CSV file) into named columns.
   * The first row is the header; fully blank rows are skipped.
   */
  read(buffer: Buffer, filename: string): SheetTable {
    const workbook = getExtension(filename) === '.csv'
      ? this.readCsvWorkbook(buffer)
      : XLSX.read(buffer, { type: 'buffer', cellDates: true });

    const sheetName = workbook.SheetNames[0];
    const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
    if (!sheetName || !sheet) {
      throw new BadRequestException(`File '${filename}' contains no sheets`);
    }

    const matrix: unknown[][] = XLSX.utils.sheet_to_json(sheet, { header: 1, defval: null });
    const [headerCells = [], ...dataRows] = matrix;

    const columns = headerCells.map((cell, idx) => {
      const name = cell != null ? String(cell).trim() : '';
      return name !== '' ? name : `col_${idx}`;
    });

    const rows: SheetRow[] = [];
    for (const cells of dataRows) {
      if (cells.every((cell) => cell === null || cell === '')) {
        continue;
      }
      const row: SheetRow = {};
      columns.forEach((column, idx) => {
        row[column] = toCell(cells[idx]);
      });
      rows.push(row);
    }

    this.logger.log(`Read ${rows.length} rows with columns: ${columns.join(', ')}`);
    return { sheetName, columns, rows };
  }

  private readCsvWorkbook(buffer: Buffer): XLSX.WorkBook {
    const text = buffer.toString('utf8').replace(/^\ufeff/, ''); // strip BOM
    // raw: keep every CSV cell as text so date-looking values are not reinterpreted
    return XLSX.read(text, { type: 'string', FS: this.detectDelimiter(text), raw: true });
  }

  /**
   * Try each candidate delimiter and choose the one yielding the most
   * consistent column count across the first lines.
   */
  private detectDelimiter(text: string): string {
    const lines = text.split('\n').slice(0, 20).filter((l) => l.trim().length > 0);
    if (lines.length === 0) return ',';

    let bestDelimiter = ',';
    let bestScore = Infinity;

    for (const delim of CSV_DELIMITERS) {
      const counts = lines.map((line) => line.split(delim).length);
      const mean = counts.reduce((a, b) => a + b, 0) / counts.length;
      const variance = counts.reduce((sum, c) => sum + Math.pow(c - mean, 2), 0) / counts.length;
      const score = variance / Math.max(1, mean);

      if (score < bestScore && mean > 1) {
        bestScore = score;
        bestDelimiter = delim;
      }
    }

    return bestDelimiter;
  }
}
