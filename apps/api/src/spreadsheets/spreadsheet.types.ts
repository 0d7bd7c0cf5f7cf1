/** A raw cell: numbers stay numbers, text stays text, blanks are null. */
export type CellValue = string | number | boolean | null;

export type SheetRow = Record<string, CellValue>;

/**
 * Parsed sheet with named columns, header order preserved.
 */
export interface SheetTable {
  sheetName: string;
  columns: string[];
  rows: SheetRow[];
}

export interface UploadedFile {
  buffer: Buffer;
  filename: string;
  mimetype: string;
}
