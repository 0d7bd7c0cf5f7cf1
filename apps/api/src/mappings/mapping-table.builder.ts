import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MappingConfig } from '../config/configuration';
import { ValidationException } from '../common/exceptions/etl.exceptions';
import { sanitizeColumnName } from '../common/utils/name-sanitizer';
import {
  isValidIdentifier,
  placeholders,
  quoteColumns,
  quoteIdentifier,
  quoteTable,
} from '../common/utils/sql-identifier';
import { SchemaIntrospector } from '../database/schema-introspector.service';
import { SqlValue, StoreSession } from '../database/store.interface';
import { CellValue, SheetTable } from '../spreadsheets/spreadsheet.types';
import { MappingTableResult, RowError } from './mapping.types';

/**
 * How one sheet header lands in the table. `"phone, mobile, contact"` reads
 * the `phone` cell and writes it to `phone`, `mobile` and `contact`.
 */
export interface HeaderPlan {
  header: string;
  columns: string[];
}

export interface TablePlan {
  headers: HeaderPlan[];
  /** Headers that produce no usable column. */
  rejected: string[];
  columnDefinitions: string[];
}

export function parseHeader(header: string): string[] {
  return header
    .split(',')
    .map((token) => token.trim())
    .filter((token) => token !== '')
    .map(sanitizeColumnName);
}

/**
 * Derive the staging table layout from the sheet headers.
 *
 * Columns that sanitize to nothing, to an invalid identifier or to a name
 * already taken are skipped and their header is reported as rejected.
 */
export function planTable(columns: string[], config: MappingConfig): TablePlan {
  const seen = new Set<string>();
  const headers: HeaderPlan[] = [];
  const rejected: string[] = [];

  for (const header of columns) {
    const names = parseHeader(header).filter((name) => {
      if (!isValidIdentifier(name) || seen.has(name)) return false;
      seen.add(name);
      return true;
    });
    if (names.length === 0) {
      rejected.push(header);
      continue;
    }
    headers.push({ header, columns: names });
  }

  const derived = headers.flatMap((plan) => plan.columns);
  const columnDefinitions: string[] = [];

  if (!seen.has(config.primaryKey)) {
    columnDefinitions.push(`${quoteIdentifier(config.primaryKey)} INT AUTO_INCREMENT PRIMARY KEY`);
  }
  for (const name of derived) {
    if (name === config.primaryKey) {
      columnDefinitions.push(`${quoteIdentifier(name)} INT AUTO_INCREMENT PRIMARY KEY`);
    } else if (name === config.requiredColumn) {
      columnDefinitions.push(`${quoteIdentifier(name)} INT NOT NULL`);
    } else {
      columnDefinitions.push(`${quoteIdentifier(name)} VARCHAR(255)`);
    }
  }
  columnDefinitions.push(
    '`created_at` TIMESTAMP DEFAULT CURRENT_TIMESTAMP',
    '`updated_at` TIMESTAMP DEFAULT CURRENT_TIMESTAMP ON UPDATE CURRENT_TIMESTAMP',
  );

  return { headers, rejected, columnDefinitions };
}

function hasValue(cell: CellValue | undefined): cell is Exclude<CellValue, null> {
  return cell !== null && cell !== undefined && !(typeof cell === 'string' && cell.trim() === '');
}

@Injectable()
export class MappingTableBuilder {
  private readonly logger = new Logger(MappingTableBuilder.name);
  private readonly config: MappingConfig;

  constructor(
    configService: ConfigService,
    private readonly introspector: SchemaIntrospector,
  ) {
    this.config = configService.getOrThrow<MappingConfig>('mapping');
  }

  /**
   * Create `tableName` from the sheet layout if it does not exist yet, then
   * load every sheet row into it. Failed rows are collected, the load goes on.
   */
  async build(session: StoreSession, sheet: SheetTable, tableName: string): Promise<MappingTableResult> {
    const table = quoteTable(tableName);
    const plan = planTable(sheet.columns, this.config);

    const required = plan.headers.find((h) => h.columns[0] === this.config.requiredColumn);
    if (!required) {
      throw new ValidationException(
        `Spreadsheet must contain '${this.config.requiredColumn}' column`,
        { columns: sheet.columns },
      );
    }

    await session.execute(`CREATE TABLE IF NOT EXISTS ${table} (${plan.columnDefinitions.join(', ')})`);
    this.logger.log(`Table ${tableName} ready`);

    // A pre-existing table may have a different shape
    const live = new Set(await this.introspector.getColumnNames(session, tableName));
    const unmappedColumns = [...plan.rejected];
    const headers: HeaderPlan[] = [];
    for (const candidate of plan.headers) {
      const columns = candidate.columns.filter((c) => live.has(c));
      if (columns.length === 0) {
        unmappedColumns.push(candidate.header);
      } else {
        headers.push({ header: candidate.header, columns });
      }
    }

    const failedRows: RowError[] = [];
    let rowsLoaded = 0;

    await session.transaction(async () => {
      for (const [index, row] of sheet.rows.entries()) {
        const columns: string[] = [];
        const values: SqlValue[] = [];
        for (const { header, columns: targets } of headers) {
          const cell = row[header];
          if (!hasValue(cell)) continue;
          for (const target of targets) {
            columns.push(target);
            values.push(cell);
          }
        }

        if (columns.length === 0) {
          failedRows.push({ row, error: 'Row has no values for any mapped column' });
          continue;
        }

        try {
          await session.execute(
            `INSERT INTO ${table} (${quoteColumns(columns)}) VALUES (${placeholders(columns.length)})`,
            values,
          );
          rowsLoaded++;
          if (rowsLoaded % 100 === 0) {
            this.logger.log(`Processed ${rowsLoaded} rows`);
          }
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          this.logger.error(`Error inserting row ${index + 1} into ${tableName}: ${message}`);
          failedRows.push({ row, error: message });
        }
      }
    });

    this.logger.log(
      `Loaded ${rowsLoaded} of ${sheet.rows.length} rows into ${tableName} (${failedRows.length} failed)`,
    );
    return { tableName, rowsLoaded, unmappedColumns, failedRows };
  }
}
