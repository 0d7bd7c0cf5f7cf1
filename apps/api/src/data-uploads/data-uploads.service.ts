import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  ConfigurationException,
  TableNotFoundException,
  ValidationException,
} from '../common/exceptions/etl.exceptions';
import { placeholders, quoteColumns, quoteIdentifier, quoteTable } from '../common/utils/sql-identifier';
import { STORE, Store, StoreSession } from '../database/store.interface';
import { RowError } from '../mappings/mapping.types';
import { SpreadsheetReader } from '../spreadsheets/spreadsheet.reader';
import { SheetTable, UploadedFile } from '../spreadsheets/spreadsheet.types';
import { DataUploadFields } from './dto';
import { UploadResult } from './data-uploads.types';

/**
 * Uploads a data sheet into an existing table through a per-upload mapping
 * table of `(source_column_name, target_column_name)` pairs. Rows are
 * upserted, so re-uploading the same keys updates them in place.
 */
@Injectable()
export class DataUploadsService {
  private readonly logger = new Logger(DataUploadsService.name);
  private readonly maxUploadSize: number;

  constructor(
    @Inject(STORE) private readonly store: Store,
    private readonly reader: SpreadsheetReader,
    configService: ConfigService,
  ) {
    this.maxUploadSize = configService.get<number>('maxUploadSize', 104857600);
  }

  async upload(file: UploadedFile, fields: DataUploadFields): Promise<UploadResult> {
    this.reader.assertSupported(file, this.maxUploadSize);
    const sheet = this.reader.read(file.buffer, file.filename);

    return this.store.withSession(async (session) => {
      const columnMap = await this.loadColumnMap(session, fields.mappingTable);

      if (!(await session.tableExists(fields.targetTable))) {
        throw new TableNotFoundException(fields.targetTable);
      }

      const missing = [...columnMap.keys()].filter((source) => !sheet.columns.includes(source));
      if (missing.length > 0) {
        throw new ValidationException(
          `The following columns are missing in the spreadsheet: ${missing.join(', ')}`,
          { missing },
        );
      }

      return session.transaction(() => this.upsertRows(session, sheet, columnMap, fields.targetTable));
    });
  }

  private async loadColumnMap(session: StoreSession, mappingTable: string): Promise<Map<string, string>> {
    const table = quoteTable(mappingTable);
    if (!(await session.tableExists(mappingTable))) {
      throw new ConfigurationException(`Mapping table '${mappingTable}' does not exist`);
    }

    const rows = await session.query(`SELECT source_column_name, target_column_name FROM ${table}`);
    if (rows.length === 0) {
      throw new ConfigurationException(`No mappings found in the table '${mappingTable}'`);
    }

    const columnMap = new Map<string, string>();
    const duplicates = new Set<string>();
    for (const row of rows) {
      const target = String(row.target_column_name);
      if ([...columnMap.values()].includes(target)) duplicates.add(target);
      columnMap.set(String(row.source_column_name), target);
    }
    if (duplicates.size > 0) {
      throw new ConfigurationException(
        `Mapping table '${mappingTable}' maps more than one column to: ${[...duplicates].join(', ')}`,
        { duplicates: [...duplicates] },
      );
    }
    return columnMap;
  }

  private async upsertRows(
    session: StoreSession,
    sheet: SheetTable,
    columnMap: Map<string, string>,
    targetTable: string,
  ): Promise<UploadResult> {
    const sources = [...columnMap.keys()];
    const targets = sources.map((source) => columnMap.get(source) ?? source);
    const updates = targets
      .map((target) => quoteIdentifier(target))
      .map((column) => `${column} = VALUES(${column})`)
      .join(', ');
    const sql = `INSERT INTO ${quoteTable(targetTable)} (${quoteColumns(targets)})
      VALUES (${placeholders(targets.length)})
      ON DUPLICATE KEY UPDATE ${updates}`;

    const failedRows: RowError[] = [];
    let insertedCount = 0;
    let updatedCount = 0;

    for (const [index, row] of sheet.rows.entries()) {
      try {
        const result = await session.execute(
          sql,
          sources.map((source) => row[source] ?? null),
        );
        // MySQL reports 1 for a new row, 2 for an updated one, 0 when unchanged
        if (result.affectedRows === 1) insertedCount++;
        else if (result.affectedRows === 2) updatedCount++;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error(`Error uploading row ${index + 1} into ${targetTable}: ${message}`);
        failedRows.push({ row, error: message });
      }
    }

    this.logger.log(
      `Upload into ${targetTable}: ${insertedCount} inserted, ${updatedCount} updated, ${failedRows.length} failed`,
    );
    return {
      message: `${insertedCount} new rows successfully uploaded to table '${targetTable}'`,
      insertedCount,
      updatedCount,
      failedRows,
    };
  }
}
