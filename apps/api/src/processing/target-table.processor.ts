import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ProcessingConfig } from '../config/configuration';
import { ConfigurationException } from '../common/exceptions/etl.exceptions';
import {
  placeholders,
  quoteColumns,
  quoteIdentifier,
  quoteTable,
} from '../common/utils/sql-identifier';
import { SchemaIntrospector, TargetSchema } from '../database/schema-introspector.service';
import { Row, SqlValue, STORE, Store, StoreSession } from '../database/store.interface';
import { MappingRepository } from '../mappings/mapping.repository';
import { ColumnMapping, RowError } from '../mappings/mapping.types';
import { PreparedMapping, RowTransformer } from '../transformations/row-transformer.service';
import { BatchResult, ProcessRequest } from './processing.types';

interface SourceQuery {
  sql: string;
  params: SqlValue[];
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs the mapping-driven batch for one target table: read the mapped source
 * columns, transform each row against the live target schema, insert the
 * results one by one.
 *
 * Setup problems (no mappings, missing tables or columns, no connection)
 * fail the call. Problems with individual rows are collected in
 * `failedRows` and the batch goes on. The batch runs in a single
 * transaction that is committed once at the end.
 */
@Injectable()
export class TargetTableProcessor {
  private readonly logger = new Logger(TargetTableProcessor.name);
  private readonly config: ProcessingConfig;

  constructor(
    @Inject(STORE) private readonly store: Store,
    private readonly mappings: MappingRepository,
    private readonly introspector: SchemaIntrospector,
    private readonly transformer: RowTransformer,
    configService: ConfigService,
  ) {
    this.config = configService.get<ProcessingConfig>('processing') ?? {};
  }

  async process(request: ProcessRequest): Promise<BatchResult> {
    const { targetTable } = request;
    this.logger.log(`Processing target table: ${targetTable}`);

    return this.store.withSession(async (session) => {
      const all = await this.mappings.findByTargetTable(session, targetTable);
      if (all.length === 0) {
        throw new ConfigurationException(`No mappings found for target table '${targetTable}'`);
      }

      const sourceTable = this.resolveSourceTable(targetTable, all);
      const sourceColumns = new Set(await this.introspector.getColumnNames(session, sourceTable));

      const retained = all.filter(
        (m) => sourceColumns.has(m.sourceColumn) && m.targetColumn.trim() !== '',
      );
      if (retained.length === 0) {
        throw new ConfigurationException(
          `Missing required source columns in '${sourceTable}'`,
          { sourceTable, missing: all.map((m) => m.sourceColumn) },
        );
      }

      const schema = await this.introspector.getSchema(session, targetTable);
      const query = this.buildSourceQuery(request, sourceTable, retained, sourceColumns);
      const rows = await session.query(query.sql, query.params);
      this.logger.log(`Fetched ${rows.length} rows from ${sourceTable}`);

      const prepared = this.transformer.prepare(retained);
      const result = await session.transaction(() =>
        this.insertRows(session, targetTable, rows, prepared, schema),
      );

      this.logger.log(
        `${result.insertedCount} rows inserted into ${targetTable}, ${result.failedRows.length} failed`,
      );
      return result;
    });
  }

  private resolveSourceTable(targetTable: string, mappings: ColumnMapping[]): string {
    const sourceTables = [...new Set(mappings.map((m) => m.sourceTable))];
    if (sourceTables.length > 1) {
      throw new ConfigurationException(
        `Mappings for target table '${targetTable}' read from more than one source table: ${sourceTables.join(', ')}`,
        { sourceTables },
      );
    }
    return sourceTables[0];
  }

  private buildSourceQuery(
    request: ProcessRequest,
    sourceTable: string,
    mappings: ColumnMapping[],
    sourceColumns: Set<string>,
  ): SourceQuery {
    const projection = [...new Set(mappings.map((m) => m.sourceColumn))];
    let sql = `SELECT ${quoteColumns(projection)} FROM ${quoteTable(sourceTable)}`;
    const params: SqlValue[] = [];

    if (!request.startDate && !request.endDate) {
      return { sql, params };
    }

    const dateColumn = request.dateColumn ?? this.config.dateColumn;
    if (!dateColumn) {
      this.logger.warn('Date window given but no date column is configured; processing all rows');
      return { sql, params };
    }
    if (!sourceColumns.has(dateColumn)) {
      throw new ConfigurationException(
        `Date column '${dateColumn}' does not exist in source table '${sourceTable}'`,
      );
    }

    const column = quoteIdentifier(dateColumn);
    const conditions: string[] = [];
    if (request.startDate) {
      conditions.push(`DATE(${column}) >= ?`);
      params.push(request.startDate);
    }
    if (request.endDate) {
      conditions.push(`DATE(${column}) <= ?`);
      params.push(request.endDate);
    }
    sql += ` WHERE ${conditions.join(' AND ')}`;
    return { sql, params };
  }

  private async insertRows(
    session: StoreSession,
    targetTable: string,
    rows: Row[],
    mappings: PreparedMapping[],
    schema: TargetSchema,
  ): Promise<BatchResult> {
    const table = quoteTable(targetTable);
    const failedRows: RowError[] = [];
    let insertedCount = 0;

    for (const [index, row] of rows.entries()) {
      try {
        const transformed = this.transformer.transform(row, mappings, schema);
        const columns = Object.keys(transformed);
        await session.execute(
          `INSERT INTO ${table} (${quoteColumns(columns)}) VALUES (${placeholders(columns.length)})`,
          columns.map((column) => transformed[column]),
        );
        insertedCount++;
      } catch (error) {
        const message = errorMessage(error);
        this.logger.error(`Error processing row ${index + 1}: ${message}`);
        failedRows.push({ row, error: message });
      }
    }

    return {
      message: `${insertedCount} rows inserted into ${targetTable}`,
      insertedCount,
      failedRows,
    };
  }
}
