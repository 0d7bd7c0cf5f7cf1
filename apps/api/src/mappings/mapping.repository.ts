import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MappingConfig } from '../config/configuration';
import { Row, SqlValue, StoreSession } from '../database/store.interface';
import { placeholders, quoteColumns, quoteTable } from '../common/utils/sql-identifier';
import { ColumnMapping, MappingTableSummary, TableRows } from './mapping.types';

const MAPPING_COLUMNS = [
  'source_table',
  'source_column',
  'target_table',
  'target_column',
  'transformation_logic',
];

function nullableText(value: unknown): string | null {
  return value === null || value === undefined ? null : String(value);
}

function toColumnMapping(row: Row): ColumnMapping {
  return {
    id: Number(row.mapping_id),
    sourceTable: String(row.source_table ?? ''),
    sourceColumn: String(row.source_column ?? ''),
    targetTable: String(row.target_table ?? ''),
    targetColumn: String(row.target_column ?? ''),
    transformationLogic: nullableText(row.transformation_logic),
  };
}

/**
 * Access to the mapping registry (`mapping_table`) and to the staging
 * tables built from uploaded mapping sheets.
 */
@Injectable()
export class MappingRepository {
  private readonly logger = new Logger(MappingRepository.name);
  private readonly config: MappingConfig;

  constructor(configService: ConfigService) {
    this.config = configService.getOrThrow<MappingConfig>('mapping');
  }

  get registryTable(): string {
    return this.config.registryTable;
  }

  async ensureRegistry(session: StoreSession): Promise<void> {
    await session.execute(
      `CREATE TABLE IF NOT EXISTS ${quoteTable(this.registryTable)} (
        mapping_id INT AUTO_INCREMENT PRIMARY KEY,
        source_table VARCHAR(64) NOT NULL,
        source_column VARCHAR(64) NOT NULL,
        target_table VARCHAR(64) NOT NULL,
        target_column VARCHAR(64) NOT NULL,
        transformation_logic TEXT NULL,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP ON UPDATE CURRENT_TIMESTAMP,
        INDEX idx_mapping_target_table (target_table)
      )`,
    );
  }

  /** Mappings for one target table, in declaration order. Empty when the registry is absent. */
  async findByTargetTable(session: StoreSession, targetTable: string): Promise<ColumnMapping[]> {
    if (!(await session.tableExists(this.registryTable))) {
      this.logger.warn(`Mapping registry '${this.registryTable}' does not exist`);
      return [];
    }

    const rows = await session.query(
      `SELECT mapping_id, ${quoteColumns(MAPPING_COLUMNS)}
       FROM ${quoteTable(this.registryTable)}
       WHERE target_table = ?
       ORDER BY mapping_id`,
      [targetTable],
    );
    return rows.map(toColumnMapping);
  }

  async create(session: StoreSession, mapping: ColumnMapping): Promise<ColumnMapping> {
    await this.ensureRegistry(session);

    const values: SqlValue[] = [
      mapping.sourceTable,
      mapping.sourceColumn,
      mapping.targetTable,
      mapping.targetColumn,
      mapping.transformationLogic,
    ];
    const result = await session.execute(
      `INSERT INTO ${quoteTable(this.registryTable)} (${quoteColumns(MAPPING_COLUMNS)})
       VALUES (${placeholders(MAPPING_COLUMNS.length)})`,
      values,
    );

    this.logger.log(
      `Mapping ${result.insertId} created: ${mapping.sourceTable}.${mapping.sourceColumn} -> ${mapping.targetTable}.${mapping.targetColumn}`,
    );
    return { ...mapping, id: result.insertId };
  }

  /**
   * Tables that look like mapping tables: the name mentions "mapping" or the
   * table carries the configured primary key column.
   */
  async listMappingTables(session: StoreSession): Promise<MappingTableSummary[]> {
    const rows = await session.query(
      `SELECT DISTINCT t.table_name AS name
       FROM information_schema.tables t
       WHERE t.table_schema = DATABASE()
         AND (
           t.table_name LIKE ?
           OR t.table_name IN (
             SELECT c.table_name
             FROM information_schema.columns c
             WHERE c.table_schema = DATABASE() AND c.column_name = ?
           )
         )
       ORDER BY name`,
      ['%mapping%', this.config.primaryKey],
    );

    const tables: MappingTableSummary[] = [];
    for (const row of rows) {
      const name = String(row.name);
      const columns = await session.describe(name);
      tables.push({ name, columns: columns.map((column) => column.name) });
    }
    return tables;
  }

  async getTableRows(session: StoreSession, table: string, limit: number): Promise<TableRows> {
    const quoted = quoteTable(table);
    const columns = await session.describe(table);
    const data = await session.query(`SELECT * FROM ${quoted} LIMIT ?`, [limit]);
    return {
      tableName: table,
      columns: columns.map((column) => column.name),
      data,
      totalRows: data.length,
    };
  }
}
