import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ValidationException } from '../common/exceptions/etl.exceptions';
import { tableNameFromFileName } from '../common/utils/name-sanitizer';
import { isValidIdentifier } from '../common/utils/sql-identifier';
import { STORE, Store } from '../database/store.interface';
import { SpreadsheetReader } from '../spreadsheets/spreadsheet.reader';
import { UploadedFile } from '../spreadsheets/spreadsheet.types';
import { CreateMappingDto } from './dto';
import { MappingRepository } from './mapping.repository';
import { MappingTableBuilder } from './mapping-table.builder';
import { ColumnMapping, MappingTableResult, MappingTableSummary, TableRows } from './mapping.types';

@Injectable()
export class MappingsService {
  private readonly logger = new Logger(MappingsService.name);
  private readonly maxUploadSize: number;

  constructor(
    @Inject(STORE) private readonly store: Store,
    private readonly repository: MappingRepository,
    private readonly builder: MappingTableBuilder,
    private readonly reader: SpreadsheetReader,
    configService: ConfigService,
  ) {
    this.maxUploadSize = configService.get<number>('maxUploadSize', 104857600);
  }

  /**
   * Build a mapping table from an uploaded sheet. The table is named after
   * the file.
   */
  async uploadMappingFile(file: UploadedFile): Promise<MappingTableResult> {
    this.reader.assertSupported(file, this.maxUploadSize);

    const tableName = tableNameFromFileName(file.filename);
    if (!isValidIdentifier(tableName)) {
      throw new ValidationException(`Cannot derive a table name from file '${file.filename}'`);
    }

    const sheet = this.reader.read(file.buffer, file.filename);
    this.logger.log(`Building mapping table ${tableName} from ${file.filename}`);

    return this.store.withSession((session) => this.builder.build(session, sheet, tableName));
  }

  async findByTargetTable(targetTable: string): Promise<ColumnMapping[]> {
    return this.store.withSession((session) =>
      this.repository.findByTargetTable(session, targetTable),
    );
  }

  async create(dto: CreateMappingDto): Promise<ColumnMapping> {
    return this.store.withSession((session) =>
      this.repository.create(session, {
        sourceTable: dto.sourceTable,
        sourceColumn: dto.sourceColumn,
        targetTable: dto.targetTable,
        targetColumn: dto.targetColumn,
        transformationLogic: dto.transformationLogic ?? null,
      }),
    );
  }

  async listMappingTables(): Promise<{ tables: MappingTableSummary[]; totalTables: number }> {
    const tables = await this.store.withSession((session) =>
      this.repository.listMappingTables(session),
    );
    return { tables, totalTables: tables.length };
  }

  async getTableRows(table: string, limit: number): Promise<TableRows> {
    return this.store.withSession((session) => this.repository.getTableRows(session, table, limit));
  }
}
