import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mock, MockProxy } from 'jest-mock-extended';
import {
  ConfigurationException,
  TableNotFoundException,
} from '../common/exceptions/etl.exceptions';
import { SchemaIntrospector } from '../database/schema-introspector.service';
import { MappingRepository } from '../mappings/mapping.repository';
import { ColumnMapping } from '../mappings/mapping.types';
import { RowTransformer } from '../transformations/row-transformer.service';
import { column, FakeSession, FakeStore } from '../../test/mocks/store.mock';
import { TargetTableProcessor } from './target-table.processor';

const mapping = (
  sourceColumn: string,
  targetColumn: string,
  transformationLogic: string | null = null,
  sourceTable = 'staging_claims',
): ColumnMapping => ({ sourceTable, sourceColumn, targetTable: 'claims', targetColumn, transformationLogic });

const MAPPINGS = [
  mapping('member', 'member_name', 'upper(source)'),
  mapping('claim_dt', 'claim_date'),
  mapping('amt', 'amount'),
];

function sourceRows(count: number) {
  return Array.from({ length: count }, (_, idx) => ({
    member: `member ${idx + 1}`,
    claim_dt: `${String(idx + 1).padStart(2, '0')}/01/2024`,
    amt: `${idx + 1}.50`,
  }));
}

describe('TargetTableProcessor', () => {
  let session: FakeSession;
  let repository: MockProxy<MappingRepository>;

  function createProcessor(processing: { dateColumn?: string } = {}) {
    return new TargetTableProcessor(
      new FakeStore(session),
      repository,
      new SchemaIntrospector(),
      new RowTransformer(),
      new ConfigService({ processing }),
    );
  }

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);

    session = new FakeSession()
      .addTable(
        'staging_claims',
        [column('member'), column('claim_dt'), column('amt'), column('loaded_on', 'date')],
        sourceRows(10),
      )
      .addTable('claims', [
        column('id', 'int', { isAutoIncrement: true, isPrimaryKey: true }),
        column('member_name', 'varchar(100)'),
        column('claim_date', 'date'),
        column('amount', 'decimal(10,2)'),
      ]);

    repository = mock<MappingRepository>();
    repository.findByTargetTable.mockResolvedValue(MAPPINGS);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should transform and insert every source row', async () => {
    const result = await createProcessor().process({ targetTable: 'claims' });

    expect(result).toEqual({ message: '10 rows inserted into claims', insertedCount: 10, failedRows: [] });
    expect(session.rowsOf('claims')[0]).toEqual({
      member_name: 'MEMBER 1',
      claim_date: '2024-01-01',
      amount: 1.5,
    });
    expect(session.transactions).toBe(1);
  });

  it('should continue past a row that fails and report it', async () => {
    const rows = sourceRows(10);
    rows[3] = { ...rows[3], claim_dt: '2024-13-40' };
    session.addTable('staging_claims', [column('member'), column('claim_dt'), column('amt')], rows);

    const result = await createProcessor().process({ targetTable: 'claims' });

    expect(result.insertedCount).toBe(9);
    expect(result.message).toBe('9 rows inserted into claims');
    expect(result.failedRows).toEqual([
      {
        row: { member: 'member 4', claim_dt: '2024-13-40', amt: '4.50' },
        error: "Invalid date format for column 'claim_date': 2024-13-40",
      },
    ]);
    expect(session.rowsOf('claims')).toHaveLength(9);
  });

  it('should collect insert failures and keep going', async () => {
    session.insertFailure = (_table, values) =>
      values.member_name === 'MEMBER 2' ? new Error("Duplicate entry 'MEMBER 2'") : undefined;

    const result = await createProcessor().process({ targetTable: 'claims' });

    expect(result.insertedCount).toBe(9);
    expect(result.failedRows).toHaveLength(1);
    expect(result.failedRows[0].error).toBe("Duplicate entry 'MEMBER 2'");
  });

  it('should drop mapped target columns the table no longer has', async () => {
    repository.findByTargetTable.mockResolvedValue([...MAPPINGS, mapping('loaded_on', 'legacy_loaded_on')]);

    const result = await createProcessor().process({ targetTable: 'claims' });

    expect(result.insertedCount).toBe(10);
    expect(Object.keys(session.rowsOf('claims')[0])).toEqual(['member_name', 'claim_date', 'amount']);
  });

  it('should fail rows with no column in the target schema', async () => {
    repository.findByTargetTable.mockResolvedValue([mapping('member', 'legacy_member')]);

    const result = await createProcessor().process({ targetTable: 'claims' });

    expect(result.insertedCount).toBe(0);
    expect(result.failedRows).toHaveLength(10);
    expect(result.failedRows[0].error).toBe('No matching columns found for the target table');
  });

  it('should only select the mapped source columns', async () => {
    await createProcessor().process({ targetTable: 'claims' });

    expect(session.queries[0]).toEqual({
      sql: 'SELECT `member`, `claim_dt`, `amt` FROM `staging_claims`',
      params: [],
    });
  });

  describe('setup errors', () => {
    it('should throw ConfigurationException when no mappings exist', async () => {
      repository.findByTargetTable.mockResolvedValue([]);

      await expect(createProcessor().process({ targetTable: 'claims' })).rejects.toThrow(
        new ConfigurationException("No mappings found for target table 'claims'"),
      );
    });

    it('should reject mappings that read from several source tables', async () => {
      repository.findByTargetTable.mockResolvedValue([
        mapping('member', 'member_name'),
        mapping('amt', 'amount', null, 'other_source'),
      ]);

      await expect(createProcessor().process({ targetTable: 'claims' })).rejects.toThrow(
        "Mappings for target table 'claims' read from more than one source table: staging_claims, other_source",
      );
      expect(session.queries).toHaveLength(0);
    });

    it('should throw when none of the mapped source columns exist', async () => {
      repository.findByTargetTable.mockResolvedValue([mapping('gone', 'member_name')]);

      await expect(createProcessor().process({ targetTable: 'claims' })).rejects.toThrow(
        ConfigurationException,
      );
    });

    it('should throw TableNotFoundException for a missing source table', async () => {
      repository.findByTargetTable.mockResolvedValue([mapping('member', 'member_name', null, 'missing')]);

      await expect(createProcessor().process({ targetTable: 'claims' })).rejects.toThrow(
        TableNotFoundException,
      );
    });

    it('should throw TableNotFoundException for a missing target table', async () => {
      session.tables.delete('claims');

      await expect(createProcessor().process({ targetTable: 'claims' })).rejects.toThrow(
        "Table 'claims' does not exist",
      );
    });
  });

  describe('date window', () => {
    it('should bind the window on the requested date column', async () => {
      await createProcessor().process({
        targetTable: 'claims',
        startDate: '2024-01-01',
        endDate: '2024-01-31',
        dateColumn: 'loaded_on',
      });

      expect(session.queries[0]).toEqual({
        sql: 'SELECT `member`, `claim_dt`, `amt` FROM `staging_claims` WHERE DATE(`loaded_on`) >= ? AND DATE(`loaded_on`) <= ?',
        params: ['2024-01-01', '2024-01-31'],
      });
    });

    it('should fall back to the configured date column', async () => {
      await createProcessor({ dateColumn: 'loaded_on' }).process({
        targetTable: 'claims',
        startDate: '2024-02-01',
      });

      expect(session.queries[0]).toEqual({
        sql: 'SELECT `member`, `claim_dt`, `amt` FROM `staging_claims` WHERE DATE(`loaded_on`) >= ?',
        params: ['2024-02-01'],
      });
    });

    it('should ignore the window with a warning when no date column is known', async () => {
      await createProcessor().process({ targetTable: 'claims', endDate: '2024-02-01' });

      expect(session.queries[0].params).toEqual([]);
      expect(Logger.prototype.warn).toHaveBeenCalledWith(
        'Date window given but no date column is configured; processing all rows',
      );
    });

    it('should reject a date column the source table lacks', async () => {
      await expect(
        createProcessor().process({ targetTable: 'claims', startDate: '2024-01-01', dateColumn: 'nope' }),
      ).rejects.toThrow("Date column 'nope' does not exist in source table 'staging_claims'");
    });
  });
});
