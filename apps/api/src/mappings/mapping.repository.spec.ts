import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { column, FakeSession } from '../../test/mocks/store.mock';
import { MappingRepository } from './mapping.repository';

describe('MappingRepository', () => {
  let session: FakeSession;
  let repository: MappingRepository;

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    session = new FakeSession();
    repository = new MappingRepository(
      new ConfigService({
        mapping: { requiredColumn: 'tpa_id', primaryKey: 'mapping_id', registryTable: 'mapping_table' },
      }),
    );
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('findByTargetTable', () => {
    it('should return no mappings when the registry does not exist', async () => {
      await expect(repository.findByTargetTable(session, 'claims')).resolves.toEqual([]);
      expect(session.queries).toHaveLength(0);
    });

    it('should bind the target table and map rows', async () => {
      session.addTable('mapping_table', [column('mapping_id', 'int')]);
      session.queryHandlers.push(() => [
        {
          mapping_id: 3,
          source_table: 'staging_claims',
          source_column: 'amt',
          target_table: 'claims',
          target_column: 'amount',
          transformation_logic: null,
        },
      ]);

      const mappings = await repository.findByTargetTable(session, 'claims');

      expect(mappings).toEqual([
        {
          id: 3,
          sourceTable: 'staging_claims',
          sourceColumn: 'amt',
          targetTable: 'claims',
          targetColumn: 'amount',
          transformationLogic: null,
        },
      ]);
      expect(session.queries[0].params).toEqual(['claims']);
      expect(session.queries[0].sql).toContain('WHERE target_table = ?');
    });
  });

  describe('create', () => {
    it('should create the registry if needed and insert the mapping', async () => {
      const created = await repository.create(session, {
        sourceTable: 'staging_claims',
        sourceColumn: 'amt',
        targetTable: 'claims',
        targetColumn: 'amount',
        transformationLogic: 'round(float(source), 2)',
      });

      expect(session.statements[0].sql).toContain('CREATE TABLE IF NOT EXISTS `mapping_table`');
      expect(session.statements[1].params).toEqual([
        'staging_claims',
        'amt',
        'claims',
        'amount',
        'round(float(source), 2)',
      ]);
      expect(created.id).toBe(1);
    });
  });

  describe('listMappingTables', () => {
    it('should describe each matching table', async () => {
      session
        .addTable('claims_mapping', [column('mapping_id', 'int'), column('tpa_id', 'int')])
        .addTable('staging', [column('mapping_id', 'int')]);
      session.queryHandlers.push((sql) =>
        sql.includes('information_schema.tables') ? [{ name: 'claims_mapping' }, { name: 'staging' }] : undefined,
      );

      await expect(repository.listMappingTables(session)).resolves.toEqual([
        { name: 'claims_mapping', columns: ['mapping_id', 'tpa_id'] },
        { name: 'staging', columns: ['mapping_id'] },
      ]);
      expect(session.queries[0].params).toEqual(['%mapping%', 'mapping_id']);
    });
  });

  describe('getTableRows', () => {
    it('should return columns and rows', async () => {
      session.addTable('claims_mapping', [column('tpa_id', 'int'), column('name')], [
        { tpa_id: 1, name: 'Jane' },
      ]);

      await expect(repository.getTableRows(session, 'claims_mapping', 100)).resolves.toEqual({
        tableName: 'claims_mapping',
        columns: ['tpa_id', 'name'],
        data: [{ tpa_id: 1, name: 'Jane' }],
        totalRows: 1,
      });
      expect(session.queries[0]).toEqual({ sql: 'SELECT * FROM `claims_mapping` LIMIT ?', params: [100] });
    });

    it('should reject unsafe table names', async () => {
      await expect(repository.getTableRows(session, 'x; DROP TABLE y', 10)).rejects.toThrow(
        "Invalid table name 'x; DROP TABLE y'",
      );
    });
  });
});
