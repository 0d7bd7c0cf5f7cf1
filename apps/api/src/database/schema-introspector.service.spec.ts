import { column, FakeSession } from '../../test/mocks/store.mock';
import { classifyColumn, SchemaIntrospector } from './schema-introspector.service';

describe('classifyColumn', () => {
  it.each([
    ['int', 'integer'],
    ['int(11)', 'integer'],
    ['bigint unsigned', 'integer'],
    ['tinyint(1)', 'integer'],
    ['decimal(10,2)', 'decimal'],
    ['double', 'decimal'],
    ['date', 'date'],
    ['datetime', 'date'],
    ['timestamp', 'timestamp'],
    ['varchar(255)', 'text'],
    ['text', 'text'],
    ['json', 'text'],
  ])('should classify %p as %p', (declaredType, category) => {
    expect(classifyColumn(column('c', declaredType))).toBe(category);
  });

  it('should prefer auto-increment over the declared type', () => {
    expect(classifyColumn(column('id', 'int', { isAutoIncrement: true }))).toBe('auto_increment');
  });
});

describe('SchemaIntrospector', () => {
  const session = new FakeSession().addTable('claims', [
    column('id', 'int', { isAutoIncrement: true }),
    column('member_name'),
    column('claim_date', 'date'),
  ]);
  const introspector = new SchemaIntrospector();

  it('should return the ordered schema of a live table', async () => {
    await expect(introspector.getSchema(session, 'claims')).resolves.toEqual([
      { name: 'id', declaredType: 'int', category: 'auto_increment' },
      { name: 'member_name', declaredType: 'varchar(255)', category: 'text' },
      { name: 'claim_date', declaredType: 'date', category: 'date' },
    ]);
  });

  it('should list column names', async () => {
    await expect(introspector.getColumnNames(session, 'claims')).resolves.toEqual([
      'id',
      'member_name',
      'claim_date',
    ]);
  });

  it('should surface missing tables', async () => {
    await expect(introspector.getSchema(session, 'missing')).rejects.toThrow(
      "Table 'missing' does not exist",
    );
  });
});
