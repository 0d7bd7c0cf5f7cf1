import { sanitizeColumnName, tableNameFromFileName } from './name-sanitizer';

describe('sanitizeColumnName', () => {
  it.each([
    ['Customer Name', 'customer_name'],
    ['Amount ($)', 'amount____'],
    ['2024 Sales', 'col_2024_sales'],
    ['tpa_id', 'tpa_id'],
    ['Policy-No.', 'policy_no_'],
    ['ÉCOLE', '_cole'],
    ['', ''],
  ])('should sanitize %p to %p', (input, expected) => {
    expect(sanitizeColumnName(input)).toBe(expected);
  });

  it('should treat null and undefined as empty', () => {
    expect(sanitizeColumnName(null)).toBe('');
    expect(sanitizeColumnName(undefined)).toBe('');
  });

  it('should stringify numeric headers', () => {
    expect(sanitizeColumnName(42)).toBe('col_42');
  });

  it('should be idempotent', () => {
    for (const label of ['Customer Name', '2024 Sales', 'a-b c', '  x  ', '9lives', '___']) {
      const once = sanitizeColumnName(label);
      expect(sanitizeColumnName(once)).toBe(once);
    }
  });

  it('should let distinct labels collide', () => {
    expect(sanitizeColumnName('a b')).toBe(sanitizeColumnName('a-b'));
  });
});

describe('tableNameFromFileName', () => {
  it('should strip directory and extension', () => {
    expect(tableNameFromFileName('/uploads/Claims Mapping.xlsx')).toBe('claims_mapping');
  });

  it('should only strip the last extension', () => {
    expect(tableNameFromFileName('policy.v2.csv')).toBe('policy_v2');
  });

  it('should prefix names starting with a digit', () => {
    expect(tableNameFromFileName('2024_mapping.xls')).toBe('col_2024_mapping');
  });
});
