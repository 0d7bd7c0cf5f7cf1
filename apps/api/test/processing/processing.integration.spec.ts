import request from 'supertest';
import { column, FakeSession } from '../mocks/store.mock';
import { closeTestApp, createTestApp, TestContext } from '../helpers/test-app.helper';

const MAPPINGS = [
  { sourceColumn: 'member', targetColumn: 'member_name', transformationLogic: 'upper(source)' },
  { sourceColumn: 'amt', targetColumn: 'amount', transformationLogic: null },
  { sourceColumn: 'dt', targetColumn: 'claim_date', transformationLogic: null },
];

function seed(session: FakeSession): void {
  session
    .addTable('staging_claims', [column('member'), column('amt'), column('dt')], [
      { member: 'jane', amt: '$1,200.50', dt: '25/12/2024' },
      { member: 'john', amt: 'abc', dt: '2024-01-05' },
    ])
    .addTable('claims', [
      column('id', 'int', { isAutoIncrement: true, isPrimaryKey: true }),
      column('member_name'),
      column('amount', 'decimal(10,2)'),
      column('claim_date', 'date'),
    ]);

  // The registry lookup filters on target_table
  session.queryHandlers.push((sql, params) =>
    sql.includes('FROM `mapping_table`')
      ? session
          .rowsOf('mapping_table')
          .filter((row) => row.target_table === params[0])
          .map((row, idx) => ({ mapping_id: idx + 1, ...row }))
      : undefined,
  );
}

describe('Processing (Integration)', () => {
  let context: TestContext;

  beforeAll(async () => {
    const session = new FakeSession();
    seed(session);
    context = await createTestApp(session);

    for (const mapping of MAPPINGS) {
      await request(context.app.getHttpServer())
        .post('/api/mappings')
        .send({ sourceTable: 'staging_claims', targetTable: 'claims', ...mapping })
        .expect(201);
    }
  });

  afterAll(async () => {
    await closeTestApp(context);
  });

  describe('POST /api/processing/run', () => {
    it('should transform and insert rows, reporting the ones that fail', async () => {
      const response = await request(context.app.getHttpServer())
        .post('/api/processing/run')
        .send({ targetTable: 'claims' })
        .expect(200);

      expect(response.body.data).toEqual({
        message: '1 rows inserted into claims',
        insertedCount: 1,
        failedRows: [
          {
            row: { member: 'john', amt: 'abc', dt: '2024-01-05' },
            error: "Invalid decimal value for column 'amount': abc",
          },
        ],
      });
      expect(context.session.rowsOf('claims')).toEqual([
        { member_name: 'JANE', amount: 1200.5, claim_date: '2024-12-25' },
      ]);
    });

    it('should return 422 when the target has no mappings', async () => {
      const response = await request(context.app.getHttpServer())
        .post('/api/processing/run')
        .send({ targetTable: 'payments' })
        .expect(422);

      expect(response.body).toMatchObject({
        statusCode: 422,
        code: 'CONFIGURATION_ERROR',
        message: "No mappings found for target table 'payments'",
      });
    });

    it('should reject a window whose start is after its end', async () => {
      const response = await request(context.app.getHttpServer())
        .post('/api/processing/run')
        .send({ targetTable: 'claims', startDate: '2024-02-01', endDate: '2024-01-01' })
        .expect(400);

      expect(response.body.message).toBe('Validation failed');
    });

    it('should reject a date that is not on the calendar', async () => {
      const response = await request(context.app.getHttpServer())
        .post('/api/processing/run')
        .send({ targetTable: 'claims', startDate: '2024-13-40' })
        .expect(400);

      expect(response.body.message).toBe('Validation failed');
      expect(response.body.details).toEqual([
        expect.objectContaining({ path: ['startDate'], message: 'Expected a date in YYYY-MM-DD format' }),
      ]);
    });

    it('should reject a date column missing from the source table', async () => {
      const response = await request(context.app.getHttpServer())
        .post('/api/processing/run')
        .send({ targetTable: 'claims', startDate: '2024-01-01', dateColumn: 'service_date' })
        .expect(422);

      expect(response.body.message).toBe(
        "Date column 'service_date' does not exist in source table 'staging_claims'",
      );
    });
  });
});
