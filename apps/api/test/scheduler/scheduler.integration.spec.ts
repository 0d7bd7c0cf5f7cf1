import request from 'supertest';
import { closeTestApp, createTestApp, TestContext } from '../helpers/test-app.helper';

describe('Scheduler (Integration)', () => {
  let context: TestContext;

  beforeAll(async () => {
    context = await createTestApp();
  });

  afterAll(async () => {
    await closeTestApp(context);
  });

  describe('GET /api/scheduler/runs', () => {
    it('should return an empty page before anything was scheduled', async () => {
      const response = await request(context.app.getHttpServer())
        .get('/api/scheduler/runs')
        .expect(200);

      expect(response.body.data).toEqual({
        items: [],
        total: 0,
        page: 1,
        pageSize: 20,
        totalPages: 0,
      });
    });

    it('should reject an unknown status filter', async () => {
      await request(context.app.getHttpServer())
        .get('/api/scheduler/runs?status=Running')
        .expect(400);
    });
  });

  describe('GET /api/scheduler/runs/:id', () => {
    it('should return 404 for an unknown run', async () => {
      const response = await request(context.app.getHttpServer())
        .get('/api/scheduler/runs/7')
        .expect(404);

      expect(response.body).toMatchObject({ code: 'NOT_FOUND', message: 'Scheduler run 7 not found' });
    });

    it('should reject a non-numeric id', async () => {
      await request(context.app.getHttpServer())
        .get('/api/scheduler/runs/latest')
        .expect(400);
    });
  });

  describe('POST /api/scheduler/runs', () => {
    it('should reject an invalid cron expression without recording a run', async () => {
      const response = await request(context.app.getHttpServer())
        .post('/api/scheduler/runs')
        .send({ schedulerName: 'nightly', cronExpression: 'every night', targetTable: 'claims' })
        .expect(400);

      expect(response.body.code).toBe('VALIDATION_ERROR');
      expect(response.body.message).toMatch(/^Invalid cron expression 'every night'/);
      expect(context.session.statements).toHaveLength(0);
    });

    it('should record a failed run when the target has no mappings', async () => {
      context.session.queryHandlers.push((sql) =>
        sql.includes('WHERE id = ?')
          ? [
              {
                id: 1,
                scheduler_name: 'nightly',
                cron_expression: '0 2 * * *',
                target_table: 'claims',
                start_date_time: null,
                end_date_time: null,
                process_logic: null,
                status: context.session.statements.at(-1)?.params[0],
                details: context.session.statements.at(-1)?.params[1],
                created_at: '2026-03-01 02:00:00',
                completed_at: '2026-03-01 02:00:01',
              },
            ]
          : undefined,
      );

      const response = await request(context.app.getHttpServer())
        .post('/api/scheduler/runs')
        .send({ schedulerName: 'nightly', cronExpression: '0 2 * * *', targetTable: 'claims' })
        .expect(201);

      expect(response.body.data).toMatchObject({
        id: 1,
        status: 'Failed',
        details: { error: "No mappings found for target table 'claims'" },
      });
      expect(context.session.statements[1].params).toEqual([
        'nightly',
        '0 2 * * *',
        'claims',
        null,
        null,
        null,
        'Scheduled',
      ]);
    });
  });
});
