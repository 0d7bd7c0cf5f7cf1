import { Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { CronTime } from 'cron';
import { ValidationException } from '../common/exceptions/etl.exceptions';
import { quoteTable } from '../common/utils/sql-identifier';
import { Row, SqlValue, STORE, Store, StoreSession } from '../database/store.interface';
import { TargetTableProcessor } from '../processing/target-table.processor';
import { RunQueryDto } from './dto';
import {
  PaginatedRuns,
  SCHEDULER_STATUSES,
  ScheduleRequest,
  SchedulerRun,
  SchedulerStatus,
} from './scheduler.types';

const SCHEDULER_TABLE = 'scheduler_details';
const TABLE = quoteTable(SCHEDULER_TABLE);

const RUN_COLUMNS = `id, scheduler_name, cron_expression, target_table, start_date_time,
  end_date_time, process_logic, status, details, created_at, completed_at`;

function nullableText(value: unknown): string | null {
  return value === null || value === undefined ? null : String(value);
}

function toStatus(value: unknown): SchedulerStatus {
  return SCHEDULER_STATUSES.find((status) => status === value) ?? 'Scheduled';
}

// mysql2 decodes JSON columns; other drivers hand back the text
function parseDetails(value: unknown): unknown {
  if (typeof value !== 'string') return value ?? null;
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}

function toSchedulerRun(row: Row): SchedulerRun {
  return {
    id: Number(row.id),
    schedulerName: String(row.scheduler_name),
    cronExpression: String(row.cron_expression),
    targetTable: String(row.target_table),
    startDateTime: nullableText(row.start_date_time),
    endDateTime: nullableText(row.end_date_time),
    processLogic: nullableText(row.process_logic),
    status: toStatus(row.status),
    details: parseDetails(row.details),
    createdAt: String(row.created_at),
    completedAt: nullableText(row.completed_at),
  };
}

/**
 * Records a scheduling request and runs it once, synchronously.
 *
 * Status moves `Scheduled` → `Completed` when the processor returns (even
 * with failed rows) or `Scheduled` → `Failed` when it throws. Nothing here
 * triggers later runs from the cron expression.
 */
@Injectable()
export class SchedulerService {
  private readonly logger = new Logger(SchedulerService.name);

  constructor(
    @Inject(STORE) private readonly store: Store,
    private readonly processor: TargetTableProcessor,
  ) {}

  async schedule(request: ScheduleRequest): Promise<SchedulerRun> {
    this.assertValidCron(request.cronExpression);

    const id = await this.store.withSession(async (session) => {
      await this.ensureTable(session);
      const result = await session.execute(
        `INSERT INTO ${TABLE}
           (scheduler_name, cron_expression, target_table, start_date_time, end_date_time, process_logic, status)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
        [
          request.schedulerName,
          request.cronExpression,
          request.targetTable,
          request.startDate ?? null,
          request.endDate ?? null,
          request.processLogic ?? null,
          'Scheduled',
        ],
      );
      return result.insertId;
    });
    this.logger.log(`Scheduler '${request.schedulerName}' recorded as run ${id}`);

    let status: SchedulerStatus;
    let details: unknown;
    try {
      details = await this.processor.process({
        targetTable: request.targetTable,
        startDate: request.startDate,
        endDate: request.endDate,
        dateColumn: request.dateColumn,
      });
      status = 'Completed';
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Scheduler run ${id} failed: ${message}`);
      status = 'Failed';
      details = { error: message };
    }

    return this.store.withSession(async (session) => {
      await session.execute(
        `UPDATE ${TABLE}
         SET status = ?, details = ?, completed_at = CURRENT_TIMESTAMP
         WHERE id = ?`,
        [status, JSON.stringify(details), id],
      );
      this.logger.log(`Scheduler run ${id} finished with status ${status}`);
      return this.findRun(session, id);
    });
  }

  async getRun(id: number): Promise<SchedulerRun> {
    return this.store.withSession(async (session) => {
      if (!(await session.tableExists(SCHEDULER_TABLE))) {
        throw new NotFoundException(`Scheduler run ${id} not found`);
      }
      return this.findRun(session, id);
    });
  }

  async listRuns(query: RunQueryDto): Promise<PaginatedRuns> {
    const { page, pageSize, status } = query;

    return this.store.withSession(async (session) => {
      if (!(await session.tableExists(SCHEDULER_TABLE))) {
        return { items: [], total: 0, page, pageSize, totalPages: 0 };
      }

      const where = status ? 'WHERE status = ?' : '';
      const params: SqlValue[] = status ? [status] : [];

      const countRows = await session.query(
        `SELECT COUNT(*) AS total FROM ${TABLE} ${where}`,
        params,
      );
      const rows = await session.query(
        `SELECT ${RUN_COLUMNS} FROM ${TABLE} ${where} ORDER BY id DESC LIMIT ? OFFSET ?`,
        [...params, pageSize, (page - 1) * pageSize],
      );
      const total = Number(countRows[0]?.total ?? 0);

      return {
        items: rows.map(toSchedulerRun),
        total,
        page,
        pageSize,
        totalPages: Math.ceil(total / pageSize),
      };
    });
  }

  private assertValidCron(expression: string): void {
    try {
      new CronTime(expression);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ValidationException(`Invalid cron expression '${expression}': ${reason}`);
    }
  }

  private async ensureTable(session: StoreSession): Promise<void> {
    await session.execute(
      `CREATE TABLE IF NOT EXISTS ${TABLE} (
        id INT AUTO_INCREMENT PRIMARY KEY,
        scheduler_name VARCHAR(255) NOT NULL,
        cron_expression VARCHAR(255) NOT NULL,
        target_table VARCHAR(64) NOT NULL,
        start_date_time DATETIME NULL,
        end_date_time DATETIME NULL,
        process_logic TEXT NULL,
        status VARCHAR(32) NOT NULL,
        details JSON NULL,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        completed_at TIMESTAMP NULL
      )`,
    );
  }

  private async findRun(session: StoreSession, id: number): Promise<SchedulerRun> {
    const rows = await session.query(
      `SELECT ${RUN_COLUMNS} FROM ${TABLE} WHERE id = ?`,
      [id],
    );
    if (rows.length === 0) {
      throw new NotFoundException(`Scheduler run ${id} not found`);
    }
    return toSchedulerRun(rows[0]);
  }
}
