export const SCHEDULER_STATUSES = ['Scheduled', 'Completed', 'Failed'] as const;

export type SchedulerStatus = (typeof SCHEDULER_STATUSES)[number];

export interface SchedulerRun {
  id: number;
  schedulerName: string;
  cronExpression: string;
  targetTable: string;
  startDateTime: string | null;
  endDateTime: string | null;
  processLogic: string | null;
  status: SchedulerStatus;
  /** Batch result on completion, `{ error }` on failure. */
  details: unknown;
  createdAt: string;
  completedAt: string | null;
}

export interface ScheduleRequest {
  schedulerName: string;
  cronExpression: string;
  targetTable: string;
  startDate?: string;
  endDate?: string;
  processLogic?: string;
  dateColumn?: string;
}

export interface PaginatedRuns {
  items: SchedulerRun[];
  total: number;
  page: number;
  pageSize: number;
  totalPages: number;
}
