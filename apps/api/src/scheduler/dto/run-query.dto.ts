import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';
import { SCHEDULER_STATUSES } from '../scheduler.types';

export const runQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  pageSize: z.coerce.number().int().min(1).max(100).default(20),
  status: z.enum(SCHEDULER_STATUSES).optional(),
});

export class RunQueryDto extends createZodDto(runQuerySchema) {}
