import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';
import { processingWindowSchema } from '../../processing/dto';

export const createSchedulerRunSchema = processingWindowSchema
  .extend({
    schedulerName: z.string().trim().min(1).max(255),
    cronExpression: z.string().trim().min(1).max(255),
    processLogic: z.string().max(2000).optional(),
  })
  .refine((body) => !body.startDate || !body.endDate || body.startDate <= body.endDate, {
    message: 'startDate must not be after endDate',
    path: ['endDate'],
  });

export class CreateSchedulerRunDto extends createZodDto(createSchedulerRunSchema) {}
