import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';

export const identifierSchema = z
  .string()
  .trim()
  .regex(/^[A-Za-z_][A-Za-z0-9_]{0,63}$/, 'Must be a valid table or column name');

// Rejects calendar-invalid dates such as 2024-02-30
export const isoDateSchema = z.string().date('Expected a date in YYYY-MM-DD format');

export const processingWindowSchema = z.object({
  targetTable: identifierSchema,
  startDate: isoDateSchema.optional(),
  endDate: isoDateSchema.optional(),
  dateColumn: identifierSchema.optional(),
});

export const runProcessingSchema = processingWindowSchema.refine(
  (body) => !body.startDate || !body.endDate || body.startDate <= body.endDate,
  { message: 'startDate must not be after endDate', path: ['endDate'] },
);

export class RunProcessingDto extends createZodDto(runProcessingSchema) {}
