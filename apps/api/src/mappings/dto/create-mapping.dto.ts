import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';

const identifier = z
  .string()
  .trim()
  .regex(/^[A-Za-z_][A-Za-z0-9_]{0,63}$/, 'Must be a valid table or column name');

export const createMappingSchema = z.object({
  sourceTable: identifier,
  sourceColumn: identifier,
  targetTable: identifier,
  targetColumn: identifier,
  transformationLogic: z.string().max(2000).nullable().optional(),
});

export class CreateMappingDto extends createZodDto(createMappingSchema) {}
