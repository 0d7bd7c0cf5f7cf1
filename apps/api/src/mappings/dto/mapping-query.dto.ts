import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';

export const mappingQuerySchema = z.object({
  targetTable: z.string().trim().min(1).max(64),
});

export class MappingQueryDto extends createZodDto(mappingQuerySchema) {}

export const tableRowsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(10000).default(1000),
});

export class TableRowsQueryDto extends createZodDto(tableRowsQuerySchema) {}
