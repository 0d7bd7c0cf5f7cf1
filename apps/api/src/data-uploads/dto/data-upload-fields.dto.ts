import { z } from 'zod';
import { identifierSchema } from '../../processing/dto';

/** Text fields of the multipart upload, sent before the file part. */
export const dataUploadFieldsSchema = z.object({
  mappingTable: identifierSchema,
  targetTable: identifierSchema,
});

export type DataUploadFields = z.infer<typeof dataUploadFieldsSchema>;
