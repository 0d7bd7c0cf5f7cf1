import type { Multipart, MultipartValue } from '@fastify/multipart';
import { BadRequestException } from '@nestjs/common';
import { FastifyRequest } from 'fastify';
import { UploadedFile } from '../../spreadsheets/spreadsheet.types';

export interface MultipartUpload {
  file: UploadedFile;
  /** Text fields sent before the file part. */
  fields: Record<string, string>;
}

function isTextField(part: Multipart | undefined): part is MultipartValue<string> {
  return part !== undefined && part.type === 'field' && typeof part.value === 'string';
}

/**
 * Buffer the single file part of a multipart request.
 */
export async function readMultipartUpload(req: FastifyRequest): Promise<MultipartUpload> {
  const data = await req.file();

  if (!data) {
    throw new BadRequestException('No file provided in the request');
  }

  // Buffer the stream
  const chunks: Buffer[] = [];
  await new Promise<void>((resolve, reject) => {
    data.file.on('data', (chunk: Buffer) => chunks.push(chunk));
    data.file.on('end', resolve);
    data.file.on('error', reject);
  });

  if (data.file.truncated) {
    throw new BadRequestException(`File '${data.filename}' exceeds the upload size limit`);
  }

  const fields: Record<string, string> = {};
  for (const [name, entry] of Object.entries(data.fields)) {
    const part = Array.isArray(entry) ? entry[0] : entry;
    if (isTextField(part)) {
      fields[name] = part.value;
    }
  }

  return {
    file: { buffer: Buffer.concat(chunks), filename: data.filename, mimetype: data.mimetype },
    fields,
  };
}
