import { Controller, Post, Req } from '@nestjs/common';
import { ApiBody, ApiConsumes, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { FastifyRequest } from 'fastify';
import { ValidationException } from '../common/exceptions/etl.exceptions';
import { readMultipartUpload } from '../common/utils/multipart';
import { DataUploadsService } from './data-uploads.service';
import { dataUploadFieldsSchema } from './dto';

@ApiTags('Data Uploads')
@Controller('data-uploads')
export class DataUploadsController {
  constructor(private readonly service: DataUploadsService) {}

  @Post()
  @ApiConsumes('multipart/form-data')
  @ApiBody({
    description: 'Data sheet plus the mapping and target table names. Send the fields before the file.',
    schema: {
      type: 'object',
      required: ['mappingTable', 'targetTable', 'file'],
      properties: {
        mappingTable: { type: 'string' },
        targetTable: { type: 'string' },
        file: { type: 'string', format: 'binary' },
      },
    },
  })
  @ApiOperation({ summary: 'Upsert spreadsheet rows into a table through a mapping table' })
  @ApiResponse({ status: 201, description: 'Rows uploaded; failed rows are listed in the result' })
  @ApiResponse({ status: 404, description: 'Target table not found' })
  @ApiResponse({ status: 422, description: 'Mapping table missing or empty' })
  async upload(@Req() req: FastifyRequest) {
    const { file, fields } = await readMultipartUpload(req);

    const parsed = dataUploadFieldsSchema.safeParse(fields);
    if (!parsed.success) {
      throw new ValidationException('Invalid upload fields', parsed.error.flatten().fieldErrors);
    }

    const result = await this.service.upload(file, parsed.data);
    return { data: result };
  }
}
