import { Body, Controller, Get, Param, Post, Query, Req } from '@nestjs/common';
import {
  ApiBody,
  ApiConsumes,
  ApiOperation,
  ApiParam,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { FastifyRequest } from 'fastify';
import { readMultipartUpload } from '../common/utils/multipart';
import { CreateMappingDto, MappingQueryDto, TableRowsQueryDto } from './dto';
import { MappingsService } from './mappings.service';

@ApiTags('Mappings')
@Controller('mappings')
export class MappingsController {
  constructor(private readonly service: MappingsService) {}

  @Post('upload')
  @ApiConsumes('multipart/form-data')
  @ApiBody({
    description: 'Mapping sheet (.xlsx, .xls or .csv). The table is named after the file.',
    schema: {
      type: 'object',
      required: ['file'],
      properties: { file: { type: 'string', format: 'binary' } },
    },
  })
  @ApiOperation({ summary: 'Create and load a mapping table from a spreadsheet' })
  @ApiResponse({ status: 201, description: 'Table created (if absent) and rows loaded' })
  @ApiResponse({ status: 400, description: 'Invalid file or missing required column' })
  async upload(@Req() req: FastifyRequest) {
    const { file } = await readMultipartUpload(req);
    const result = await this.service.uploadMappingFile(file);
    return { data: result };
  }

  // Static routes before /tables/:table

  @Get('tables')
  @ApiOperation({ summary: 'List mapping tables' })
  async listTables() {
    const result = await this.service.listMappingTables();
    return { data: result };
  }

  @Get('tables/:table/rows')
  @ApiOperation({ summary: 'Read the rows of a table' })
  @ApiParam({ name: 'table', type: String })
  @ApiResponse({ status: 404, description: 'Table not found' })
  async getTableRows(@Param('table') table: string, @Query() query: TableRowsQueryDto) {
    const result = await this.service.getTableRows(table, query.limit);
    return { data: result };
  }

  @Get()
  @ApiOperation({ summary: 'List column mappings for a target table' })
  async findByTargetTable(@Query() query: MappingQueryDto) {
    const mappings = await this.service.findByTargetTable(query.targetTable);
    return { data: mappings };
  }

  @Post()
  @ApiOperation({ summary: 'Declare a column mapping' })
  @ApiResponse({ status: 201, description: 'Mapping created' })
  async create(@Body() dto: CreateMappingDto) {
    const mapping = await this.service.create(dto);
    return { data: mapping };
  }
}
