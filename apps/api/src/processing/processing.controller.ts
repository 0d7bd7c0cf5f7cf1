import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { RunProcessingDto } from './dto';
import { TargetTableProcessor } from './target-table.processor';

@ApiTags('Processing')
@Controller('processing')
export class ProcessingController {
  constructor(private readonly processor: TargetTableProcessor) {}

  @Post('run')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Run the mapping-driven transform for a target table' })
  @ApiResponse({ status: 200, description: 'Batch finished; failed rows are listed in the result' })
  @ApiResponse({ status: 404, description: 'Source or target table not found' })
  @ApiResponse({ status: 422, description: 'Mappings are missing or inconsistent' })
  async run(@Body() dto: RunProcessingDto) {
    const result = await this.processor.process(dto);
    return { data: result };
  }
}
