import { Body, Controller, Get, Param, ParseIntPipe, Post, Query } from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { CreateSchedulerRunDto, RunQueryDto } from './dto';
import { SchedulerService } from './scheduler.service';

@ApiTags('Scheduler')
@Controller('scheduler')
export class SchedulerController {
  constructor(private readonly scheduler: SchedulerService) {}

  @Post('runs')
  @ApiOperation({ summary: 'Record a scheduler and run its target table once' })
  @ApiResponse({ status: 201, description: 'Run recorded with its terminal status' })
  @ApiResponse({ status: 400, description: 'Invalid cron expression or body' })
  async create(@Body() dto: CreateSchedulerRunDto) {
    const run = await this.scheduler.schedule(dto);
    return { data: run };
  }

  @Get('runs')
  @ApiOperation({ summary: 'List scheduler runs' })
  async list(@Query() query: RunQueryDto) {
    const runs = await this.scheduler.listRuns(query);
    return { data: runs };
  }

  @Get('runs/:id')
  @ApiOperation({ summary: 'Get a scheduler run' })
  @ApiParam({ name: 'id', type: Number })
  @ApiResponse({ status: 404, description: 'Run not found' })
  async get(@Param('id', ParseIntPipe) id: number) {
    const run = await this.scheduler.getRun(id);
    return { data: run };
  }
}
