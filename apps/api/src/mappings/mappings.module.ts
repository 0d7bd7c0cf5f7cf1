import { Module } from '@nestjs/common';
import { SpreadsheetsModule } from '../spreadsheets/spreadsheets.module';
import { MappingRepository } from './mapping.repository';
import { MappingTableBuilder } from './mapping-table.builder';
import { MappingsController } from './mappings.controller';
import { MappingsService } from './mappings.service';

@Module({
  imports: [SpreadsheetsModule],
  controllers: [MappingsController],
  providers: [MappingsService, MappingRepository, MappingTableBuilder],
  exports: [MappingRepository],
})
export class MappingsModule {}
