import { Module } from '@nestjs/common';
import { MappingsModule } from '../mappings/mappings.module';
import { TransformationsModule } from '../transformations/transformations.module';
import { ProcessingController } from './processing.controller';
import { TargetTableProcessor } from './target-table.processor';

@Module({
  imports: [MappingsModule, TransformationsModule],
  controllers: [ProcessingController],
  providers: [TargetTableProcessor],
  exports: [TargetTableProcessor],
})
export class ProcessingModule {}
