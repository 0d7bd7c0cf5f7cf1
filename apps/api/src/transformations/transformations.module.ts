import { Module } from '@nestjs/common';
import { RowTransformer } from './row-transformer.service';

@Module({
  providers: [RowTransformer],
  exports: [RowTransformer],
})
export class TransformationsModule {}
