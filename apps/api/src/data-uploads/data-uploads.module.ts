import { Module } from '@nestjs/common';
import { SpreadsheetsModule } from '../spreadsheets/spreadsheets.module';
import { DataUploadsController } from './data-uploads.controller';
import { DataUploadsService } from './data-uploads.service';

@Module({
  imports: [SpreadsheetsModule],
  controllers: [DataUploadsController],
  providers: [DataUploadsService],
})
export class DataUploadsModule {}
