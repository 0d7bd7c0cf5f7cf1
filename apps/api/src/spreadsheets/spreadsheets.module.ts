import { Module } from '@nestjs/common';
import { SpreadsheetReader } from './spreadsheet.reader';

@Module({
  providers: [SpreadsheetReader],
  exports: [SpreadsheetReader],
})
export class SpreadsheetsModule {}
