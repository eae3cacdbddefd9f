import { Module } from '@nestjs/common';
import { CsvParserService } from './csv-parser.service';
import { QueryResultService } from './query-result.service';
import { DataSourceService } from './data-source.service';

@Module({
  providers: [CsvParserService, QueryResultService, DataSourceService],
  exports: [CsvParserService, QueryResultService, DataSourceService],
})
export class IngestionModule {}
