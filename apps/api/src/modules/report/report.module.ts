import { Module } from '@nestjs/common';
import { RenderModule } from '../render/render.module';
import { IngestionModule } from '../ingestion/ingestion.module';
import { ReportService } from './report.service';
import { ReportController } from './report.controller';

@Module({
  imports: [RenderModule, IngestionModule],
  controllers: [ReportController],
  providers: [ReportService],
  exports: [ReportService],
})
export class ReportModule {}
