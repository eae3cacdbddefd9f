import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validateEnv } from '../config/env.config';
import { RenderModule } from '../modules/render/render.module';
import { IngestionModule } from '../modules/ingestion/ingestion.module';
import { ReportModule } from '../modules/report/report.module';
import { CliRunnerService } from './cli-runner.service';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
    RenderModule,
    IngestionModule,
    ReportModule,
  ],
  providers: [CliRunnerService],
})
export class CliModule {}
