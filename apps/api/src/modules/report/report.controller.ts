import { Controller, Get, Post, Param, Body, Res, UnprocessableEntityException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ApiTags, ApiOperation, ApiParam, ApiResponse } from '@nestjs/swagger';
import type { FastifyReply } from 'fastify';
import { csvReportRequestSchema, reportRequestSchema } from '@tabula/shared';
import type { CsvReportRequestInput, RenderedReport, RendererInfo, ReportRequestInput } from '@tabula/shared';
import { ZodValidationPipe } from '../../common/pipes/zod-validation.pipe';
import type { EnvConfig } from '../../config/env.config';
import { CsvParserService } from '../ingestion/csv-parser.service';
import { ReportService } from './report.service';

@ApiTags('reports')
@Controller('api/reports')
export class ReportController {
  constructor(
    private readonly reports: ReportService,
    private readonly csvParser: CsvParserService,
    private readonly config: ConfigService<EnvConfig, true>,
  ) {}

  @Get('formats')
  @ApiOperation({ summary: 'List available output formats' })
  @ApiResponse({ status: 200, description: 'Renderer descriptors' })
  formats(): RendererInfo[] {
    return this.reports.formats();
  }

  @Post(':format')
  @ApiOperation({ summary: 'Render sections to a downloadable report' })
  @ApiParam({ name: 'format', description: 'txt, html, markdown or pdf' })
  @ApiResponse({ status: 200, description: 'Report file' })
  async renderReport(
    @Param('format') format: string,
    @Body(new ZodValidationPipe(reportRequestSchema)) body: ReportRequestInput,
    @Res() reply: FastifyReply,
  ): Promise<void> {
    const maxSections = this.config.get('MAX_REPORT_SECTIONS', { infer: true });
    if (body.sections.length > maxSections) {
      throw new UnprocessableEntityException({
        error: 'TOO_MANY_SECTIONS',
        message: `At most ${maxSections} sections per report, got ${body.sections.length}`,
      });
    }

    const report = await this.reports.render(format, body.sections);
    this.sendReport(reply, report);
  }

  @Post(':format/csv')
  @ApiOperation({ summary: 'Render one section from CSV text' })
  @ApiParam({ name: 'format', description: 'txt, html, markdown or pdf' })
  @ApiResponse({ status: 200, description: 'Report file' })
  async renderCsv(
    @Param('format') format: string,
    @Body(new ZodValidationPipe(csvReportRequestSchema)) body: CsvReportRequestInput,
    @Res() reply: FastifyReply,
  ): Promise<void> {
    const data = this.csvParser.parse(
      body.csv,
      body.hasHeader,
      body.delimiter ?? this.config.get('CSV_DELIMITER', { infer: true }),
    );
    const report = await this.reports.renderSection(format, data, body.section);
    this.sendReport(reply, report);
  }

  private sendReport(reply: FastifyReply, report: RenderedReport): void {
    reply
      .status(200)
      .header('Content-Type', report.contentType)
      .header('Content-Disposition', `attachment; filename="${report.fileName}"`)
      .header('Content-Length', report.content.length)
      .send(report.content);
  }
}
