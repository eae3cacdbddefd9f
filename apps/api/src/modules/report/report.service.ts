import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdir, writeFile } from 'fs/promises';
import * as path from 'path';
import type { RenderedReport, RendererInfo, Section, SectionOptions, TabularData } from '@tabula/shared';
import { REPORT_TEXT, createSection } from '@tabula/shared';
import type { EnvConfig } from '../../config/env.config';
import { RendererRegistryService } from '../render/renderer-registry.service';

@Injectable()
export class ReportService {
  private readonly logger = new Logger(ReportService.name);

  constructor(
    private readonly registry: RendererRegistryService,
    private readonly config: ConfigService<EnvConfig, true>,
  ) {}

  formats(): RendererInfo[] {
    return this.registry.list();
  }

  /**
   * Render sections with the renderer registered for `format`.
   * Throws RendererNotFoundError before any work when the format is unknown.
   */
  async render(format: string, sections: readonly Section[]): Promise<RenderedReport> {
    const renderer = this.registry.require(format);
    const content = await renderer.generateReport(sections);

    this.logger.log(`Rendered ${sections.length} section(s) as ${renderer.name} (${content.length} bytes)`);
    return {
      format: renderer.name,
      fileName: `${REPORT_TEXT.OUTPUT_BASENAME}${renderer.defaultFileExtension}`,
      contentType: renderer.contentType,
      content,
    };
  }

  /** One section from raw data, with defaults for every omitted option */
  renderSection(format: string, data: TabularData, options: SectionOptions = {}): Promise<RenderedReport> {
    return this.render(format, [createSection(data, options)]);
  }

  /** Renders and writes `report<ext>` into `outputDir`, returning the written path */
  async writeReport(
    format: string,
    sections: readonly Section[],
    outputDir: string = this.config.get('REPORT_OUTPUT_DIR', { infer: true }),
  ): Promise<string> {
    const report = await this.render(format, sections);
    await mkdir(outputDir, { recursive: true });

    const filePath = path.join(outputDir, report.fileName);
    await writeFile(filePath, report.content);
    this.logger.log(`Report written to ${filePath}`);
    return filePath;
  }
}
