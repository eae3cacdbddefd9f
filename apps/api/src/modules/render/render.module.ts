import { Module } from '@nestjs/common';
import type { ReportRenderer } from '@tabula/shared';
import { CalculationModule } from '../calculation/calculation.module';
import { ValidationModule } from '../validation/validation.module';
import { ReportComposerService } from './report-composer.service';
import { TxtRendererService } from './txt-renderer.service';
import { HtmlRendererService } from './html-renderer.service';
import { MarkdownRendererService } from './markdown-renderer.service';
import { PdfRendererService } from './pdf-renderer.service';
import { RendererRegistryService } from './renderer-registry.service';
import { REPORT_RENDERERS } from './render.constants';

@Module({
  imports: [CalculationModule, ValidationModule],
  providers: [
    ReportComposerService,
    TxtRendererService,
    HtmlRendererService,
    MarkdownRendererService,
    PdfRendererService,
    {
      provide: REPORT_RENDERERS,
      useFactory: (...renderers: ReportRenderer[]): ReportRenderer[] => renderers,
      inject: [TxtRendererService, HtmlRendererService, MarkdownRendererService, PdfRendererService],
    },
    RendererRegistryService,
  ],
  exports: [ReportComposerService, RendererRegistryService],
})
export class RenderModule {}
