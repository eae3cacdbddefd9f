import { Inject, Injectable, Logger } from '@nestjs/common';
import type { RendererInfo, ReportRenderer } from '@tabula/shared';
import { RendererNotFoundError } from '../../common/errors/report-errors';
import { REPORT_RENDERERS } from './render.constants';

/** Renderers keyed by lower-cased format name */
@Injectable()
export class RendererRegistryService {
  private readonly logger = new Logger(RendererRegistryService.name);
  private readonly renderers = new Map<string, ReportRenderer>();

  constructor(@Inject(REPORT_RENDERERS) renderers: ReportRenderer[]) {
    for (const renderer of renderers) this.register(renderer);
  }

  register(renderer: ReportRenderer): void {
    const key = renderer.name.toLowerCase();
    if (this.renderers.has(key)) {
      this.logger.warn(`Replacing renderer for format "${key}"`);
    }
    this.renderers.set(key, renderer);
  }

  get(format: string): ReportRenderer | undefined {
    return this.renderers.get(format.trim().toLowerCase());
  }

  require(format: string): ReportRenderer {
    const renderer = this.get(format);
    if (!renderer) throw new RendererNotFoundError(format, this.names());
    return renderer;
  }

  names(): string[] {
    return [...this.renderers.keys()];
  }

  list(): RendererInfo[] {
    return [...this.renderers.values()].map(({ name, defaultFileExtension, contentType, supportsFormatting }) => ({
      name,
      defaultFileExtension,
      contentType,
      supportsFormatting,
    }));
  }
}
