import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { ConfigService } from '@nestjs/config';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { createSection, tabularDataFromRecord } from '@tabula/shared';
import { validateEnv, type EnvConfig } from '../../../config/env.config';
import { CalculationService } from '../../calculation/calculation.service';
import { CalculatedColumnService } from '../../calculation/calculated-column.service';
import { SummaryEvaluatorService } from '../../calculation/summary-evaluator.service';
import { ReportValidatorService } from '../../validation/report-validator.service';
import { ReportComposerService } from '../../render/report-composer.service';
import { TxtRendererService } from '../../render/txt-renderer.service';
import { MarkdownRendererService } from '../../render/markdown-renderer.service';
import { RendererRegistryService } from '../../render/renderer-registry.service';
import { RendererNotFoundError } from '../../../common/errors/report-errors';
import { ReportService } from '../report.service';

describe('ReportService', () => {
  let dir: string;
  let service: ReportService;

  beforeAll(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'tabula-report-'));
    const composer = new ReportComposerService(new CalculatedColumnService(), new ReportValidatorService());
    const summaries = new SummaryEvaluatorService(new CalculationService());
    const registry = new RendererRegistryService([
      new TxtRendererService(composer, summaries),
      new MarkdownRendererService(composer, summaries),
    ]);
    service = new ReportService(registry, new ConfigService<EnvConfig, true>(validateEnv({ REPORT_OUTPUT_DIR: dir })));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const orders = createSection(
    tabularDataFromRecord({ Cena: ['100', '100', '50'], Kolicina: ['2', '1', '3'] }),
    {
      calculatedColumns: [{ name: 'Ukupno', operation: 'MULTIPLY', sourceColumns: ['Cena', 'Kolicina'] }],
      summaryItems: [{ label: 'Total', calcType: 'SUM', columnName: 'Ukupno' }],
    },
  );

  it('renders with the renderer for the format', async () => {
    const report = await service.render('Markdown', [orders]);
    expect(report.format).toBe('markdown');
    expect(report.fileName).toBe('report.md');
    expect(report.contentType).toBe('text/markdown; charset=utf-8');
    expect(report.content.toString('utf-8')).toBe(
      '| Cena | Kolicina | Ukupno |\n' +
        '| --- | --- | --- |\n' +
        '| 100 | 2 | 200 |\n' +
        '| 100 | 1 | 100 |\n' +
        '| 50 | 3 | 150 |\n' +
        '\n' +
        '- **Total:** 450\n',
    );
  });

  it('renders a single section from raw data', async () => {
    const report = await service.renderSection('txt', tabularDataFromRecord({ A: ['1'] }), { title: 'One' });
    expect(report.content.toString('utf-8')).toBe('One\nA\n-\n1\n');
  });

  it('lists formats in registration order', () => {
    expect(service.formats().map((f) => f.name)).toEqual(['txt', 'markdown']);
  });

  it('rejects an unknown format', async () => {
    await expect(service.render('pdf', [orders])).rejects.toBeInstanceOf(RendererNotFoundError);
  });

  it('writes into the configured output directory by default', async () => {
    const written = await service.writeReport('txt', [createSection(tabularDataFromRecord({ A: ['1'] }))]);
    expect(written).toBe(path.join(dir, 'report.txt'));
    expect(await readFile(written, 'utf-8')).toBe('A\n-\n1\n');
  });

  it('creates a given output directory', async () => {
    const nested = path.join(dir, 'nested', 'out');
    const written = await service.writeReport('markdown', [createSection(tabularDataFromRecord({ A: ['1'] }))], nested);
    expect(written).toBe(path.join(nested, 'report.md'));
    expect(await readFile(written, 'utf-8')).toBe('| A |\n| --- |\n| 1 |\n');
  });
});
