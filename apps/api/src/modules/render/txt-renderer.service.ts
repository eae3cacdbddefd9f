import { Injectable } from '@nestjs/common';
import type {
  ReportRenderer,
  Section,
  SectionRenderCallbacks,
  SectionStyle,
  SummaryItem,
  TableRenderOptions,
  TabularData,
} from '@tabula/shared';
import { REPORT_TEXT, getColumnNames, getRowCount } from '@tabula/shared';
import { ReportComposerService } from './report-composer.service';
import { SummaryEvaluatorService } from '../calculation/summary-evaluator.service';

const COLUMN_GAP = '  ';

/** Plain text with space-padded columns. Style flags have no effect. */
@Injectable()
export class TxtRendererService implements ReportRenderer, SectionRenderCallbacks<string[]> {
  readonly name = 'txt';
  readonly defaultFileExtension = '.txt';
  readonly contentType = 'text/plain; charset=utf-8';
  readonly supportsFormatting = false;

  constructor(
    private readonly composer: ReportComposerService,
    private readonly summaries: SummaryEvaluatorService,
  ) {}

  async generateReport(sections: readonly Section[]): Promise<Buffer> {
    const out = this.composer.compose(sections, (): string[] => [], this);
    return Buffer.from(out.join(''), 'utf-8');
  }

  renderTitle(out: string[], title: string | undefined, _style: SectionStyle): void {
    if (!title?.trim()) return;
    out.push(`${title}\n`);
  }

  renderTable(out: string[], data: TabularData, options: TableRenderOptions): void {
    if (data.size === 0) {
      out.push(`[${REPORT_TEXT.NO_DATA}]\n`);
      return;
    }

    const rowCount = getRowCount(data);
    const numberHeader = REPORT_TEXT.ROW_NUMBER_HEADER;
    const numberWidth = Math.max(numberHeader.length, String(rowCount).length);
    const columns = getColumnNames(data).map((name) => {
      const values = data.get(name) ?? [];
      const width = values.reduce((w, v) => Math.max(w, v.length), name.length);
      return { name, values, width };
    });

    const line = (numberCell: string, cells: string[]): string => {
      const all = options.showRowNumbers ? [numberCell.padEnd(numberWidth), ...cells] : cells;
      return `${all.join(COLUMN_GAP)}\n`;
    };

    if (options.showHeader) {
      out.push(line(numberHeader, columns.map((c) => c.name.padEnd(c.width))));
      out.push(
        line(
          '-'.repeat(numberHeader.length),
          columns.map((c) => '-'.repeat(c.name.length).padEnd(c.width)),
        ),
      );
    }

    for (let row = 0; row < rowCount; row++) {
      out.push(line(String(row + 1), columns.map((c) => (c.values[row] ?? '').padEnd(c.width))));
    }
  }

  renderSummary(out: string[], summaryItems: readonly SummaryItem[], data: TabularData): void {
    if (summaryItems.length === 0) return;
    out.push('\n');
    for (const item of summaryItems) {
      out.push(`${item.label}: ${this.summaries.evaluate(item, data)}\n`);
    }
  }

  renderSeparator(out: string[]): void {
    out.push('\n\n');
  }
}
