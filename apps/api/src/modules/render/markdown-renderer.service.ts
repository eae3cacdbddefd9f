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
import { REPORT_TEXT, getCell, getColumnNames, getRowCount } from '@tabula/shared';
import { ReportComposerService } from './report-composer.service';
import { SummaryEvaluatorService } from '../calculation/summary-evaluator.service';

/** Pipes would split a table cell, line breaks would end the row */
export function escapeMarkdown(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\r\n|\r|\n/g, ' ');
}

function emphasize(text: string, bold: boolean, italic: boolean): string {
  if (bold && italic) return `***${text}***`;
  if (bold) return `**${text}**`;
  if (italic) return `_${text}_`;
  return text;
}

function tableRow(cells: string[]): string {
  return `| ${cells.join(' | ')} |\n`;
}

@Injectable()
export class MarkdownRendererService implements ReportRenderer, SectionRenderCallbacks<string[]> {
  readonly name = 'markdown';
  readonly defaultFileExtension = '.md';
  readonly contentType = 'text/markdown; charset=utf-8';
  readonly supportsFormatting = true;

  constructor(
    private readonly composer: ReportComposerService,
    private readonly summaries: SummaryEvaluatorService,
  ) {}

  async generateReport(sections: readonly Section[]): Promise<Buffer> {
    const out = this.composer.compose(sections, (): string[] => [], this);
    return Buffer.from(out.join(''), 'utf-8');
  }

  renderTitle(out: string[], title: string | undefined, style: SectionStyle): void {
    if (!title?.trim()) return;
    let text = emphasize(escapeMarkdown(title), style.titleBold, style.titleItalic);
    if (style.underline) text = `<u>${text}</u>`;
    out.push(`## ${text}\n\n`);
  }

  renderTable(out: string[], data: TabularData, options: TableRenderOptions): void {
    if (data.size === 0) {
      out.push(`_${REPORT_TEXT.NO_DATA}_\n`);
      return;
    }

    const names = getColumnNames(data);
    const headerCells = options.showRowNumbers ? [REPORT_TEXT.ROW_NUMBER_HEADER, ...names] : names;

    // A markdown table always needs a header row; hidden headers leave it blank.
    out.push(
      tableRow(
        options.showHeader
          ? headerCells.map((cell) => emphasize(escapeMarkdown(cell), options.style.headerBold, false))
          : headerCells.map(() => ''),
      ),
    );
    out.push(tableRow(headerCells.map(() => '---')));

    const rowCount = getRowCount(data);
    for (let row = 0; row < rowCount; row++) {
      const cells = names.map((name) => escapeMarkdown(getCell(data, name, row) ?? ''));
      out.push(tableRow(options.showRowNumbers ? [String(row + 1), ...cells] : cells));
    }
  }

  renderSummary(out: string[], summaryItems: readonly SummaryItem[], data: TabularData): void {
    if (summaryItems.length === 0) return;
    out.push('\n');
    for (const item of summaryItems) {
      const label = escapeMarkdown(item.label);
      const value = escapeMarkdown(this.summaries.evaluate(item, data));
      out.push(`- **${label}:** ${value}\n`);
    }
  }

  renderSeparator(out: string[]): void {
    out.push('\n---\n\n');
  }
}
