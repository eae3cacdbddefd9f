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
import { REPORT_TEXT, effectiveBorderWidth, getCell, getColumnNames, getRowCount } from '@tabula/shared';
import { ReportComposerService } from './report-composer.service';
import { SummaryEvaluatorService } from '../calculation/summary-evaluator.service';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

function styleAttr(css: string): string {
  return css ? ` style="${css}"` : '';
}

const DOCUMENT_HEAD = [
  '<!DOCTYPE html>',
  '<html lang="en">',
  '<head>',
  '<meta charset="UTF-8"/>',
  '<title>Report</title>',
  '<style>',
  'body { font-family: Arial, sans-serif; margin: 24px; }',
  'table { margin-bottom: 12px; }',
  'th, td { padding: 4px 8px; text-align: left; }',
  '</style>',
  '</head>',
  '<body>',
  '',
].join('\n');

const DOCUMENT_FOOT = '</body>\n</html>\n';

/** Self-contained HTML document; styling is inline so the file renders anywhere */
@Injectable()
export class HtmlRendererService implements ReportRenderer, SectionRenderCallbacks<string[]> {
  readonly name = 'html';
  readonly defaultFileExtension = '.html';
  readonly contentType = 'text/html; charset=utf-8';
  readonly supportsFormatting = true;

  constructor(
    private readonly composer: ReportComposerService,
    private readonly summaries: SummaryEvaluatorService,
  ) {}

  async generateReport(sections: readonly Section[]): Promise<Buffer> {
    const body = this.composer.compose(sections, (): string[] => [], this);
    return Buffer.from(`${DOCUMENT_HEAD}${body.join('')}${DOCUMENT_FOOT}`, 'utf-8');
  }

  renderTitle(out: string[], title: string | undefined, style: SectionStyle): void {
    if (!title?.trim()) return;
    // Bold outermost, underline innermost
    const tags = [style.titleBold && 'b', style.titleItalic && 'i', style.underline && 'u'].filter(
      (tag): tag is string => typeof tag === 'string',
    );
    const open = tags.map((tag) => `<${tag}>`).join('');
    const close = [...tags].reverse().map((tag) => `</${tag}>`).join('');
    out.push(`<h2>${open}${escapeHtml(title)}${close}</h2>\n`);
  }

  renderTable(out: string[], data: TabularData, options: TableRenderOptions): void {
    if (data.size === 0) {
      out.push(`<p><em>${REPORT_TEXT.NO_DATA}</em></p>\n`);
      return;
    }

    const border = effectiveBorderWidth(options.style);
    const cellBorder = border > 0 ? `border:${border}px solid #333;` : '';
    const names = getColumnNames(data);

    out.push(`<table${styleAttr(`border-collapse:collapse;${cellBorder}`)}>\n`);

    if (options.showHeader) {
      const weight = options.style.headerBold ? 'font-weight:bold;' : '';
      const decoration = options.style.underline ? 'text-decoration:underline;' : '';
      const css = `${cellBorder}${weight}${decoration}`;
      // The row-number cell only takes the border
      const numberCell = options.showRowNumbers
        ? `<th${styleAttr(cellBorder)}>${REPORT_TEXT.ROW_NUMBER_HEADER}</th>`
        : '';
      const th = names.map((cell) => `<th${styleAttr(css)}>${escapeHtml(cell)}</th>`);
      out.push(`  <tr>${numberCell}${th.join('')}</tr>\n`);
    }

    const rowCount = getRowCount(data);
    for (let row = 0; row < rowCount; row++) {
      const cells = names.map((name) => escapeHtml(getCell(data, name, row) ?? ''));
      const all = options.showRowNumbers ? [String(row + 1), ...cells] : cells;
      out.push(`  <tr>${all.map((cell) => `<td${styleAttr(cellBorder)}>${cell}</td>`).join('')}</tr>\n`);
    }

    out.push('</table>\n');
  }

  renderSummary(out: string[], summaryItems: readonly SummaryItem[], data: TabularData): void {
    if (summaryItems.length === 0) return;
    out.push('<ul class="summary">\n');
    for (const item of summaryItems) {
      const value = escapeHtml(this.summaries.evaluate(item, data));
      out.push(`  <li><b>${escapeHtml(item.label)}:</b> ${value}</li>\n`);
    }
    out.push('</ul>\n');
  }

  renderSeparator(out: string[]): void {
    out.push('<hr/>\n');
  }
}
