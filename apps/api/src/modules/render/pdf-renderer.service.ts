import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import PDFDocument from 'pdfkit';
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
import type { EnvConfig } from '../../config/env.config';
import { ReportComposerService } from './report-composer.service';
import { SummaryEvaluatorService } from '../calculation/summary-evaluator.service';

const FONTS = {
  regular: 'Helvetica',
  bold: 'Helvetica-Bold',
  italic: 'Helvetica-Oblique',
  boldItalic: 'Helvetica-BoldOblique',
} as const;

const TITLE_FONT_SIZE = 16;
const BODY_FONT_SIZE = 10;
const CELL_PADDING = 4;
const ROW_HEIGHT = BODY_FONT_SIZE + CELL_PADDING * 2 + 2;

function pickFont(bold: boolean, italic: boolean): string {
  if (bold && italic) return FONTS.boldItalic;
  if (bold) return FONTS.bold;
  if (italic) return FONTS.italic;
  return FONTS.regular;
}

/**
 * PDF via pdfkit. Columns share the page width equally; rows that would cross
 * the bottom margin start a new page.
 */
@Injectable()
export class PdfRendererService implements ReportRenderer, SectionRenderCallbacks<PDFKit.PDFDocument> {
  private readonly logger = new Logger(PdfRendererService.name);

  readonly name = 'pdf';
  readonly defaultFileExtension = '.pdf';
  readonly contentType = 'application/pdf';
  readonly supportsFormatting = true;

  constructor(
    private readonly composer: ReportComposerService,
    private readonly summaries: SummaryEvaluatorService,
    private readonly config: ConfigService<EnvConfig, true>,
  ) {}

  async generateReport(sections: readonly Section[]): Promise<Buffer> {
    const doc = this.composer.compose(sections, () => this.createDocument(), this);
    const content = this.collect(doc);
    doc.end();
    const buffer = await content;
    this.logger.debug(`Rendered ${sections.length} section(s) to ${buffer.length} PDF bytes`);
    return buffer;
  }

  renderTitle(doc: PDFKit.PDFDocument, title: string | undefined, style: SectionStyle): void {
    if (!title?.trim()) return;
    doc
      .font(pickFont(style.titleBold, style.titleItalic))
      .fontSize(TITLE_FONT_SIZE)
      .text(title, { underline: style.underline });
    doc.moveDown(0.5);
  }

  renderTable(doc: PDFKit.PDFDocument, data: TabularData, options: TableRenderOptions): void {
    const left = doc.page.margins.left;
    doc.x = left;

    if (data.size === 0) {
      doc.font(FONTS.italic).fontSize(BODY_FONT_SIZE).text(REPORT_TEXT.NO_DATA);
      doc.moveDown(0.5);
      return;
    }

    const names = getColumnNames(data);
    const headerCells = options.showRowNumbers ? [REPORT_TEXT.ROW_NUMBER_HEADER, ...names] : names;
    const contentWidth = doc.page.width - left - doc.page.margins.right;
    const columnWidth = contentWidth / headerCells.length;
    const border = effectiveBorderWidth(options.style);

    const drawRow = (cells: readonly string[], font: string): void => {
      if (doc.y + ROW_HEIGHT > doc.page.height - doc.page.margins.bottom) {
        doc.addPage();
      }
      const top = doc.y;
      cells.forEach((cell, index) => {
        const x = left + index * columnWidth;
        if (border > 0) {
          doc.lineWidth(border).rect(x, top, columnWidth, ROW_HEIGHT).stroke();
        }
        doc
          .font(font)
          .fontSize(BODY_FONT_SIZE)
          .text(cell, x + CELL_PADDING, top + CELL_PADDING, {
            width: columnWidth - CELL_PADDING * 2,
            lineBreak: false,
            ellipsis: true,
          });
      });
      doc.x = left;
      doc.y = top + ROW_HEIGHT;
    };

    if (options.showHeader) {
      drawRow(headerCells, options.style.headerBold ? FONTS.bold : FONTS.regular);
    }

    const rowCount = getRowCount(data);
    for (let row = 0; row < rowCount; row++) {
      const cells = names.map((name) => getCell(data, name, row) ?? '');
      drawRow(options.showRowNumbers ? [String(row + 1), ...cells] : cells, FONTS.regular);
    }

    doc.moveDown(0.5);
  }

  renderSummary(doc: PDFKit.PDFDocument, summaryItems: readonly SummaryItem[], data: TabularData): void {
    if (summaryItems.length === 0) return;
    doc.x = doc.page.margins.left;
    for (const item of summaryItems) {
      doc
        .fontSize(BODY_FONT_SIZE)
        .font(FONTS.bold)
        .text(`${item.label}: `, { continued: true })
        .font(FONTS.regular)
        .text(this.summaries.evaluate(item, data));
    }
  }

  renderSeparator(doc: PDFKit.PDFDocument): void {
    doc.moveDown();
    const y = doc.y;
    doc
      .lineWidth(1)
      .moveTo(doc.page.margins.left, y)
      .lineTo(doc.page.width - doc.page.margins.right, y)
      .stroke();
    doc.moveDown();
  }

  private createDocument(): PDFKit.PDFDocument {
    return new PDFDocument({
      size: this.config.get('PDF_PAGE_SIZE', { infer: true }),
      margin: this.config.get('PDF_MARGIN', { infer: true }),
      info: { Title: 'Report' },
    });
  }

  private collect(doc: PDFKit.PDFDocument): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      doc.on('data', (chunk: Buffer) => chunks.push(chunk));
      doc.on('end', () => resolve(Buffer.concat(chunks)));
      doc.on('error', reject);
    });
  }
}
