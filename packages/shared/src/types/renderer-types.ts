import type { Section, SectionStyle, SummaryItem, TabularData } from './report-types';

/** Aggregate functions over the cells of a single column */
export interface CalculationProvider {
  sum(values: readonly string[]): number;
  average(values: readonly string[]): number;
  min(values: readonly string[]): number;
  max(values: readonly string[]): number;
  count(values: readonly string[]): number;
  countIf(values: readonly string[], conditionValue: string): number;
}

/** Table display options taken from a section */
export interface TableRenderOptions {
  showRowNumbers: boolean;
  showHeader: boolean;
  style: SectionStyle;
}

/**
 * Format-specific emission primitives. The shared composer drives these for
 * every section; `TSink` is whatever the format accumulates into.
 */
export interface SectionRenderCallbacks<TSink> {
  renderTitle(sink: TSink, title: string | undefined, style: SectionStyle): void;
  renderTable(sink: TSink, data: TabularData, options: TableRenderOptions): void;
  renderSummary(sink: TSink, summaryItems: readonly SummaryItem[], data: TabularData): void;
  renderSeparator(sink: TSink): void;
}

/** Public descriptor of a registered output format */
export interface RendererInfo {
  name: string;
  defaultFileExtension: string;
  contentType: string;
  supportsFormatting: boolean;
}

/** A report output format */
export interface ReportRenderer extends RendererInfo {
  generateReport(sections: readonly Section[]): Promise<Buffer>;
}

/** Rendered report bytes plus what is needed to store or serve them */
export interface RenderedReport {
  format: string;
  fileName: string;
  contentType: string;
  content: Buffer;
}
