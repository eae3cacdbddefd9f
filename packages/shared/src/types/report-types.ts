/**
 * Ordered column name → cell values. Map insertion order is the column order,
 * so numeric-looking column names keep their position.
 */
export type TabularData = ReadonlyMap<string, readonly string[]>;

/** Arithmetic operations for calculated columns */
export const COLUMN_CALC_TYPES = ['SUM', 'DIFF', 'MULTIPLY', 'DIVIDE'] as const;
export type ColumnCalcType = (typeof COLUMN_CALC_TYPES)[number];

/** A column derived from other columns when a section is rendered */
export interface CalculatedColumn {
  name: string;
  operation: ColumnCalcType;
  /** DIFF and DIVIDE use exactly two: first minus / divided by second */
  sourceColumns: string[];
}

/** Aggregates available in a section summary */
export const SUMMARY_CALC_TYPES = ['SUM', 'AVG', 'MIN', 'MAX', 'COUNT', 'COUNT_IF', 'MANUAL'] as const;
export type SummaryCalcType = (typeof SUMMARY_CALC_TYPES)[number];

/** One labelled line under a section table */
export interface SummaryItem {
  label: string;
  calcType: SummaryCalcType;
  columnName?: string;
  /** COUNT_IF only: cells equal to this string are counted */
  conditionValue?: string;
  /** MANUAL only: shown as-is */
  manualValue?: string;
}

/** Presentation flags; ignored by formats without styling */
export interface SectionStyle {
  titleBold: boolean;
  titleItalic: boolean;
  underline: boolean;
  headerBold: boolean;
  /** 0 means no borders. Negative values are treated as 0. */
  borderWidth: number;
}

/** One titled block of a report: table + summary + display options */
export interface Section {
  title?: string;
  data: TabularData;
  summaryItems: SummaryItem[];
  showRowNumbers: boolean;
  style: SectionStyle;
  showHeader: boolean;
  calculatedColumns: CalculatedColumn[];
}
