export type {
  TabularData,
  ColumnCalcType,
  CalculatedColumn,
  SummaryCalcType,
  SummaryItem,
  SectionStyle,
  Section,
} from './report-types';
export { COLUMN_CALC_TYPES, SUMMARY_CALC_TYPES } from './report-types';

export type {
  CalculationProvider,
  TableRenderOptions,
  SectionRenderCallbacks,
  RendererInfo,
  ReportRenderer,
  RenderedReport,
} from './renderer-types';
