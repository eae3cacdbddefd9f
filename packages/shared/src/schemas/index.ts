export {
  cellInputSchema,
  tabularColumnSchema,
  tabularDataSchema,
  calculatedColumnSchema,
  summaryItemSchema,
  sectionStyleSchema,
  sectionOptionsSchema,
  sectionSchema,
  reportRequestSchema,
  type CalculatedColumnInput,
  type SummaryItemInput,
  type SectionStyleInput,
  type SectionOptionsInput,
  type SectionInput,
  type ReportRequestInput,
} from './report-schema';

export {
  queryCellSchema,
  queryResultSchema,
  csvReportRequestSchema,
  type QueryCell,
  type QueryResultInput,
  type CsvReportRequestInput,
} from './ingestion-schema';
