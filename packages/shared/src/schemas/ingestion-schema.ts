import { z } from 'zod';
import { REPORT_LIMITS } from '../constants/report-constants';
import { sectionOptionsSchema } from './report-schema';

export const queryCellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

/** Query result as column metadata plus positional rows */
export const queryResultSchema = z.object({
  columns: z.array(z.string().min(1)).min(1).max(REPORT_LIMITS.MAX_COLUMNS),
  rows: z.array(z.array(queryCellSchema)),
});

/** Render one section straight from CSV text */
export const csvReportRequestSchema = z.object({
  csv: z.string().min(1).max(REPORT_LIMITS.MAX_CSV_LENGTH),
  hasHeader: z.boolean().default(true),
  delimiter: z.string().length(1).optional(),
  section: sectionOptionsSchema.default({}),
});

export type QueryCell = z.infer<typeof queryCellSchema>;
export type QueryResultInput = z.infer<typeof queryResultSchema>;
export type CsvReportRequestInput = z.infer<typeof csvReportRequestSchema>;
