import { z } from 'zod';
import { COLUMN_CALC_TYPES, SUMMARY_CALC_TYPES } from '../types/report-types';
import { DEFAULT_SECTION_STYLE, REPORT_LIMITS } from '../constants/report-constants';
import { tabularDataFromColumns, tabularDataFromRecord } from '../utils/tabular-utils';

/** JSON cell: scalars are accepted and stored as strings, null as '' */
export const cellInputSchema = z
  .union([z.string(), z.number(), z.boolean(), z.null()])
  .transform((v) => (v === null ? '' : String(v)));

export const tabularColumnSchema = z.object({
  name: z.string().min(1),
  values: z.array(cellInputSchema),
});

/** Either `[{ name, values }]` (order kept as given) or `{ column: values }` */
export const tabularDataSchema = z
  .union([
    z.array(tabularColumnSchema).max(REPORT_LIMITS.MAX_COLUMNS),
    z.record(z.array(cellInputSchema)),
  ])
  .transform((value) =>
    Array.isArray(value) ? tabularDataFromColumns(value) : tabularDataFromRecord(value),
  );

export const calculatedColumnSchema = z.object({
  name: z.string().min(1).max(REPORT_LIMITS.MAX_LABEL_LENGTH),
  operation: z.enum(COLUMN_CALC_TYPES),
  sourceColumns: z.array(z.string().min(1)),
});

export const summaryItemSchema = z.object({
  label: z.string().max(REPORT_LIMITS.MAX_LABEL_LENGTH),
  calcType: z.enum(SUMMARY_CALC_TYPES),
  columnName: z.string().optional(),
  conditionValue: z.string().optional(),
  manualValue: z.string().optional(),
});

export const sectionStyleSchema = z.object({
  titleBold: z.boolean().default(DEFAULT_SECTION_STYLE.titleBold),
  titleItalic: z.boolean().default(DEFAULT_SECTION_STYLE.titleItalic),
  underline: z.boolean().default(DEFAULT_SECTION_STYLE.underline),
  headerBold: z.boolean().default(DEFAULT_SECTION_STYLE.headerBold),
  borderWidth: z.number().int().default(DEFAULT_SECTION_STYLE.borderWidth),
});

/** Section display options, without data */
export const sectionOptionsSchema = z.object({
  title: z.string().max(REPORT_LIMITS.MAX_TITLE_LENGTH).optional(),
  summaryItems: z.array(summaryItemSchema).default([]),
  showRowNumbers: z.boolean().default(false),
  style: sectionStyleSchema.default({}),
  showHeader: z.boolean().default(true),
  calculatedColumns: z.array(calculatedColumnSchema).default([]),
});

export const sectionSchema = sectionOptionsSchema.extend({
  data: tabularDataSchema,
});

export const reportRequestSchema = z.object({
  sections: z.array(sectionSchema).min(1).max(REPORT_LIMITS.MAX_SECTIONS),
});

export type CalculatedColumnInput = z.infer<typeof calculatedColumnSchema>;
export type SummaryItemInput = z.infer<typeof summaryItemSchema>;
export type SectionStyleInput = z.infer<typeof sectionStyleSchema>;
export type SectionOptionsInput = z.infer<typeof sectionOptionsSchema>;
export type SectionInput = z.infer<typeof sectionSchema>;
export type ReportRequestInput = z.infer<typeof reportRequestSchema>;
