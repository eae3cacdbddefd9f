import type { SectionStyle } from '../types/report-types';

/** Defaults applied when a section omits a value */
export const DEFAULT_SECTION_STYLE: Readonly<SectionStyle> = {
  titleBold: false,
  titleItalic: false,
  underline: false,
  headerBold: false,
  borderWidth: 1,
};

/** Shared text used by every renderer */
export const REPORT_TEXT = {
  ROW_NUMBER_HEADER: '#',
  NO_DATA: 'No data',
  UNTITLED_SECTION: 'untitled',
  OUTPUT_BASENAME: 'report',
} as const;

/** Ingestion defaults */
export const INGESTION_DEFAULTS = {
  CSV_DELIMITER: ',',
  CSV_HAS_HEADER: true,
  SYNTHETIC_COLUMN_PREFIX: 'col',
} as const;

/** Upper bounds for request payloads */
export const REPORT_LIMITS = {
  MAX_SECTIONS: 50,
  MAX_COLUMNS: 200,
  MAX_TITLE_LENGTH: 500,
  MAX_LABEL_LENGTH: 200,
  MAX_CSV_LENGTH: 10 * 1024 * 1024,
} as const;
