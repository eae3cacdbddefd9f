export {
  DEFAULT_SECTION_STYLE,
  REPORT_TEXT,
  INGESTION_DEFAULTS,
  REPORT_LIMITS,
} from './report-constants';
