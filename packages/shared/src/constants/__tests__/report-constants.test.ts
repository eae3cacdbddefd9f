import { describe, it, expect } from 'vitest';
import { DEFAULT_SECTION_STYLE, REPORT_TEXT, INGESTION_DEFAULTS } from '../report-constants';

describe('DEFAULT_SECTION_STYLE', () => {
  it('has no styling and a 1px border', () => {
    expect(DEFAULT_SECTION_STYLE).toEqual({
      titleBold: false,
      titleItalic: false,
      underline: false,
      headerBold: false,
      borderWidth: 1,
    });
  });
});

describe('REPORT_TEXT', () => {
  it('names the row number column #', () => {
    expect(REPORT_TEXT.ROW_NUMBER_HEADER).toBe('#');
  });

  it('writes files named report', () => {
    expect(REPORT_TEXT.OUTPUT_BASENAME).toBe('report');
  });
});

describe('INGESTION_DEFAULTS', () => {
  it('reads comma separated files with a header', () => {
    expect(INGESTION_DEFAULTS.CSV_DELIMITER).toBe(',');
    expect(INGESTION_DEFAULTS.CSV_HAS_HEADER).toBe(true);
  });
});
