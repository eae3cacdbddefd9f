import { describe, it, expect } from 'vitest';
import {
  tabularDataSchema,
  summaryItemSchema,
  calculatedColumnSchema,
  sectionSchema,
  reportRequestSchema,
} from '../report-schema';

describe('tabularDataSchema', () => {
  it('accepts the record form', () => {
    const result = tabularDataSchema.safeParse({ Name: ['Ann'], Score: ['10'] });
    expect(result.success).toBe(true);
    if (result.success) {
      expect([...result.data.keys()]).toEqual(['Name', 'Score']);
    }
  });

  it('accepts the column list form and keeps its order', () => {
    const result = tabularDataSchema.safeParse([
      { name: 'Region', values: ['North'] },
      { name: '2024', values: ['5'] },
    ]);
    expect(result.success).toBe(true);
    if (result.success) {
      expect([...result.data.keys()]).toEqual(['Region', '2024']);
    }
  });

  it('stores scalar cells as strings and null as empty', () => {
    const result = tabularDataSchema.safeParse({ A: [1, true, null, 'x'] });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.get('A')).toEqual(['1', 'true', '', 'x']);
    }
  });

  it('rejects nested objects as cells', () => {
    expect(tabularDataSchema.safeParse({ A: [{ v: 1 }] }).success).toBe(false);
  });
});

describe('summaryItemSchema', () => {
  it('accepts a SUM item', () => {
    const result = summaryItemSchema.safeParse({ label: 'Total', calcType: 'SUM', columnName: 'Price' });
    expect(result.success).toBe(true);
  });

  it('rejects unknown calc types', () => {
    const result = summaryItemSchema.safeParse({ label: 'Median', calcType: 'MEDIAN', columnName: 'Price' });
    expect(result.success).toBe(false);
  });
});

describe('calculatedColumnSchema', () => {
  it('accepts a MULTIPLY column', () => {
    const result = calculatedColumnSchema.safeParse({
      name: 'Total',
      operation: 'MULTIPLY',
      sourceColumns: ['Price', 'Qty'],
    });
    expect(result.success).toBe(true);
  });

  it('rejects an empty name', () => {
    const result = calculatedColumnSchema.safeParse({ name: '', operation: 'SUM', sourceColumns: [] });
    expect(result.success).toBe(false);
  });
});

describe('sectionSchema', () => {
  it('applies defaults', () => {
    const result = sectionSchema.safeParse({ data: { A: ['1'] } });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.title).toBeUndefined();
      expect(result.data.summaryItems).toEqual([]);
      expect(result.data.calculatedColumns).toEqual([]);
      expect(result.data.showHeader).toBe(true);
      expect(result.data.showRowNumbers).toBe(false);
      expect(result.data.style).toEqual({
        titleBold: false,
        titleItalic: false,
        underline: false,
        headerBold: false,
        borderWidth: 1,
      });
    }
  });

  it('keeps a negative border width for renderers to clamp', () => {
    const result = sectionSchema.safeParse({ data: { A: ['1'] }, style: { borderWidth: -2 } });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.style.borderWidth).toBe(-2);
    }
  });

  it('rejects a fractional border width', () => {
    const result = sectionSchema.safeParse({ data: { A: ['1'] }, style: { borderWidth: 1.5 } });
    expect(result.success).toBe(false);
  });
});

describe('reportRequestSchema', () => {
  it('requires at least one section', () => {
    expect(reportRequestSchema.safeParse({ sections: [] }).success).toBe(false);
  });

  it('rejects more than 50 sections', () => {
    const sections = Array.from({ length: 51 }, () => ({ data: { A: ['1'] } }));
    expect(reportRequestSchema.safeParse({ sections }).success).toBe(false);
  });
});
