import { describe, it, expect } from 'vitest';
import { tabularDataFromRecord } from '@tabula/shared';
import { ReportValidatorService } from '../report-validator.service';

const validator = new ReportValidatorService();
const data = tabularDataFromRecord({ Name: ['Ann', 'Bob'], Score: ['10', '20'] });

describe('ReportValidatorService.validate', () => {
  it('accepts consistent data, summaries and calculated columns', () => {
    expect(
      validator.validate(
        data,
        [
          { label: 'Total', calcType: 'SUM', columnName: 'Score' },
          { label: 'Ann', calcType: 'COUNT_IF', columnName: 'Name', conditionValue: 'Ann' },
          { label: 'Note', calcType: 'MANUAL', manualValue: 'ok' },
        ],
        [{ name: 'Double', operation: 'SUM', sourceColumns: ['Score', 'Score'] }],
      ),
    ).toBe(true);
  });

  it('rejects data without columns', () => {
    expect(validator.validate(new Map(), [], [])).toBe(false);
  });

  it.each(['SUM', 'AVG', 'MIN', 'MAX', 'COUNT'] as const)(
    'rejects %s over a missing column',
    (calcType) => {
      expect(validator.validate(data, [{ label: 'x', calcType, columnName: 'Missing' }], [])).toBe(false);
    },
  );

  it('rejects DIFF with one source column', () => {
    expect(validator.validate(data, [], [{ name: 'D', operation: 'DIFF', sourceColumns: ['Score'] }])).toBe(
      false,
    );
  });
});

describe('ReportValidatorService.findProblem', () => {
  it('returns null for valid input', () => {
    expect(validator.findProblem(data, [], [])).toBeNull();
  });

  it('names a column with a different row count', () => {
    const ragged = tabularDataFromRecord({ A: ['1', '2'], B: ['1'] });
    expect(validator.findProblem(ragged, [], [])).toBe('column "B" has 1 rows, expected 2');
  });

  it('requires a manual value for MANUAL items', () => {
    expect(validator.findProblem(data, [{ label: 'Note', calcType: 'MANUAL' }], [])).toBe(
      'summary item "Note" (MANUAL) has no manual value',
    );
  });

  it('requires a condition for COUNT_IF', () => {
    expect(
      validator.findProblem(data, [{ label: 'Ann', calcType: 'COUNT_IF', columnName: 'Name' }], []),
    ).toBe('summary item "Ann" (COUNT_IF) has no condition value');
  });

  it('requires a column for aggregates', () => {
    expect(validator.findProblem(data, [{ label: 'Total', calcType: 'SUM' }], [])).toBe(
      'summary item "Total" (SUM) has no column',
    );
  });

  it('requires two sources for SUM and MULTIPLY', () => {
    expect(
      validator.findProblem(data, [], [{ name: 'P', operation: 'MULTIPLY', sourceColumns: ['Score'] }]),
    ).toBe('calculated column "P" (MULTIPLY) needs at least 2 source columns, got 1');
  });

  it('requires exactly two sources for DIVIDE', () => {
    expect(
      validator.findProblem(
        data,
        [],
        [{ name: 'Q', operation: 'DIVIDE', sourceColumns: ['Score', 'Score', 'Score'] }],
      ),
    ).toBe('calculated column "Q" (DIVIDE) needs exactly 2 source columns, got 3');
  });

  it('rejects empty source lists', () => {
    expect(validator.findProblem(data, [], [{ name: 'S', operation: 'SUM', sourceColumns: [] }])).toBe(
      'calculated column "S" has no source columns',
    );
  });

  it('names an unknown source column', () => {
    expect(
      validator.findProblem(data, [], [{ name: 'S', operation: 'SUM', sourceColumns: ['Score', 'Bonus'] }]),
    ).toBe('calculated column "S" refers to unknown column "Bonus"');
  });

  it('stops at the first problem', () => {
    expect(
      validator.findProblem(
        new Map(),
        [{ label: 'Total', calcType: 'SUM', columnName: 'Missing' }],
        [],
      ),
    ).toBe('data has no columns');
  });
});
