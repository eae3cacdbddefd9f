import { describe, it, expect } from 'vitest';
import { CalculationService } from '../calculation.service';

const calc = new CalculationService();

describe('CalculationService.sum', () => {
  it('skips unparseable cells', () => {
    expect(calc.sum(['1', 'x', '3'])).toBe(4);
  });

  it('trims cells before parsing', () => {
    expect(calc.sum([' 2 ', '3'])).toBe(5);
  });

  it('does not treat a comma as decimal separator', () => {
    expect(calc.sum(['2,5', '1'])).toBe(1);
  });

  it('is 0 for empty input', () => {
    expect(calc.sum([])).toBe(0);
    expect(calc.sum(['a', ''])).toBe(0);
  });
});

describe('CalculationService.average', () => {
  it('averages parsed cells only', () => {
    expect(calc.average(['2', 'n/a', '4'])).toBe(3);
  });

  it('is 0 when nothing parses', () => {
    expect(calc.average([])).toBe(0);
    expect(calc.average(['-', ''])).toBe(0);
  });
});

describe('CalculationService.min / max', () => {
  it('finds the extremes of parsed cells', () => {
    expect(calc.min(['5', '-2', 'x', '7'])).toBe(-2);
    expect(calc.max(['5', '-2', 'x', '7'])).toBe(7);
  });

  it('is 0 when nothing parses', () => {
    expect(calc.min(['x'])).toBe(0);
    expect(calc.max([])).toBe(0);
  });
});

describe('CalculationService.count', () => {
  it('counts every cell, including blanks', () => {
    expect(calc.count(['A', 'B', 'A'])).toBe(3);
    expect(calc.count(['', 'x', '1'])).toBe(3);
  });
});

describe('CalculationService.countIf', () => {
  it('counts exact matches', () => {
    expect(calc.countIf(['A', 'B', 'A'], 'A')).toBe(2);
  });

  it('does not trim or coerce', () => {
    expect(calc.countIf(['100', ' 100', '100.0'], '100')).toBe(1);
  });
});
