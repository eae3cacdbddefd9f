import { Injectable } from '@nestjs/common';
import type { CalculationProvider } from '@tabula/shared';
import { parseDecimal } from '@tabula/shared';

/**
 * Column aggregates for summaries. Cells that do not parse as numbers are
 * skipped by sum/average/min/max; count includes every cell.
 */
@Injectable()
export class CalculationService implements CalculationProvider {
  sum(values: readonly string[]): number {
    return this.toNumbers(values).reduce((acc, n) => acc + n, 0);
  }

  average(values: readonly string[]): number {
    const nums = this.toNumbers(values);
    if (nums.length === 0) return 0;
    return nums.reduce((acc, n) => acc + n, 0) / nums.length;
  }

  min(values: readonly string[]): number {
    const nums = this.toNumbers(values);
    return nums.length === 0 ? 0 : nums.reduce((acc, n) => (n < acc ? n : acc));
  }

  max(values: readonly string[]): number {
    const nums = this.toNumbers(values);
    return nums.length === 0 ? 0 : nums.reduce((acc, n) => (n > acc ? n : acc));
  }

  count(values: readonly string[]): number {
    return values.length;
  }

  /** Exact string match, no trimming */
  countIf(values: readonly string[], conditionValue: string): number {
    return values.filter((v) => v === conditionValue).length;
  }

  private toNumbers(values: readonly string[]): number[] {
    const nums: number[] = [];
    for (const value of values) {
      const parsed = parseDecimal(value);
      if (parsed !== null) nums.push(parsed);
    }
    return nums;
  }
}
