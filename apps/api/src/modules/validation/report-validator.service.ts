import { Injectable, Logger } from '@nestjs/common';
import type { CalculatedColumn, SummaryItem, TabularData } from '@tabula/shared';
import { getRowCount } from '@tabula/shared';

/**
 * Structural and referential checks run on a section after its calculated
 * columns are applied. Checks stop at the first problem.
 */
@Injectable()
export class ReportValidatorService {
  private readonly logger = new Logger(ReportValidatorService.name);

  validate(
    data: TabularData,
    summaryItems: readonly SummaryItem[],
    calculatedColumns: readonly CalculatedColumn[],
  ): boolean {
    const problem = this.findProblem(data, summaryItems, calculatedColumns);
    if (problem !== null) {
      this.logger.warn(`Validation failed: ${problem}`);
      return false;
    }
    return true;
  }

  /** First problem found, or null when the section can be rendered */
  findProblem(
    data: TabularData,
    summaryItems: readonly SummaryItem[],
    calculatedColumns: readonly CalculatedColumn[],
  ): string | null {
    return (
      this.checkData(data) ??
      this.checkSummaryItems(data, summaryItems) ??
      this.checkCalculatedColumns(data, calculatedColumns)
    );
  }

  private checkData(data: TabularData): string | null {
    if (data.size === 0) return 'data has no columns';

    const expected = getRowCount(data);
    for (const [column, values] of data) {
      if (values.length !== expected) {
        return `column "${column}" has ${values.length} rows, expected ${expected}`;
      }
    }
    return null;
  }

  private checkSummaryItems(data: TabularData, items: readonly SummaryItem[]): string | null {
    for (const item of items) {
      const label = `summary item "${item.label}"`;

      if (item.calcType === 'MANUAL') {
        if (item.manualValue === undefined) return `${label} (MANUAL) has no manual value`;
        continue;
      }

      if (item.columnName === undefined) return `${label} (${item.calcType}) has no column`;
      if (item.calcType === 'COUNT_IF' && item.conditionValue === undefined) {
        return `${label} (COUNT_IF) has no condition value`;
      }
      if (!data.has(item.columnName)) {
        return `${label} refers to unknown column "${item.columnName}"`;
      }
    }
    return null;
  }

  private checkCalculatedColumns(
    data: TabularData,
    columns: readonly CalculatedColumn[],
  ): string | null {
    for (const calc of columns) {
      const label = `calculated column "${calc.name}"`;
      const count = calc.sourceColumns.length;

      if (count === 0) return `${label} has no source columns`;
      if ((calc.operation === 'SUM' || calc.operation === 'MULTIPLY') && count < 2) {
        return `${label} (${calc.operation}) needs at least 2 source columns, got ${count}`;
      }
      if ((calc.operation === 'DIFF' || calc.operation === 'DIVIDE') && count !== 2) {
        return `${label} (${calc.operation}) needs exactly 2 source columns, got ${count}`;
      }

      const missing = calc.sourceColumns.find((src) => !data.has(src));
      if (missing !== undefined) return `${label} refers to unknown column "${missing}"`;
    }
    return null;
  }
}
