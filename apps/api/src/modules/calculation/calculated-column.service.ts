import { Injectable, Logger } from '@nestjs/common';
import type { CalculatedColumn, TabularData } from '@tabula/shared';
import { formatNumber, getRowCount, parseCellNumber } from '@tabula/shared';

type ColumnLookup = ReadonlyMap<string, readonly string[]>;

/**
 * Derives calculated columns from existing ones.
 *
 * Columns are computed in order against a working copy, so a later
 * calculated column can use an earlier one as a source. Missing or
 * unparseable cells count as 0 for SUM/DIFF/DIVIDE numerators, are left out
 * of MULTIPLY, and make a DIVIDE row 0 when they are the divisor.
 */
@Injectable()
export class CalculatedColumnService {
  private readonly logger = new Logger(CalculatedColumnService.name);

  apply(data: TabularData, calculatedColumns: readonly CalculatedColumn[]): TabularData {
    if (calculatedColumns.length === 0 || data.size === 0) return data;

    const working = new Map<string, readonly string[]>(data);
    const rowCount = getRowCount(data);

    for (const calc of calculatedColumns) {
      const values = this.computeColumn(working, calc, rowCount);
      if (values === null) {
        this.logger.debug(
          `Skipped calculated column "${calc.name}": ${calc.operation} with ${calc.sourceColumns.length} source column(s)`,
        );
        continue;
      }
      working.set(calc.name, values);
    }

    return working;
  }

  private computeColumn(
    columns: ColumnLookup,
    calc: CalculatedColumn,
    rowCount: number,
  ): string[] | null {
    const sources = calc.sourceColumns;
    if (sources.length === 0) return null;

    const cell = (column: string, row: number): number | null =>
      parseCellNumber(columns.get(column)?.[row]);

    switch (calc.operation) {
      case 'SUM':
        return this.mapRows(rowCount, (row) =>
          sources.reduce((acc, src) => acc + (cell(src, row) ?? 0), 0),
        );

      case 'MULTIPLY':
        return this.mapRows(rowCount, (row) => {
          let product: number | null = null;
          for (const src of sources) {
            const value = cell(src, row);
            if (value === null) continue;
            product = product === null ? value : product * value;
          }
          return product ?? 0;
        });

      case 'DIFF': {
        const [left, right] = sources;
        if (left === undefined || right === undefined) return null;
        return this.mapRows(rowCount, (row) => (cell(left, row) ?? 0) - (cell(right, row) ?? 0));
      }

      case 'DIVIDE': {
        const [dividend, divisor] = sources;
        if (dividend === undefined || divisor === undefined) return null;
        return this.mapRows(rowCount, (row) => {
          const denominator = cell(divisor, row);
          if (denominator === null || denominator === 0) return 0;
          return (cell(dividend, row) ?? 0) / denominator;
        });
      }
    }
  }

  private mapRows(rowCount: number, compute: (row: number) => number): string[] {
    return Array.from({ length: rowCount }, (_, row) => formatNumber(compute(row)));
  }
}
