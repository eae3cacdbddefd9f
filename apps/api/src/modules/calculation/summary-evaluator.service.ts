import { Injectable } from '@nestjs/common';
import type { SummaryItem, TabularData } from '@tabula/shared';
import { formatNumber } from '@tabula/shared';
import { CalculationService } from './calculation.service';

/** Turns a summary item into the text shown after its label */
@Injectable()
export class SummaryEvaluatorService {
  constructor(private readonly calculations: CalculationService) {}

  evaluate(item: SummaryItem, data: TabularData): string {
    if (item.calcType === 'MANUAL') return item.manualValue ?? '';
    if (item.columnName === undefined) return '';

    const values = data.get(item.columnName) ?? [];
    const calc = this.calculations;

    switch (item.calcType) {
      case 'SUM':
        return formatNumber(calc.sum(values));
      case 'AVG':
        return formatNumber(calc.average(values));
      case 'MIN':
        return formatNumber(calc.min(values));
      case 'MAX':
        return formatNumber(calc.max(values));
      case 'COUNT':
        return String(calc.count(values));
      default:
        return item.conditionValue === undefined ? '' : String(calc.countIf(values, item.conditionValue));
    }
  }
}
