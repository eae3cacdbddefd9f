import { Module } from '@nestjs/common';
import { CalculationService } from './calculation.service';
import { CalculatedColumnService } from './calculated-column.service';
import { SummaryEvaluatorService } from './summary-evaluator.service';

@Module({
  providers: [CalculationService, CalculatedColumnService, SummaryEvaluatorService],
  exports: [CalculationService, CalculatedColumnService, SummaryEvaluatorService],
})
export class CalculationModule {}
