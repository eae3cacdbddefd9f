import { Injectable, Logger } from '@nestjs/common';
import type { Section, SectionRenderCallbacks, TabularData } from '@tabula/shared';
import { describeSection } from '@tabula/shared';
import { CalculatedColumnService } from '../calculation/calculated-column.service';
import { ReportValidatorService } from '../validation/report-validator.service';
import { ReportValidationError } from '../../common/errors/report-errors';

/** A section with its calculated columns applied */
export interface PreparedSection {
  section: Section;
  data: TabularData;
}

/**
 * Report orchestration shared by every format: expand, validate, then emit
 * title, table and summary per section through the format's callbacks.
 */
@Injectable()
export class ReportComposerService {
  private readonly logger = new Logger(ReportComposerService.name);

  constructor(
    private readonly calculatedColumns: CalculatedColumnService,
    private readonly validator: ReportValidatorService,
  ) {}

  /**
   * Applies calculated columns to every section and validates the result.
   * Throws ReportValidationError for the first invalid section.
   */
  prepare(sections: readonly Section[]): PreparedSection[] {
    return sections.map((section) => {
      const data = this.calculatedColumns.apply(section.data, section.calculatedColumns);
      const problem = this.validator.findProblem(data, section.summaryItems, section.calculatedColumns);
      if (problem !== null) {
        const title = describeSection(section);
        this.logger.warn(`Rejected section "${title}": ${problem}`);
        throw new ReportValidationError(title, problem);
      }
      return { section, data };
    });
  }

  /**
   * Renders all sections into a new sink. The sink is only created once every
   * section has passed validation, so a failed call emits nothing.
   */
  compose<TSink>(
    sections: readonly Section[],
    createSink: () => TSink,
    callbacks: SectionRenderCallbacks<TSink>,
  ): TSink {
    const prepared = this.prepare(sections);
    const sink = createSink();

    prepared.forEach(({ section, data }, index) => {
      if (index > 0) callbacks.renderSeparator(sink);
      callbacks.renderTitle(sink, section.title, section.style);
      callbacks.renderTable(sink, data, {
        showRowNumbers: section.showRowNumbers,
        showHeader: section.showHeader,
        style: section.style,
      });
      callbacks.renderSummary(sink, section.summaryItems, data);
    });

    return sink;
  }
}
