import { Injectable, Logger } from '@nestjs/common';
import type { CalculatedColumn, SummaryItem } from '@tabula/shared';
import { createSection } from '@tabula/shared';
import { RendererRegistryService } from '../modules/render/renderer-registry.service';
import { DataSourceService } from '../modules/ingestion/data-source.service';
import { ReportService } from '../modules/report/report.service';
import { parseCliArgs } from './cli-options';
import { defaultCalculatedColumns, defaultSummaryItems } from './cli-defaults';

@Injectable()
export class CliRunnerService {
  private readonly logger = new Logger(CliRunnerService.name);

  constructor(
    private readonly registry: RendererRegistryService,
    private readonly dataSources: DataSourceService,
    private readonly reports: ReportService,
  ) {}

  /** Builds one section from the data file and writes the report; returns its path */
  async run(args: readonly string[]): Promise<string> {
    const { options, warnings } = parseCliArgs(args);
    for (const warning of warnings) this.logger.warn(warning);

    const { titleBold, titleItalic, underline, headerBold, borderWidth } = options.style;
    this.logger.log(
      `format=${options.format} data=${options.dataPath} header=${options.showHeader} ` +
        `rownums=${options.showRowNumbers} summary=${options.includeSummary} calc=${options.includeCalculated} ` +
        `bold=${titleBold} italic=${titleItalic} underline=${underline} headerBold=${headerBold} border=${borderWidth}`,
    );

    // Fail on an unknown format before touching the data file
    const renderer = this.registry.require(options.format);

    const data = await this.dataSources.load(options.dataPath, {
      hasHeader: options.csvHasHeader,
      delimiter: options.delimiter,
    });

    const dataColumns = new Set(data.keys());
    let calculatedColumns: CalculatedColumn[] = [];
    if (options.includeCalculated) {
      calculatedColumns =
        options.calculatedColumns.length > 0 ? options.calculatedColumns : defaultCalculatedColumns(dataColumns);
    }
    const available = new Set([...dataColumns, ...calculatedColumns.map((c) => c.name)]);

    // Explicit summary flags replace the defaults
    let requested: SummaryItem[] = [];
    if (options.includeSummary) {
      requested = options.summaryItems.length > 0 ? options.summaryItems : defaultSummaryItems(available);
    }
    const summaryItems = requested.filter(
      (item) => item.columnName === undefined || available.has(item.columnName),
    );
    if (summaryItems.length < requested.length) {
      const dropped = requested.filter((item) => !summaryItems.includes(item)).map((item) => item.label);
      this.logger.warn(`Dropped summaries over missing columns: ${dropped.join(', ')}`);
    }

    const section = createSection(data, {
      title: options.title,
      summaryItems,
      showRowNumbers: options.showRowNumbers,
      style: options.style,
      showHeader: options.showHeader,
      calculatedColumns,
    });

    return this.reports.writeReport(renderer.name, [section], options.outputDir);
  }
}
