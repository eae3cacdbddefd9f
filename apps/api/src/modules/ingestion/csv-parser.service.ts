import { Injectable, Logger } from '@nestjs/common';
import type { TabularData } from '@tabula/shared';
import { INGESTION_DEFAULTS } from '@tabula/shared';
import { uniqueColumnNames } from './column-names';

/**
 * Delimited text to tabular data. Fields are split on the delimiter as-is;
 * quoting is not interpreted.
 */
@Injectable()
export class CsvParserService {
  private readonly logger = new Logger(CsvParserService.name);

  parse(
    content: string,
    hasHeader: boolean = INGESTION_DEFAULTS.CSV_HAS_HEADER,
    delimiter: string = INGESTION_DEFAULTS.CSV_DELIMITER,
  ): TabularData {
    const lines = content
      .split(/\r\n|\r|\n/)
      .map((line) => line.trimEnd())
      .filter((line) => line.length > 0);

    const rows = lines.map((line) => line.split(delimiter).map((field) => field.trim()));
    const [first, ...rest] = rows;
    if (!first) return new Map();

    const names = hasHeader
      ? uniqueColumnNames(first, INGESTION_DEFAULTS.SYNTHETIC_COLUMN_PREFIX, (original, renamed) =>
          this.logger.warn(`Renamed CSV column "${original}" to "${renamed}"`),
        )
      : first.map((_, index) => `${INGESTION_DEFAULTS.SYNTHETIC_COLUMN_PREFIX}${index}`);
    const dataRows = hasHeader ? rest : rows;

    const data = new Map<string, readonly string[]>();
    names.forEach((name, index) => {
      data.set(
        name,
        dataRows.map((fields) => fields[index] ?? ''),
      );
    });
    return data;
  }
}
