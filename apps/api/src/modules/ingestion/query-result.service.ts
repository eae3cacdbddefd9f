import { Injectable, Logger } from '@nestjs/common';
import type { QueryCell, TabularData } from '@tabula/shared';
import { INGESTION_DEFAULTS } from '@tabula/shared';
import { uniqueColumnNames } from './column-names';

/** Column metadata plus positional rows, as a database driver returns them */
@Injectable()
export class QueryResultService {
  private readonly logger = new Logger(QueryResultService.name);

  parse(columns: readonly string[], rows: readonly (readonly QueryCell[])[]): TabularData {
    const names = uniqueColumnNames(columns, INGESTION_DEFAULTS.SYNTHETIC_COLUMN_PREFIX, (original, renamed) =>
      this.logger.warn(`Renamed result column "${original}" to "${renamed}"`),
    );

    const data = new Map<string, readonly string[]>();
    names.forEach((name, index) => {
      data.set(
        name,
        rows.map((row) => {
          const cell = row[index];
          return cell === null || cell === undefined ? '' : String(cell);
        }),
      );
    });
    return data;
  }
}
