import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFile } from 'fs/promises';
import * as path from 'path';
import type { TabularData } from '@tabula/shared';
import { getRowCount, queryResultSchema } from '@tabula/shared';
import type { EnvConfig } from '../../config/env.config';
import { DataSourceFormatError, DataSourceNotFoundError } from '../../common/errors/report-errors';
import { CsvParserService } from './csv-parser.service';
import { QueryResultService } from './query-result.service';

export interface DataSourceOptions {
  /** CSV only; defaults to true */
  hasHeader?: boolean;
  /** CSV only; defaults to CSV_DELIMITER */
  delimiter?: string;
}

/** Loads a `.json` query result or a delimited text file from disk */
@Injectable()
export class DataSourceService {
  private readonly logger = new Logger(DataSourceService.name);

  constructor(
    private readonly csvParser: CsvParserService,
    private readonly queryResults: QueryResultService,
    private readonly config: ConfigService<EnvConfig, true>,
  ) {}

  async load(sourcePath: string, options: DataSourceOptions = {}): Promise<TabularData> {
    const content = await this.read(sourcePath);
    const data =
      path.extname(sourcePath).toLowerCase() === '.json'
        ? this.parseQueryResult(sourcePath, content)
        : this.csvParser.parse(
            content,
            options.hasHeader ?? true,
            options.delimiter ?? this.config.get('CSV_DELIMITER', { infer: true }),
          );

    this.logger.log(`Loaded ${data.size} column(s), ${getRowCount(data)} row(s) from ${sourcePath}`);
    return data;
  }

  private async read(sourcePath: string): Promise<string> {
    try {
      return await readFile(sourcePath, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'EISDIR')) {
        throw new DataSourceNotFoundError(sourcePath);
      }
      throw err;
    }
  }

  private parseQueryResult(sourcePath: string, content: string): TabularData {
    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (err) {
      throw new DataSourceFormatError(sourcePath, `invalid JSON (${err instanceof Error ? err.message : String(err)})`);
    }

    const result = queryResultSchema.safeParse(json);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
      throw new DataSourceFormatError(sourcePath, issues);
    }
    return this.queryResults.parse(result.data.columns, result.data.rows);
  }
}
