import type { TabularData } from '../types/report-types';

/** Column list form used by JSON payloads */
export interface TabularColumn {
  name: string;
  values: string[];
}

/** Build tabular data from ordered [name, values] entries */
export function createTabularData(
  entries: Iterable<readonly [string, readonly string[]]>,
): TabularData {
  const data = new Map<string, readonly string[]>();
  for (const [name, values] of entries) {
    data.set(name, [...values]);
  }
  return data;
}

/**
 * Build tabular data from a plain record. Object key order applies, so
 * integer-like names ("2024") come first; use the column list form to keep
 * those in a given position.
 */
export function tabularDataFromRecord(record: Record<string, readonly string[]>): TabularData {
  return createTabularData(Object.entries(record));
}

export function tabularDataFromColumns(columns: readonly TabularColumn[]): TabularData {
  return createTabularData(columns.map((c) => [c.name, c.values] as const));
}

export function tabularDataToRecord(data: TabularData): Record<string, string[]> {
  const record: Record<string, string[]> = {};
  for (const [name, values] of data) {
    record[name] = [...values];
  }
  return record;
}

/** Row count, taken from the first column; 0 when there are no columns */
export function getRowCount(data: TabularData): number {
  const first = data.values().next();
  return first.done ? 0 : first.value.length;
}

export function getColumnNames(data: TabularData): string[] {
  return [...data.keys()];
}

/** Cell at (column, row), or undefined when either is out of range */
export function getCell(data: TabularData, column: string, row: number): string | undefined {
  return data.get(column)?.[row];
}
