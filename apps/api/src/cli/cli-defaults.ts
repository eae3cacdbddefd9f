import type { CalculatedColumn, SummaryItem } from '@tabula/shared';

/**
 * Columns the default order sheet carries. When a run names no calculated
 * columns or summaries of its own, these drive the ones it gets.
 */
const PRICE = 'Cena';
const QUANTITY = 'Kolicina';
const TOTAL = 'Ukupno';
const ITEM = 'Artikal';

/** `Ukupno = Cena * Kolicina` when both source columns exist */
export function defaultCalculatedColumns(columns: ReadonlySet<string>): CalculatedColumn[] {
  if (!columns.has(PRICE) || !columns.has(QUANTITY)) return [];
  return [{ name: TOTAL, operation: 'MULTIPLY', sourceColumns: [PRICE, QUANTITY] }];
}

/** Summary lines for whichever of the order sheet columns are present */
export function defaultSummaryItems(columns: ReadonlySet<string>): SummaryItem[] {
  const items: SummaryItem[] = [];
  if (columns.has(PRICE)) {
    items.push({ label: 'Ukupna cena', calcType: 'SUM', columnName: PRICE });
    items.push({ label: 'Prosecna cena', calcType: 'AVG', columnName: PRICE });
  }
  if (columns.has(TOTAL)) {
    items.push({ label: `${TOTAL} (SUM ${TOTAL})`, calcType: 'SUM', columnName: TOTAL });
  }
  if (columns.has(ITEM)) {
    items.push({ label: 'Broj artikala', calcType: 'COUNT', columnName: ITEM });
  }
  if (columns.has(PRICE)) {
    items.push({ label: 'Broj sa cenom 100', calcType: 'COUNT_IF', columnName: PRICE, conditionValue: '100' });
  }
  return items;
}
