const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse a cell as a decimal number after trimming.
 * Returns null for blank, non-numeric or non-finite input.
 */
export function parseDecimal(value: string | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  const trimmed = value.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Parse a cell for column arithmetic: a comma is accepted as the decimal
 * separator ("2,5" → 2.5).
 */
export function parseCellNumber(value: string | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  return parseDecimal(value.replace(/,/g, '.'));
}

/**
 * Canonical string form stored back into cells: 200 → "200", 0.5 → "0.5".
 */
export function formatNumber(value: number): string {
  if (Object.is(value, -0)) return '0';
  return String(value);
}
