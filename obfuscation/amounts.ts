/**
 * Currency amount parsing for integrity checks
 */

const NON_NUMERIC_PATTERN = /[^\d.-]/g;

/**
 * Parse a currency-formatted string ("$1,234.56", " -$100.00 ") to a number.
 * Everything except digits, "." and "-" is discarded; anything that still
 * does not read as a number yields 0.
 */
export function parseAmount(amount: string): number {
  const cleaned = amount.replace(NON_NUMERIC_PATTERN, "");
  if (cleaned === "") return 0;
  const value = Number(cleaned);
  return Number.isFinite(value) ? value : 0;
}

const AMOUNT_FORMAT = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/**
 * Format a number the way statements print it: "$1,234.56", "-$100.00".
 */
export function formatAmount(value: number): string {
  const sign = value < 0 ? "-" : "";
  return `${sign}$${AMOUNT_FORMAT.format(Math.abs(value))}`;
}
