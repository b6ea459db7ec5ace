/**
 * Currency formatting for human-readable messages (AUD, whole dollars)
 */

/**
 * Absolute tolerance for every monetary equality check.
 * Absorbs rounding noise from source documents.
 */
export const MONETARY_TOLERANCE = 1;

const wholeDollarFormat = new Intl.NumberFormat('en-AU', {
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
});

/**
 * 1500000 -> "$1,500,000", -50000 -> "-$50,000"
 */
export function formatCurrency(amount: number): string {
  const rounded = Math.round(amount);
  const formatted = wholeDollarFormat.format(Math.abs(rounded));
  return rounded < 0 ? `-$${formatted}` : `$${formatted}`;
}

/**
 * Signed difference with an explicit plus sign for positive values
 */
export function formatSignedCurrency(amount: number): string {
  return amount > 0 ? `+${formatCurrency(amount)}` : formatCurrency(amount);
}

/**
 * True when the two amounts agree within MONETARY_TOLERANCE
 */
export function amountsAgree(a: number, b: number): boolean {
  return Math.abs(a - b) < MONETARY_TOLERANCE;
}
