import Decimal from 'decimal.js';

// Configure Decimal.js for financial calculations
Decimal.set({ precision: 20, rounding: Decimal.ROUND_HALF_UP });

export const ZERO = new Decimal(0);

const currencyFormatter = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/**
 * Parse a user-supplied amount into a Decimal.
 *
 * Strings may carry a currency prefix or thousands separators ("₹1,234.50", "$ 20").
 * Returns null when nothing numeric is left.
 */
export function parseAmount(raw: number | string): Decimal | null {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? new Decimal(raw) : null;
  }

  const cleaned = raw.trim().replace(/[^0-9.-]/g, '');
  if (!/^-?(\d+(\.\d*)?|\.\d+)$/.test(cleaned)) {
    return null;
  }
  return new Decimal(cleaned);
}

/**
 * Split a stored amount cell such as "₹500.00" into its symbol prefix and numeric part.
 */
export function splitAmountCell(cell: string): { symbol: string; amount: Decimal | null } {
  const trimmed = cell.trim();
  const match = /^([^0-9.-]*)(.*)$/.exec(trimmed);
  const symbol = match ? match[1].trim() : '';
  return { symbol, amount: parseAmount(match ? match[2] : trimmed) };
}

/** Round to currency precision (2 dp, half-up). */
export function toMoney(value: Decimal): Decimal {
  return value.toDecimalPlaces(2, Decimal.ROUND_HALF_UP);
}

/** Numeric form for JSON payloads. */
export function toMoneyNumber(value: Decimal): number {
  return toMoney(value).toNumber();
}

export function formatCurrency(value: Decimal, symbol: string): string {
  const rounded = toMoney(value);
  const formatted = currencyFormatter.format(rounded.abs().toNumber());
  return rounded.isNegative() && !rounded.isZero() ? `-${symbol}${formatted}` : `${symbol}${formatted}`;
}

export function sumAmounts(values: Iterable<Decimal>): Decimal {
  let total = ZERO;
  for (const value of values) {
    total = total.plus(value);
  }
  return total;
}
