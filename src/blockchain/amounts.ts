/**
 * Exact decimal arithmetic for token amounts.
 *
 * Balances arrive as base units (bigint) and thresholds are configured as
 * decimal strings, so comparisons are done on integers and never touch floats.
 */

const DECIMAL_PATTERN = /^(\d+)(?:\.(\d+))?$/;

/**
 * Parse a user-supplied decimal ("100", "0.5", "1,000.25").
 * Returns the canonical form or null when the text is not a non-negative decimal.
 */
export function parseDecimal(text: string): string | null {
  const cleaned = text.trim().replace(/,/g, '');
  const match = DECIMAL_PATTERN.exec(cleaned);
  if (!match) return null;

  const whole = match[1].replace(/^0+(?=\d)/, '');
  const fraction = (match[2] ?? '').replace(/0+$/, '');
  return fraction ? `${whole}.${fraction}` : whole;
}

export function parsePositiveDecimal(text: string): string | null {
  const value = parseDecimal(text);
  if (value === null) return null;
  return /[1-9]/.test(value) ? value : null;
}

function toScaled(decimal: string): { units: bigint; scale: number } {
  const [whole, fraction = ''] = decimal.split('.');
  return { units: BigInt(whole + fraction), scale: fraction.length };
}

/** True when `amount` base units at `decimals` precision is at least `minimum`. */
export function meetsMinimum(amount: bigint, decimals: number, minimum: string): boolean {
  const canonical = parseDecimal(minimum);
  if (canonical === null) {
    throw new Error(`Invalid minimum balance: ${minimum}`);
  }
  const { units, scale } = toScaled(canonical);
  return amount * 10n ** BigInt(scale) >= units * 10n ** BigInt(decimals);
}

/** Base units making up one whole token. */
export function oneTokenUnit(decimals: number): bigint {
  return 10n ** BigInt(decimals);
}

export function formatAmount(amount: bigint, decimals: number): string {
  if (decimals === 0) return amount.toString();

  const negative = amount < 0n;
  const digits = (negative ? -amount : amount).toString().padStart(decimals + 1, '0');
  const whole = digits.slice(0, -decimals);
  const fraction = digits.slice(-decimals).replace(/0+$/, '');
  return `${negative ? '-' : ''}${whole}${fraction ? `.${fraction}` : ''}`;
}
