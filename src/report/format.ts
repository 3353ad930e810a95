import { NOT_AVAILABLE } from '../quality/engine.js';

export const CURRENCY = 'DZD';

const INTEGER_FORMATTER = new Intl.NumberFormat('en-US', {
  maximumFractionDigits: 0
});

/** Thousands-separated, rounded to a whole number. */
export function formatInteger(value: number): string {
  if (!Number.isFinite(value)) {
    return NOT_AVAILABLE;
  }
  const rounded = Math.round(value);
  // Math.round(-0.4) is -0, which Intl renders as "-0".
  return INTEGER_FORMATTER.format(rounded === 0 ? 0 : rounded);
}

export function formatMoney(value: number): string {
  const formatted = formatInteger(value);
  return formatted === NOT_AVAILABLE ? formatted : `${formatted} ${CURRENCY}`;
}

export function formatFixed(value: number, digits: number): string {
  return Number.isFinite(value) ? value.toFixed(digits) : NOT_AVAILABLE;
}

export function formatPercent(value: number, digits = 1): string {
  const formatted = formatFixed(value, digits);
  return formatted === NOT_AVAILABLE ? formatted : `${formatted}%`;
}

/** `count (share%)` with the share taken over `total`. */
export function formatCountWithShare(count: number, total: number): string {
  return `${formatInteger(count)} (${formatPercent(sharePct(count, total))})`;
}

export function sharePct(part: number, total: number): number {
  if (total === 0) {
    throw new Error('Cannot compute a share of an empty total.');
  }
  return (part / total) * 100;
}
