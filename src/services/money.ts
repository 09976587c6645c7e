//fixed-point money and rate arithmetic: amounts carry 2 decimals, rounding is half-up
//rates keep the precision they arrive with (6.625% stays 0.06625) and print with at least 4 decimals
import Decimal from 'decimal.js';

export const AMOUNT_DP = 2;
export const RATE_DP = 4;
//rates computed from tax / base
export const DERIVED_RATE_DP = 6;

export const ZERO = new Decimal(0);

//accepts numbers and strings such as "$1,234.50" or "(12.00)"
export function parseDecimal(value: unknown): Decimal | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Decimal) return value;
  if (typeof value === 'number') return Number.isFinite(value) ? new Decimal(value) : null;
  if (typeof value !== 'string') return null;

  let cleaned = value.replace(/[$,\s]/g, '');
  const negative = /^\(.*\)$/.test(cleaned);
  if (negative) cleaned = `-${cleaned.slice(1, -1)}`;
  if (!/^-?\d*\.?\d+$/.test(cleaned)) return null;
  return new Decimal(cleaned);
}

export function roundAmount(value: Decimal): Decimal {
  return value.toDecimalPlaces(AMOUNT_DP, Decimal.ROUND_HALF_UP);
}

export function roundRate(value: Decimal): Decimal {
  return value.toDecimalPlaces(DERIVED_RATE_DP, Decimal.ROUND_HALF_UP);
}

//"1%" -> 0.01 and "6.625%" -> 0.06625; an unsuffixed number above 1 is also a percentage (6.75 -> 0.0675)
export function parseRate(value: unknown): Decimal | null {
  if (typeof value === 'string' && /%\s*$/.test(value)) {
    return parseDecimal(value.replace(/%\s*$/, ''))?.div(100) ?? null;
  }
  const parsed = parseDecimal(value);
  if (parsed === null) return null;
  return parsed.abs().gt(1) ? parsed.div(100) : parsed;
}

export function withinTolerance(a: Decimal, b: Decimal, tolerance: Decimal | number): boolean {
  return a.minus(b).abs().lte(tolerance);
}

export function isZero(value: Decimal, tolerance: Decimal | number = 0): boolean {
  return value.abs().lte(tolerance);
}

export function sum(values: Decimal[]): Decimal {
  return values.reduce((acc, v) => acc.plus(v), ZERO);
}

export function formatAmount(value: Decimal): string {
  return value.toFixed(AMOUNT_DP);
}

export function formatRate(value: Decimal): string {
  return value.toFixed(Math.max(RATE_DP, value.decimalPlaces()));
}

//0.0675 -> "6.75%"
export function formatPercent(rate: Decimal): string {
  return `${rate.times(100).toDecimalPlaces(4).toString()}%`;
}
