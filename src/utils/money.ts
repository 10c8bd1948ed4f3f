/**
 * Fixed-point currency arithmetic.
 *
 * Amounts are integer counts of minor units (cents) held in a bigint, so
 * sums never drift. Rates are held in hundredths of a percent and quantities
 * in ten-thousandths; every conversion between scales goes through `divRound`.
 */

import { ValidationError } from './errors';

export const MONEY_SCALE = 2;
export const PERCENT_SCALE = 2;
export const QUANTITY_SCALE = 4;

const DECIMAL_PATTERN = /^(-)?(\d+)(?:\.(\d+))?$/;

/**
 * Divides with rounding half away from zero.
 */
export function divRound(numerator: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new RangeError('Division by zero');
  }
  const negative = (numerator < 0n) !== (denominator < 0n);
  const n = numerator < 0n ? -numerator : numerator;
  const d = denominator < 0n ? -denominator : denominator;
  const quotient = (n * 2n + d) / (d * 2n);
  return negative ? -quotient : quotient;
}

/**
 * Parses a decimal number or string into an integer scaled by 10^scale.
 * Rejects exponent notation and more fractional digits than the scale allows.
 */
export function parseScaled(value: number | string, scale: number, label: string): bigint {
  if (typeof value === 'number' && !Number.isFinite(value)) {
    throw new ValidationError(`${label} must be a finite number`);
  }
  const text = typeof value === 'number' ? String(value) : value.trim();
  const match = DECIMAL_PATTERN.exec(text);
  if (!match) {
    throw new ValidationError(`${label} must be a decimal number, got "${text}"`);
  }
  const [, sign, whole, fraction = ''] = match;
  if (fraction.length > scale) {
    throw new ValidationError(`${label} allows at most ${scale} decimal places, got "${text}"`);
  }
  const scaled = BigInt(whole + fraction.padEnd(scale, '0'));
  return sign ? -scaled : scaled;
}

function formatScaled(value: bigint, scale: number): string {
  const negative = value < 0n;
  const digits = (negative ? -value : value).toString().padStart(scale + 1, '0');
  const whole = digits.slice(0, digits.length - scale);
  const fraction = digits.slice(digits.length - scale);
  return `${negative ? '-' : ''}${whole}${scale > 0 ? `.${fraction}` : ''}`;
}

export class Money {
  static readonly FACTOR = 10n ** BigInt(MONEY_SCALE);

  private constructor(readonly minor: bigint) {}

  static zero(): Money {
    return new Money(0n);
  }

  static fromMinor(minor: bigint | number): Money {
    if (typeof minor === 'number' && !Number.isSafeInteger(minor)) {
      throw new ValidationError(`Minor units must be a safe integer, got ${minor}`);
    }
    return new Money(BigInt(minor));
  }

  static fromDecimal(value: number | string, label = 'Amount'): Money {
    return new Money(parseScaled(value, MONEY_SCALE, label));
  }

  static sum(values: Iterable<Money>): Money {
    let total = 0n;
    for (const value of values) {
      total += value.minor;
    }
    return new Money(total);
  }

  static min(a: Money, b: Money): Money {
    return a.minor <= b.minor ? a : b;
  }

  static max(a: Money, b: Money): Money {
    return a.minor >= b.minor ? a : b;
  }

  add(other: Money): Money {
    return new Money(this.minor + other.minor);
  }

  subtract(other: Money): Money {
    return new Money(this.minor - other.minor);
  }

  negate(): Money {
    return new Money(-this.minor);
  }

  abs(): Money {
    return this.minor < 0n ? this.negate() : this;
  }

  /**
   * Multiplies by numerator/denominator, rounding once at the end.
   */
  multiply(numerator: bigint, denominator: bigint = 1n): Money {
    return new Money(divRound(this.minor * numerator, denominator));
  }

  percent(rate: Percentage): Money {
    return this.multiply(rate.basisPoints, Percentage.HUNDRED);
  }

  compare(other: Money): -1 | 0 | 1 {
    if (this.minor === other.minor) return 0;
    return this.minor < other.minor ? -1 : 1;
  }

  equals(other: Money): boolean {
    return this.minor === other.minor;
  }

  greaterThan(other: Money): boolean {
    return this.minor > other.minor;
  }

  lessThan(other: Money): boolean {
    return this.minor < other.minor;
  }

  isZero(): boolean {
    return this.minor === 0n;
  }

  isPositive(): boolean {
    return this.minor > 0n;
  }

  isNegative(): boolean {
    return this.minor < 0n;
  }

  toDecimal(): string {
    return formatScaled(this.minor, MONEY_SCALE);
  }

  /**
   * Lossy conversion for display and ratios only.
   */
  toNumber(): number {
    return Number(this.toDecimal());
  }

  toJSON(): string {
    return this.toDecimal();
  }

  toString(): string {
    return this.toDecimal();
  }
}

/**
 * A percentage with two decimals, stored as basis points of a percent
 * (12.5% -> 1250).
 */
export class Percentage {
  static readonly FACTOR = 10n ** BigInt(PERCENT_SCALE);
  /** 100% expressed in basis points. */
  static readonly HUNDRED = 100n * Percentage.FACTOR;

  private constructor(readonly basisPoints: bigint) {}

  static zero(): Percentage {
    return new Percentage(0n);
  }

  static fromBasisPoints(basisPoints: bigint): Percentage {
    return new Percentage(basisPoints);
  }

  /**
   * Parses a percentage and checks it lies within 0..100.
   */
  static fromValue(value: number | string, label = 'Percentage'): Percentage {
    const basisPoints = parseScaled(value, PERCENT_SCALE, label);
    if (basisPoints < 0n || basisPoints > Percentage.HUNDRED) {
      throw new ValidationError(`${label} must be between 0 and 100, got ${value}`);
    }
    return new Percentage(basisPoints);
  }

  isZero(): boolean {
    return this.basisPoints === 0n;
  }

  toNumber(): number {
    return Number(formatScaled(this.basisPoints, PERCENT_SCALE));
  }

  toDecimal(): string {
    return formatScaled(this.basisPoints, PERCENT_SCALE);
  }

  toJSON(): number {
    return this.toNumber();
  }
}

/**
 * Parses an item quantity into ten-thousandths.
 */
export function parseQuantity(value: number | string, label = 'Quantity'): bigint {
  return parseScaled(value, QUANTITY_SCALE, label);
}

export function formatQuantity(scaled: bigint): number {
  return Number(formatScaled(scaled, QUANTITY_SCALE));
}

/**
 * Ratio of two amounts as a percentage rounded to two decimals.
 * Returns 0 when the denominator is zero.
 */
export function ratioPercent(numerator: Money, denominator: Money): number {
  if (denominator.isZero()) return 0;
  const basisPoints = divRound(numerator.minor * Percentage.HUNDRED, denominator.minor);
  return Number(formatScaled(basisPoints, PERCENT_SCALE));
}
