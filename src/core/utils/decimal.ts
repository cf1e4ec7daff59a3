import { Decimal } from 'decimal.js'

const DEFAULT_PRECISION = 40

Decimal.set({
  precision: DEFAULT_PRECISION,
  rounding: Decimal.ROUND_HALF_UP
})

export { Decimal }

export type DecimalInput = Decimal | string | number | bigint

/**
 * Parse a value into a Decimal, or return null if it is not a finite number.
 */
export function toDecimal(value: DecimalInput): Decimal | null {
  if (value instanceof Decimal) {
    return value.isFinite() ? value : null
  }
  if (typeof value === 'string' && value.trim() === '') {
    return null
  }
  try {
    const parsed = new Decimal(typeof value === 'bigint' ? value.toString() : value)
    return parsed.isFinite() ? parsed : null
  } catch {
    return null
  }
}

// Integer sum or difference never needs more digits than the wider operand plus a carry
function exactContext(a: Decimal, b: Decimal): Decimal.Constructor {
  const digits = Math.max(a.sd(true), b.sd(true), a.e + 1, b.e + 1) + 1
  return digits <= DEFAULT_PRECISION ? Decimal : Decimal.clone({ precision: digits })
}

/**
 * Sum of two integers, never rounded whatever their size.
 */
export function addExact(a: Decimal, b: Decimal): Decimal {
  const Context = exactContext(a, b)
  return new Decimal(new Context(a).plus(b))
}

/**
 * Difference of two integers, never rounded whatever their size.
 */
export function subtractExact(a: Decimal, b: Decimal): Decimal {
  const Context = exactContext(a, b)
  return new Decimal(new Context(a).minus(b))
}
