/**
 * Digit-level helpers for numeric conversions
 *
 * Floating-point values are rounded half-up on their shortest decimal
 * representation, so `%.2f` of `1.005` gives `1.01` rather than the
 * binary-exact `1.00`.
 *
 * @module format/numbers
 */

/**
 * Decimal significand and exponent: value = d.ddd × 10^exponent
 */
export interface Decimal {
  /** Significant digits, no leading zeros ('0' for zero) */
  digits: string
  exponent: number
}

const ZERO: Decimal = { digits: '0', exponent: 0 }

/**
 * Shortest round-tripping decimal form of a finite, non-negative number
 */
export function decompose(value: number): Decimal {
  if (value === 0) {
    return ZERO
  }
  const [mantissa = '0', exponent = '0'] = value.toExponential().split('e')
  return { digits: mantissa.replace('.', ''), exponent: Number(exponent) }
}

/**
 * Round half-up to `count` significant digits
 */
export function roundSignificant(decimal: Decimal, count: number): Decimal {
  if (decimal.digits === '0' || count < 0) {
    return ZERO
  }
  if (count === 0) {
    return decimal.digits.charAt(0) >= '5'
      ? { digits: '1', exponent: decimal.exponent + 1 }
      : ZERO
  }
  if (count >= decimal.digits.length) {
    return decimal
  }

  const head = decimal.digits.slice(0, count)
  if (decimal.digits.charAt(count) < '5') {
    return { digits: head, exponent: decimal.exponent }
  }

  const chars = head.split('')
  let i = chars.length - 1
  while (i >= 0 && chars[i] === '9') {
    chars[i] = '0'
    i--
  }
  if (i < 0) {
    return { digits: '1' + chars.join(''), exponent: decimal.exponent + 1 }
  }
  chars[i] = String.fromCharCode(head.charCodeAt(i) + 1)
  return { digits: chars.join(''), exponent: decimal.exponent }
}

export interface FixedParts {
  integer: string
  /** Exactly `precision` digits */
  fraction: string
}

/**
 * Positional digits with `precision` fraction digits
 */
export function toFixedParts(value: number, precision: number): FixedParts {
  const source = decompose(value)
  const rounded = roundSignificant(source, source.exponent + 1 + precision)
  return renderFixed(rounded, precision)
}

function renderFixed(decimal: Decimal, precision: number): FixedParts {
  let integer: string
  let fractionDigits: string

  if (decimal.digits === '0') {
    integer = '0'
    fractionDigits = ''
  } else if (decimal.exponent >= 0) {
    integer = decimal.digits.slice(0, decimal.exponent + 1).padEnd(decimal.exponent + 1, '0')
    fractionDigits = decimal.digits.slice(decimal.exponent + 1)
  } else {
    integer = '0'
    fractionDigits = '0'.repeat(-decimal.exponent - 1) + decimal.digits
  }

  return {
    integer,
    fraction: fractionDigits.padEnd(precision, '0').slice(0, precision),
  }
}

export interface ScientificParts {
  /** `d` or `d.ddd` */
  mantissa: string
  /** Sign followed by at least two digits, e.g. `+05` */
  exponent: string
}

export function toScientificParts(value: number, precision: number): ScientificParts {
  const rounded = roundSignificant(decompose(value), precision + 1)
  return renderScientific(rounded, precision)
}

function renderScientific(decimal: Decimal, precision: number): ScientificParts {
  const lead = decimal.digits.charAt(0)
  const rest = decimal.digits.slice(1).padEnd(precision, '0').slice(0, precision)
  const exponent = decimal.digits === '0' ? 0 : decimal.exponent
  const sign = exponent < 0 ? '-' : '+'
  return {
    mantissa: precision > 0 ? `${lead}.${rest}` : lead,
    exponent: sign + String(Math.abs(exponent)).padStart(2, '0'),
  }
}

export type GeneralParts =
  | ({ kind: 'fixed' } & FixedParts)
  | ({ kind: 'scientific' } & ScientificParts)

/**
 * `%g`: positional when 10^-4 <= rounded value < 10^precision, else scientific
 */
export function toGeneralParts(value: number, precision: number): GeneralParts {
  if (value === 0) {
    return { kind: 'fixed', ...renderFixed(ZERO, precision - 1) }
  }

  const rounded = roundSignificant(decompose(value), precision)
  if (rounded.exponent >= -4 && rounded.exponent < precision) {
    return { kind: 'fixed', ...renderFixed(rounded, precision - rounded.exponent - 1) }
  }
  return { kind: 'scientific', ...renderScientific(rounded, precision - 1) }
}

// ====================
// Hexadecimal floating point
// ====================

const SIGNIFICAND_MASK = (1n << 52n) - 1n
const MAGNITUDE_MASK = (1n << 63n) - 1n
const MIN_NORMAL = 2.2250738585072014e-308

function doubleToBits(value: number): bigint {
  const view = new DataView(new ArrayBuffer(8))
  view.setFloat64(0, value)
  return view.getBigUint64(0)
}

function bitsToDouble(bits: bigint): number {
  const view = new DataView(new ArrayBuffer(8))
  view.setBigUint64(0, bits)
  return view.getFloat64(0)
}

/**
 * Hexadecimal form of a finite, non-negative double, without the `0x` prefix:
 * `1.8p1` for 3, `0.0p0` for 0, `0.0000000000001p-1022` for the smallest subnormal
 */
export function hexSignificand(value: number): string {
  if (value === 0) {
    return '0.0p0'
  }

  const bits = doubleToBits(value)
  const biasedExponent = Number((bits >> 52n) & 0x7ffn)
  const subnormal = biasedExponent === 0

  const fraction = (bits & SIGNIFICAND_MASK).toString(16).padStart(13, '0')
  const trimmed = fraction === '0000000000000' ? '0' : fraction.replace(/0{1,12}$/, '')
  const exponent = subnormal ? -1022 : biasedExponent - 1023

  return `${subnormal ? '0' : '1'}.${trimmed}p${exponent}`
}

/**
 * `hexSignificand` rounded half-even to `precision` hex digits (1 to 12);
 * other precisions print every digit
 */
export function hexDouble(value: number, precision: number): string {
  if (value === 0 || precision <= 0 || precision >= 13) {
    return hexSignificand(value)
  }

  const subnormal = value < MIN_NORMAL
  const scaled = subnormal ? value * 2 ** 54 : value

  const shift = BigInt(53 - (1 + precision * 4))
  const bits = doubleToBits(scaled)
  let significand = (bits & MAGNITUDE_MASK) >> shift
  const roundingBits = bits & ((1n << shift) - 1n)
  const halfBit = 1n << (shift - 1n)

  const leastZero = (significand & 1n) === 0n
  const round = (roundingBits & halfBit) !== 0n
  const sticky = shift > 1n && (roundingBits & ~halfBit) !== 0n
  if ((leastZero && round && sticky) || (!leastZero && round)) {
    significand += 1n
  }

  const result = bitsToDouble(significand << shift)
  if (!Number.isFinite(result)) {
    return '1.0p1024'
  }

  const text = hexSignificand(result)
  if (!subnormal) {
    return text
  }
  const p = text.indexOf('p')
  return `${text.slice(0, p)}p${Number(text.slice(p + 1)) - 54}`
}

// ====================
// Integers
// ====================

/**
 * Unsigned radix digits of an integer `number`
 *
 * Negatives use two's complement: 32 bits when the value fits an int32,
 * 64 bits otherwise.
 */
export function unsignedRadix(value: number, radix: 8 | 16): string {
  if (value >= 0) {
    return BigInt(value).toString(radix)
  }
  if (value >= -0x80000000) {
    return (value >>> 0).toString(radix)
  }
  return BigInt.asUintN(64, BigInt(value)).toString(radix)
}

/**
 * Insert `separator` every `size` digits, counting from the right
 */
export function groupDigits(digits: string, separator: string, size: number): string {
  if (size <= 0 || separator === '' || digits.length <= size) {
    return digits
  }
  const groups: string[] = []
  let end = digits.length
  while (end > 0) {
    groups.unshift(digits.slice(Math.max(0, end - size), end))
    end -= size
  }
  return groups.join(separator)
}
