/**
 * Value conversion: the plain-text half of formatting
 *
 * Turns one `%[flags][width][.precision]conversion` directive and one value
 * into text, following the `printf`-family grammar:
 *
 * | Conversion | Accepts | Output |
 * | --- | --- | --- |
 * | `b` `B` | anything | `true` / `false` |
 * | `h` `H` | anything | hash code in hex |
 * | `s` `S` | anything | `String(value)` |
 * | `c` `C` | code point or one-character string | the character |
 * | `d` | integer `number`, `bigint` | decimal |
 * | `o` `x` `X` | integer `number`, `bigint` | octal / hex |
 * | `e` `E` `f` `g` `G` `a` `A` | `number` | scientific / decimal / general / hex float |
 * | `t` `T` + suffix | `Date`, epoch millis | date/time field |
 * | `%` `n` | nothing | `%` / line separator |
 *
 * Every rejected combination raises `UnsupportedConversionError`.
 *
 * @module format/conversion
 */

import { UnsupportedConversionError } from '../types'
import { isSpanned } from '../text/styled-text'
import { formatDateTimeField, isDateTimeSuffix } from './datetime'
import { localeSymbols, localizeDigits, toUpperCase } from './locale'
import type { LocaleSymbols } from './locale'
import {
  groupDigits,
  hexDouble,
  toFixedParts,
  toGeneralParts,
  toScientificParts,
  unsignedRadix,
} from './numbers'

const DIRECTIVE = /^%([-#+ 0,(]*)([0-9]+)?(?:\.([0-9]+))?([a-zA-Z%]|[tT][a-zA-Z])$/

export interface FormatFlags {
  leftJustify: boolean
  alternate: boolean
  plus: boolean
  leadingSpace: boolean
  zeroPad: boolean
  group: boolean
  parentheses: boolean
}

type FlagName = keyof FormatFlags

const FLAG_CHARS: Record<string, FlagName> = {
  '-': 'leftJustify',
  '#': 'alternate',
  '+': 'plus',
  ' ': 'leadingSpace',
  '0': 'zeroPad',
  ',': 'group',
  '(': 'parentheses',
}

const FLAG_SYMBOLS: Record<FlagName, string> = {
  leftJustify: '-',
  alternate: '#',
  plus: '+',
  leadingSpace: ' ',
  zeroPad: '0',
  group: ',',
  parentheses: '(',
}

export interface Directive {
  /** The directive as written, e.g. `%-08.3f` */
  source: string
  flags: FormatFlags
  width: number | null
  precision: number | null
  /** Conversion letter lower-cased (`t` for date/time) */
  conversion: string
  /** Date/time suffix for `t`/`T`, otherwise '' */
  suffix: string
  uppercase: boolean
}

/**
 * Parse `%[flags][width][.precision]conversion`
 */
export function parseDirective(source: string): Directive {
  const match = DIRECTIVE.exec(source)
  if (!match) {
    throw new UnsupportedConversionError(`Malformed conversion '${source}'`, source)
  }
  const [, flagText = '', widthText, precisionText, conversionText = ''] = match

  const flags: FormatFlags = {
    leftJustify: false,
    alternate: false,
    plus: false,
    leadingSpace: false,
    zeroPad: false,
    group: false,
    parentheses: false,
  }
  for (const char of flagText) {
    const name = FLAG_CHARS[char]
    if (name === undefined) continue
    if (flags[name]) {
      throw new UnsupportedConversionError(`Duplicate flag '${char}' in '${source}'`, source)
    }
    flags[name] = true
  }

  const letter = conversionText.charAt(0)
  const lower = letter.toLowerCase()
  const uppercase = letter !== lower

  if (uppercase && !'bhscxegat'.includes(lower)) {
    throw new UnsupportedConversionError(`Unknown conversion '${letter}' in '${source}'`, source)
  }

  return {
    source,
    flags,
    width: widthText === undefined ? null : Number(widthText),
    precision: precisionText === undefined ? null : Number(precisionText),
    conversion: lower,
    suffix: conversionText.slice(1),
    uppercase,
  }
}

/**
 * Format one value with one directive
 *
 * @param locale - BCP 47 tag, or null for no localization
 * @param directive - `%[flags][width][.precision]conversion`
 */
export function formatValue(locale: string | null, directive: string, value: unknown): string {
  const parsed = parseDirective(directive)

  switch (parsed.conversion) {
    case 'b':
    case 'h':
    case 's':
      return formatGeneral(parsed, value, locale)
    case 'c':
      return formatCharacter(parsed, value, locale)
    case 'd':
    case 'o':
    case 'x':
      return formatInteger(parsed, value, locale)
    case 'e':
    case 'f':
    case 'g':
    case 'a':
      return formatFloat(parsed, value, locale)
    case 't':
      return formatDateTime(parsed, value, locale)
    case '%':
      checkNoPrecision(parsed)
      checkBadFlags(parsed, 'alternate', 'plus', 'leadingSpace', 'zeroPad', 'group', 'parentheses')
      checkWidthFor(parsed, 'leftJustify')
      return justify(parsed, '%')
    case 'n':
      checkNoPrecision(parsed)
      if (parsed.width !== null) {
        throw mismatch(parsed, `width is not allowed`)
      }
      checkBadFlags(parsed, ...allFlags())
      return '\n'
    default:
      throw new UnsupportedConversionError(
        `Unknown conversion '${parsed.conversion}' in '${parsed.source}'`,
        parsed.source
      )
  }
}

// ====================
// General: b h s
// ====================

function formatGeneral(directive: Directive, value: unknown, locale: string | null): string {
  const { conversion, flags } = directive
  if (flags.alternate) {
    throw mismatch(directive, `flag '#' is not allowed`)
  }
  checkWidthFor(directive, 'leftJustify')
  checkBadFlags(directive, 'plus', 'leadingSpace', 'zeroPad', 'group', 'parentheses')

  let text: string
  if (conversion === 'b') {
    text = value === null || value === undefined
      ? 'false'
      : typeof value === 'boolean' ? String(value) : 'true'
  } else if (conversion === 'h') {
    text = value === null || value === undefined ? 'null' : (hashCode(value) >>> 0).toString(16)
  } else {
    text = value === null || value === undefined ? 'null' : String(value)
  }

  if (directive.precision !== null && directive.precision < text.length) {
    text = text.slice(0, directive.precision)
  }
  if (directive.uppercase) {
    text = toUpperCase(text, locale)
  }
  return justify(directive, text)
}

/**
 * 32-bit hash code: the polynomial string hash for text, the bit pattern
 * for numbers
 */
export function hashCode(value: unknown): number {
  if (typeof value === 'boolean') {
    return value ? 1231 : 1237
  }
  if (typeof value === 'number') {
    if (Number.isInteger(value) && value >= -0x80000000 && value <= 0x7fffffff) {
      return value | 0
    }
    const view = new DataView(new ArrayBuffer(8))
    view.setFloat64(0, Number.isNaN(value) ? Number.NaN : value)
    return (view.getInt32(0) ^ view.getInt32(4)) | 0
  }
  if (typeof value === 'bigint') {
    if (BigInt.asIntN(64, value) === value) {
      const bits = BigInt.asUintN(64, value)
      return Number(BigInt.asIntN(32, bits ^ (bits >> 32n)))
    }
  }
  if (value instanceof Date) {
    return hashCode(BigInt(value.getTime()))
  }
  const text = isSpanned(value) ? value.toString() : String(value)
  let hash = 0
  for (let i = 0; i < text.length; i++) {
    hash = (Math.imul(hash, 31) + text.charCodeAt(i)) | 0
  }
  return hash
}

// ====================
// Character: c
// ====================

function formatCharacter(directive: Directive, value: unknown, locale: string | null): string {
  checkNoPrecision(directive)
  checkBadFlags(directive, 'alternate', 'plus', 'leadingSpace', 'zeroPad', 'group', 'parentheses')
  checkWidthFor(directive, 'leftJustify')

  if (value === null || value === undefined) {
    return justify(directive, 'null')
  }

  let text: string
  if (typeof value === 'number' && Number.isInteger(value)) {
    if (value < 0 || value > 0x10ffff) {
      throw new UnsupportedConversionError(
        `Code point ${value} is out of range for '${directive.source}'`,
        directive.source
      )
    }
    text = String.fromCodePoint(value)
  } else if (typeof value === 'string' && [...value].length === 1) {
    text = value
  } else {
    throw illegalType(directive, value)
  }

  return justify(directive, directive.uppercase ? toUpperCase(text, locale) : text)
}

// ====================
// Integral: d o x
// ====================

function formatInteger(directive: Directive, value: unknown, locale: string | null): string {
  const { conversion, flags } = directive
  checkNumeric(directive)
  checkNoPrecision(directive)
  if (conversion === 'd' && flags.alternate) {
    throw mismatch(directive, `flag '#' is not allowed`)
  }
  if (conversion !== 'd' && flags.group) {
    throw mismatch(directive, `flag ',' is not allowed`)
  }

  if (value === null || value === undefined) {
    return justify(directive, 'null')
  }

  let integer: bigint
  if (typeof value === 'bigint') {
    integer = value
  } else if (typeof value === 'number' && Number.isInteger(value)) {
    integer = BigInt(value)
  } else {
    throw illegalType(directive, value)
  }

  const negative = integer < 0n
  const magnitude = negative ? -integer : integer

  if (conversion === 'd') {
    const symbols = localeSymbols(locale)
    let text = leadingSign(flags, negative)
    text += localizedMagnitude(
      magnitude.toString(),
      flags,
      adjustWidth(directive, negative) - text.length,
      symbols
    )
    return justify(directive, text + trailingSign(flags, negative))
  }

  const prefix = conversion === 'o' ? '0' : '0x'

  if (typeof value === 'number') {
    checkBadFlags(directive, 'parentheses', 'leadingSpace', 'plus')
    const digits = unsignedRadix(value, conversion === 'o' ? 8 : 16)
    return justify(directive, radixText(directive, '', prefix, digits, locale))
  }

  const sign = leadingSign(flags, negative)
  const digits = magnitude.toString(conversion === 'o' ? 8 : 16)
  const body = radixText(directive, sign, prefix, digits, locale, negative && flags.parentheses)
  return justify(directive, body + trailingSign(flags, negative))
}

function radixText(
  directive: Directive,
  sign: string,
  prefix: string,
  digits: string,
  locale: string | null,
  closingParen: boolean = false
): string {
  const lead = sign + (directive.flags.alternate ? prefix : '')
  let padding = ''
  if (directive.flags.zeroPad && directive.width !== null) {
    const used = lead.length + digits.length + (closingParen ? 1 : 0)
    padding = '0'.repeat(Math.max(0, directive.width - used))
  }
  const text = lead + padding + digits
  return directive.uppercase ? toUpperCase(text, locale) : text
}

// ====================
// Floating point: e f g a
// ====================

function formatFloat(directive: Directive, value: unknown, locale: string | null): string {
  const { conversion, flags } = directive
  checkNumeric(directive)
  if (conversion === 'a') {
    checkBadFlags(directive, 'parentheses', 'group')
  } else if (conversion === 'e') {
    checkBadFlags(directive, 'group')
  } else if (conversion === 'g') {
    checkBadFlags(directive, 'alternate')
  }

  if (value === null || value === undefined) {
    return justify(directive, 'null')
  }
  if (typeof value !== 'number') {
    throw illegalType(directive, value)
  }

  if (Number.isNaN(value)) {
    return justify(directive, directive.uppercase ? 'NAN' : 'NaN')
  }

  const negative = value < 0 || Object.is(value, -0)
  const magnitude = Math.abs(value)
  let text = leadingSign(flags, negative)

  if (!Number.isFinite(magnitude)) {
    text += directive.uppercase ? 'INFINITY' : 'Infinity'
    return justify(directive, text + trailingSign(flags, negative))
  }

  const symbols = localeSymbols(locale)
  const available = adjustWidth(directive, negative) - text.length

  switch (conversion) {
    case 'f': {
      const precision = directive.precision ?? 6
      const parts = toFixedParts(magnitude, precision)
      text += localizedMagnitude(
        decimalText(parts.integer, parts.fraction, flags.alternate && precision === 0),
        flags,
        available,
        symbols
      )
      break
    }
    case 'e': {
      const precision = directive.precision ?? 6
      const parts = toScientificParts(magnitude, precision)
      const mantissa = flags.alternate && precision === 0 ? `${parts.mantissa}.` : parts.mantissa
      text += localizedMagnitude(mantissa, flags, available - parts.exponent.length - 1, symbols)
      text += exponentText(directive, parts.exponent, symbols)
      break
    }
    case 'g': {
      const requested = directive.precision ?? 6
      const parts = toGeneralParts(magnitude, requested === 0 ? 1 : requested)
      if (parts.kind === 'fixed') {
        text += localizedMagnitude(
          decimalText(parts.integer, parts.fraction, false),
          flags,
          available,
          symbols
        )
      } else {
        text += localizedMagnitude(parts.mantissa, flags, available - parts.exponent.length - 1, symbols)
        text += exponentText(directive, parts.exponent, symbols)
      }
      break
    }
    default:
      text += hexFloatText(directive, magnitude, text.length)
  }

  return justify(directive, text + trailingSign(flags, negative))
}

function hexFloatText(directive: Directive, magnitude: number, signLength: number): string {
  const requested = directive.precision
  const precision = requested === null ? 0 : requested === 0 ? 1 : requested
  const significand = hexDouble(magnitude, precision)

  const p = significand.indexOf('p')
  let mantissa = significand.slice(0, p)
  if (precision !== 0) {
    const dot = mantissa.indexOf('.')
    const fractionDigits = dot < 0 ? 0 : mantissa.length - dot - 1
    if (fractionDigits < precision) {
      mantissa = (dot < 0 ? `${mantissa}.` : mantissa) + '0'.repeat(precision - fractionDigits)
    }
  }
  const exponent = significand.slice(p + 1)

  let text = mantissa + 'p' + exponent
  if (directive.flags.zeroPad && directive.width !== null) {
    const used = signLength + 2 + text.length
    text = '0'.repeat(Math.max(0, directive.width - used)) + text
  }
  text = '0x' + text
  return directive.uppercase ? text.toUpperCase() : text
}

function decimalText(integer: string, fraction: string, forceDot: boolean): string {
  if (fraction.length > 0) {
    return `${integer}.${fraction}`
  }
  return forceDot ? `${integer}.` : integer
}

function exponentText(directive: Directive, exponent: string, symbols: LocaleSymbols): string {
  const marker = directive.uppercase ? 'E' : 'e'
  return marker + exponent.charAt(0) + localizeDigits(exponent.slice(1), symbols)
}

// ====================
// Date/time: t T
// ====================

function formatDateTime(directive: Directive, value: unknown, locale: string | null): string {
  checkNoPrecision(directive)
  if (!isDateTimeSuffix(directive.suffix)) {
    throw new UnsupportedConversionError(
      `Unknown date/time conversion 't${directive.suffix}' in '${directive.source}'`,
      directive.source
    )
  }
  checkBadFlags(directive, 'alternate', 'plus', 'leadingSpace', 'zeroPad', 'group', 'parentheses')
  checkWidthFor(directive, 'leftJustify')

  if (value === null || value === undefined) {
    return justify(directive, 'null')
  }

  let date: Date
  if (value instanceof Date) {
    date = value
  } else if (typeof value === 'number' || typeof value === 'bigint') {
    date = new Date(Number(value))
  } else {
    throw illegalType(directive, value)
  }
  if (Number.isNaN(date.getTime())) {
    throw new UnsupportedConversionError(`Invalid date for '${directive.source}'`, directive.source)
  }

  const text = formatDateTimeField(date, directive.suffix, locale)
  return justify(directive, directive.uppercase ? toUpperCase(text, locale) : text)
}

// ====================
// Shared pieces
// ====================

function leadingSign(flags: FormatFlags, negative: boolean): string {
  if (negative) {
    return flags.parentheses ? '(' : '-'
  }
  if (flags.plus) return '+'
  if (flags.leadingSpace) return ' '
  return ''
}

function trailingSign(flags: FormatFlags, negative: boolean): string {
  return negative && flags.parentheses ? ')' : ''
}

/**
 * Width left for sign and magnitude once a closing parenthesis is reserved
 */
function adjustWidth(directive: Directive, negative: boolean): number {
  if (directive.width === null) {
    return -1
  }
  return directive.flags.parentheses && negative ? directive.width - 1 : directive.width
}

/**
 * Localize an ASCII `ddd[.ddd]` magnitude, grouping the integer part when
 * asked and zero padding to `width`
 */
function localizedMagnitude(
  magnitude: string,
  flags: FormatFlags,
  width: number,
  symbols: LocaleSymbols
): string {
  const dot = magnitude.indexOf('.')
  const integer = dot < 0 ? magnitude : magnitude.slice(0, dot)
  const fraction = dot < 0 ? null : magnitude.slice(dot + 1)

  const integerText = flags.group
    ? groupDigits(localizeDigits(integer, symbols), symbols.groupingSeparator, symbols.groupingSize)
    : localizeDigits(integer, symbols)

  let text = integerText
  if (fraction !== null) {
    text += symbols.decimalSeparator + localizeDigits(fraction, symbols)
  }

  if (flags.zeroPad && width > text.length) {
    text = symbols.zeroDigit.repeat(width - text.length) + text
  }
  return text
}

function justify(directive: Directive, text: string): string {
  const { width, flags } = directive
  if (width === null || text.length >= width) {
    return text
  }
  return flags.leftJustify ? text.padEnd(width, ' ') : text.padStart(width, ' ')
}

function allFlags(): FlagName[] {
  return Object.values(FLAG_CHARS)
}

function checkBadFlags(directive: Directive, ...names: FlagName[]): void {
  for (const name of names) {
    if (directive.flags[name]) {
      throw mismatch(directive, `flag '${FLAG_SYMBOLS[name]}' is not allowed`)
    }
  }
}

function checkWidthFor(directive: Directive, name: FlagName): void {
  if (directive.flags[name] && directive.width === null) {
    throw new UnsupportedConversionError(
      `Flag '${FLAG_SYMBOLS[name]}' needs a width in '${directive.source}'`,
      directive.source
    )
  }
}

function checkNoPrecision(directive: Directive): void {
  if (directive.precision !== null) {
    throw mismatch(directive, 'precision is not allowed')
  }
}

function checkNumeric(directive: Directive): void {
  const { flags } = directive
  checkWidthFor(directive, 'leftJustify')
  checkWidthFor(directive, 'zeroPad')
  if ((flags.plus && flags.leadingSpace) || (flags.leftJustify && flags.zeroPad)) {
    throw new UnsupportedConversionError(
      `Illegal flag combination in '${directive.source}'`,
      directive.source
    )
  }
}

function mismatch(directive: Directive, detail: string): UnsupportedConversionError {
  return new UnsupportedConversionError(
    `Conversion '${directive.source}': ${detail}`,
    directive.source
  )
}

function illegalType(directive: Directive, value: unknown): UnsupportedConversionError {
  const type = value instanceof Date ? 'Date' : typeof value
  return new UnsupportedConversionError(
    `Conversion '${directive.source}' cannot format a ${type}`,
    directive.source
  )
}
