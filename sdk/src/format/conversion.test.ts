/**
 * Value Conversion Tests
 *
 * Plain-text rendering of single directives. Everything runs with the
 * `null` locale unless a test is about localization.
 */

import { describe, it, expect } from 'vitest'
import { formatValue, parseDirective, hashCode } from './conversion'
import { UnsupportedConversionError } from '../types'

function fmt(directive: string, value: unknown): string {
  return formatValue(null, directive, value)
}

describe('Conversion - Directive parsing', () => {
  it('should split flags, width, precision and conversion', () => {
    const directive = parseDirective('%-,10.3f')

    expect(directive.flags.leftJustify).toBe(true)
    expect(directive.flags.group).toBe(true)
    expect(directive.flags.zeroPad).toBe(false)
    expect(directive.width).toBe(10)
    expect(directive.precision).toBe(3)
    expect(directive.conversion).toBe('f')
    expect(directive.uppercase).toBe(false)
  })

  it('should read date/time suffixes and upper case', () => {
    const directive = parseDirective('%TB')

    expect(directive.conversion).toBe('t')
    expect(directive.suffix).toBe('B')
    expect(directive.uppercase).toBe(true)
  })

  it('should reject duplicate flags', () => {
    expect(() => parseDirective('%--5d')).toThrow("Duplicate flag '-'")
  })

  it('should reject upper case forms that do not exist', () => {
    expect(() => parseDirective('%D')).toThrow(UnsupportedConversionError)
  })

  it('should reject text that is not a directive', () => {
    expect(() => parseDirective('%5.')).toThrow("Malformed conversion '%5.'")
  })
})

describe('Conversion - General', () => {
  it('should print booleans', () => {
    expect(fmt('%b', null)).toBe('false')
    expect(fmt('%b', false)).toBe('false')
    expect(fmt('%b', 'x')).toBe('true')
    expect(fmt('%B', true)).toBe('TRUE')
  })

  it('should print strings with width and precision', () => {
    expect(fmt('%s', 'abc')).toBe('abc')
    expect(fmt('%s', null)).toBe('null')
    expect(fmt('%6s', 'ab')).toBe('    ab')
    expect(fmt('%-6s', 'ab')).toBe('ab    ')
    expect(fmt('%.3s', 'abcdef')).toBe('abc')
    expect(fmt('%S', 'abc')).toBe('ABC')
  })

  it('should print hash codes in hex', () => {
    expect(fmt('%h', 'hello')).toBe('5e918d2')
    expect(fmt('%H', 'hello')).toBe('5E918D2')
    expect(fmt('%h', null)).toBe('null')
    expect(fmt('%h', -1)).toBe('ffffffff')
  })

  it('should reject numeric flags', () => {
    expect(() => fmt('%#s', 'a')).toThrow("flag '#' is not allowed")
    expect(() => fmt('%+s', 'a')).toThrow("flag '+' is not allowed")
    expect(() => fmt('%-s', 'a')).toThrow("Flag '-' needs a width")
  })
})

describe('Conversion - Hash codes', () => {
  it('should hash like the polynomial string hash', () => {
    expect(hashCode('')).toBe(0)
    expect(hashCode('a')).toBe(97)
    expect(hashCode('ab')).toBe(97 * 31 + 98)
  })

  it('should hash booleans and small integers to fixed values', () => {
    expect(hashCode(true)).toBe(1231)
    expect(hashCode(false)).toBe(1237)
    expect(hashCode(42)).toBe(42)
  })

  it('should fold 64-bit integers', () => {
    expect(hashCode(5n)).toBe(5)
    expect(hashCode(-1n)).toBe(0)
    expect(hashCode(1n << 32n)).toBe(1)
  })
})

describe('Conversion - Character', () => {
  it('should print code points and single characters', () => {
    expect(fmt('%c', 65)).toBe('A')
    expect(fmt('%c', 'z')).toBe('z')
    expect(fmt('%C', 'z')).toBe('Z')
    expect(fmt('%3c', 'z')).toBe('  z')
    expect(fmt('%c', 0x1f600)).toBe('\u{1f600}')
  })

  it('should reject other values', () => {
    expect(() => fmt('%c', 'ab')).toThrow(UnsupportedConversionError)
    expect(() => fmt('%c', -1)).toThrow('out of range')
    expect(() => fmt('%.1c', 'a')).toThrow('precision is not allowed')
  })
})

describe('Conversion - Integers', () => {
  it('should print decimals with sign flags', () => {
    expect(fmt('%d', 42)).toBe('42')
    expect(fmt('%d', -42)).toBe('-42')
    expect(fmt('%+d', 5)).toBe('+5')
    expect(fmt('% d', 5)).toBe(' 5')
    expect(fmt('%(d', -5)).toBe('(5)')
    expect(fmt('%(d', 5)).toBe('5')
  })

  it('should group and pad decimals', () => {
    expect(fmt('%,d', 1234567)).toBe('1,234,567')
    expect(fmt('%05d', -42)).toBe('-0042')
    expect(fmt('%-5d', 42)).toBe('42   ')
    expect(fmt('%(07d', -42)).toBe('(00042)')
  })

  it('should print bigint values', () => {
    expect(fmt('%d', 12345678901234567890n)).toBe('12345678901234567890')
    expect(fmt('%x', -255n)).toBe('-ff')
    expect(fmt('%+#x', 255n)).toBe('+0xff')
  })

  it('should print octal and hex', () => {
    expect(fmt('%x', 255)).toBe('ff')
    expect(fmt('%X', 255)).toBe('FF')
    expect(fmt('%#X', 255)).toBe('0XFF')
    expect(fmt('%o', 8)).toBe('10')
    expect(fmt('%#o', 8)).toBe('010')
    expect(fmt('%08x', 255)).toBe('000000ff')
    expect(fmt('%#08x', 255)).toBe('0x0000ff')
  })

  it('should print negative numbers as two\'s complement', () => {
    expect(fmt('%x', -1)).toBe('ffffffff')
    expect(fmt('%o', -1)).toBe('37777777777')
  })

  it('should reject mismatched flags and values', () => {
    expect(() => fmt('%#d', 1)).toThrow("flag '#' is not allowed")
    expect(() => fmt('%,x', 1)).toThrow("flag ',' is not allowed")
    expect(() => fmt('%+x', 1)).toThrow("flag '+' is not allowed")
    expect(() => fmt('%-d', 1)).toThrow("Flag '-' needs a width")
    expect(() => fmt('%0d', 1)).toThrow("Flag '0' needs a width")
    expect(() => fmt('%+ d', 1)).toThrow('Illegal flag combination')
    expect(() => fmt('%-05d', 1)).toThrow('Illegal flag combination')
    expect(() => fmt('%.2d', 1)).toThrow('precision is not allowed')
    expect(() => fmt('%d', 'x')).toThrow("cannot format a string")
    expect(() => fmt('%d', 3.5)).toThrow("cannot format a number")
  })

  it('should print null as text', () => {
    expect(fmt('%d', null)).toBe('null')
  })
})

describe('Conversion - Floating point', () => {
  it('should print fixed notation', () => {
    expect(fmt('%f', 1.5)).toBe('1.500000')
    expect(fmt('%5.2f', 3.14159)).toBe(' 3.14')
    expect(fmt('%.2f', 1.005)).toBe('1.01')
    expect(fmt('%.0f', 2.5)).toBe('3')
    expect(fmt('%#.0f', 2)).toBe('2.')
  })

  it('should pad, group and sign fixed notation', () => {
    expect(fmt('%08.3f', -3.5)).toBe('-003.500')
    expect(fmt('%,.2f', 1234567.891)).toBe('1,234,567.89')
    expect(fmt('%+.1f', 2)).toBe('+2.0')
    expect(fmt('%(010.2f', -3.5)).toBe('(00003.50)')
  })

  it('should print scientific notation', () => {
    expect(fmt('%e', 12345.678)).toBe('1.234568e+04')
    expect(fmt('%.0e', 12345)).toBe('1e+04')
    expect(fmt('%E', 0.00025)).toBe('2.500000E-04')
    expect(fmt('%e', 0)).toBe('0.000000e+00')
    expect(fmt('%012.2e', 1500)).toBe('00001.50e+03')
  })

  it('should print general notation', () => {
    expect(fmt('%g', 0.0001)).toBe('0.000100000')
    expect(fmt('%g', 123456789)).toBe('1.23457e+08')
    expect(fmt('%G', 1e-10)).toBe('1.00000E-10')
    expect(fmt('%.3g', 3.14159)).toBe('3.14')
  })

  it('should print hexadecimal floating point', () => {
    expect(fmt('%a', 3)).toBe('0x1.8p1')
    expect(fmt('%A', 3)).toBe('0X1.8P1')
    expect(fmt('%a', -0.5)).toBe('-0x1.0p-1')
    expect(fmt('%.3a', 1)).toBe('0x1.000p0')
    expect(fmt('%a', 0)).toBe('0x0.0p0')
  })

  it('should print special values', () => {
    expect(fmt('%f', Number.NaN)).toBe('NaN')
    expect(fmt('%E', Number.NaN)).toBe('NAN')
    expect(fmt('%f', -Infinity)).toBe('-Infinity')
    expect(fmt('%+e', Infinity)).toBe('+Infinity')
    expect(fmt('%(f', -Infinity)).toBe('(Infinity)')
    expect(fmt('%10f', Number.NaN)).toBe('       NaN')
  })

  it('should reject unsupported flags and values', () => {
    expect(() => fmt('%,e', 1)).toThrow("flag ',' is not allowed")
    expect(() => fmt('%#g', 1)).toThrow("flag '#' is not allowed")
    expect(() => fmt('%(a', 1)).toThrow("flag '(' is not allowed")
    expect(() => fmt('%f', 1n)).toThrow('cannot format a bigint')
    expect(() => fmt('%f', '1.5')).toThrow('cannot format a string')
  })
})

describe('Conversion - Date/time', () => {
  const date = new Date(2024, 0, 5, 14, 3, 9, 7)

  it('should print time fields', () => {
    expect(fmt('%tH', date)).toBe('14')
    expect(fmt('%tI', date)).toBe('02')
    expect(fmt('%tk', date)).toBe('14')
    expect(fmt('%tl', date)).toBe('2')
    expect(fmt('%tM', date)).toBe('03')
    expect(fmt('%tS', date)).toBe('09')
    expect(fmt('%tL', date)).toBe('007')
    expect(fmt('%tN', date)).toBe('007000000')
    expect(fmt('%tp', date)).toBe('pm')
    expect(fmt('%Tp', date)).toBe('PM')
    expect(fmt('%tQ', date)).toBe(String(date.getTime()))
    expect(fmt('%ts', date)).toBe(String(Math.floor(date.getTime() / 1000)))
  })

  it('should print date fields', () => {
    expect(fmt('%tY', date)).toBe('2024')
    expect(fmt('%ty', date)).toBe('24')
    expect(fmt('%tC', date)).toBe('20')
    expect(fmt('%tj', date)).toBe('005')
    expect(fmt('%tm', date)).toBe('01')
    expect(fmt('%td', date)).toBe('05')
    expect(fmt('%te', date)).toBe('5')
    expect(fmt('%tB', date)).toBe('January')
    expect(fmt('%TB', date)).toBe('JANUARY')
    expect(fmt('%tb', date)).toBe('Jan')
    expect(fmt('%th', date)).toBe('Jan')
    expect(fmt('%tA', date)).toBe('Friday')
    expect(fmt('%ta', date)).toBe('Fri')
  })

  it('should print composite fields', () => {
    expect(fmt('%tR', date)).toBe('14:03')
    expect(fmt('%tT', date)).toBe('14:03:09')
    expect(fmt('%tr', date)).toBe('02:03:09 PM')
    expect(fmt('%tD', date)).toBe('01/05/24')
    expect(fmt('%tF', date)).toBe('2024-01-05')
  })

  it('should accept epoch milliseconds', () => {
    expect(fmt('%tF', date.getTime())).toBe('2024-01-05')
    expect(fmt('%tY', BigInt(date.getTime()))).toBe('2024')
  })

  it('should justify date fields', () => {
    expect(fmt('%-6tY', date)).toBe('2024  ')
    expect(fmt('%6tY', date)).toBe('  2024')
  })

  it('should reject unknown suffixes and values', () => {
    expect(() => fmt('%tq', date)).toThrow("Unknown date/time conversion 'tq'")
    expect(() => fmt('%tY', 'today')).toThrow('cannot format a string')
    expect(() => fmt('%tY', new Date(Number.NaN))).toThrow('Invalid date')
    expect(() => fmt('%.2tY', date)).toThrow('precision is not allowed')
  })
})

describe('Conversion - Literals', () => {
  it('should print percent and newline', () => {
    expect(fmt('%%', null)).toBe('%')
    expect(fmt('%-3%', null)).toBe('%  ')
    expect(fmt('%n', null)).toBe('\n')
  })

  it('should reject unknown conversions', () => {
    expect(() => fmt('%q', 1)).toThrow("Unknown conversion 'q'")
    expect(() => fmt('%5n', null)).toThrow('width is not allowed')
  })
})

describe('Conversion - Localization', () => {
  it('should use the locale separators', () => {
    expect(formatValue('de-DE', '%,.2f', 1234.5)).toBe('1.234,50')
    expect(formatValue('de-DE', '%,d', 1234567)).toBe('1.234.567')
    expect(formatValue('en-US', '%,.1f', 1234.5)).toBe('1,234.5')
  })

  it('should use the locale names', () => {
    const date = new Date(2024, 0, 5, 14, 3, 9, 7)
    expect(formatValue('de-DE', '%tB', date)).toBe('Januar')
  })
})
