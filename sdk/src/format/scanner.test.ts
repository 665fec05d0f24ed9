import { describe, it, expect } from 'vitest'
import { findNextSpecifier, scanSpecifiers, parseArgumentSelector } from './scanner'
import { MalformedSpecifierError } from '../types'

describe('Scanner - findNextSpecifier', () => {
  it('should split a specifier into its terms', () => {
    expect(findNextSpecifier('Total: %2$-,10.2f!', 0)).toEqual({
      argTerm: '2$',
      modifierTerm: '-,10.2',
      conversionTerm: 'f',
      start: 7,
      end: 17,
    })
  })

  it('should read relative and date/time specifiers', () => {
    const specifier = findNextSpecifier('on %<tY', 0)

    expect(specifier?.argTerm).toBe('<')
    expect(specifier?.conversionTerm).toBe('tY')
    expect(specifier?.start).toBe(3)
    expect(specifier?.end).toBe(7)
  })

  it('should start searching at the given offset', () => {
    expect(findNextSpecifier('%s and %d', 1)?.start).toBe(7)
    expect(findNextSpecifier('%s and %d', 8)).toBeNull()
  })

  it('should skip a percent sign that starts no specifier', () => {
    const specifier = findNextSpecifier('a %t b %s', 0)

    expect(specifier?.start).toBe(7)
    expect(specifier?.conversionTerm).toBe('s')
  })

  it('should return null when nothing matches', () => {
    expect(findNextSpecifier('plain text', 0)).toBeNull()
    expect(findNextSpecifier('trailing %', 0)).toBeNull()
    expect(findNextSpecifier('%5', 0)).toBeNull()
  })
})

describe('Scanner - scanSpecifiers', () => {
  it('should find every specifier left to right', () => {
    const found = scanSpecifiers('%s, %1$d %<x %% %n')

    expect(found.map(specifier => specifier.conversionTerm)).toEqual(['s', 'd', 'x', '%', 'n'])
    expect(found.map(specifier => specifier.argTerm)).toEqual(['', '1$', '<', '', ''])
    expect(found.map(specifier => specifier.start)).toEqual([0, 4, 9, 13, 16])
  })
})

describe('Scanner - parseArgumentSelector', () => {
  it('should classify argument terms', () => {
    expect(parseArgumentSelector('')).toEqual({ kind: 'implicit' })
    expect(parseArgumentSelector('<')).toEqual({ kind: 'relative' })
    expect(parseArgumentSelector('3$')).toEqual({ kind: 'explicit', index: 2 })
  })

  it('should reject a zero index', () => {
    expect(() => parseArgumentSelector('0$')).toThrow(MalformedSpecifierError)
    expect(() => parseArgumentSelector('0$')).toThrow("Argument index '0$' is not a positive integer")
  })

  it('should reject indexes that are not safe integers', () => {
    expect(() => parseArgumentSelector('99999999999999999999$')).toThrow(MalformedSpecifierError)
  })
})
