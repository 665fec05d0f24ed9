/**
 * Conversion specifier scanner
 *
 * A specifier is `%` followed by three terms:
 * 1. argument term: empty, `N$` (explicit 1-based index) or `<` (relative)
 * 2. modifier term: flags, width and precision; anything but ASCII letters and `%`
 * 3. conversion term: one letter other than `t`/`T`, a literal `%`, or
 *    `t`/`T` followed by one date/time letter
 *
 * @module format/scanner
 */

import { MalformedSpecifierError } from '../types'

export const FORMAT_SEQUENCE = /%([0-9]+\$|<?)([^a-zA-Z%]*)([a-su-zA-SU-Z%]|[tT][a-zA-Z])/g

export interface ConversionSpecifier {
  /** `''`, `'<'` or `'N$'` */
  argTerm: string
  /** Flags, width and precision exactly as written */
  modifierTerm: string
  /** Conversion letter(s) or `%` */
  conversionTerm: string
  /** Offset of the `%` */
  start: number
  /** Offset just past the conversion term */
  end: number
}

export type ArgumentSelector =
  | { kind: 'implicit' }
  | { kind: 'relative' }
  | { kind: 'explicit'; index: number }

/**
 * Find the leftmost specifier at or after `from`
 *
 * Text between a stray `%` and the next real specifier is skipped, never
 * reported as an error.
 */
export function findNextSpecifier(text: string, from: number): ConversionSpecifier | null {
  // Fresh matcher per call: the pattern is global and carries lastIndex
  const matcher = new RegExp(FORMAT_SEQUENCE.source, 'g')
  matcher.lastIndex = from

  const match = matcher.exec(text)
  if (!match) {
    return null
  }

  const [whole, argTerm = '', modifierTerm = '', conversionTerm = ''] = match
  return {
    argTerm,
    modifierTerm,
    conversionTerm,
    start: match.index,
    end: match.index + whole.length,
  }
}

/**
 * Every specifier in `text`, left to right
 */
export function scanSpecifiers(text: string): ConversionSpecifier[] {
  const found: ConversionSpecifier[] = []
  let cursor = 0
  while (cursor < text.length) {
    const specifier = findNextSpecifier(text, cursor)
    if (!specifier) break
    found.push(specifier)
    cursor = specifier.end
  }
  return found
}

export function parseArgumentSelector(argTerm: string): ArgumentSelector {
  if (argTerm === '') {
    return { kind: 'implicit' }
  }
  if (argTerm === '<') {
    return { kind: 'relative' }
  }

  const digits = argTerm.endsWith('$') ? argTerm.slice(0, -1) : argTerm
  const position = /^[0-9]+$/.test(digits) ? Number(digits) : Number.NaN
  if (!Number.isSafeInteger(position) || position < 1) {
    throw new MalformedSpecifierError(
      `Argument index '${argTerm}' is not a positive integer`,
      argTerm
    )
  }

  return { kind: 'explicit', index: position - 1 }
}
