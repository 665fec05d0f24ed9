/**
 * SpanFormatter - printf-style formatting that keeps styles
 *
 * Both the template and any `%s` argument may be styled text; their spans
 * survive substitution. Other conversions are rendered to plain text by the
 * value conversion module and spliced in unstyled.
 *
 * A styled argument's spans can only appear once in a result: when the same
 * argument is substituted twice, the first occurrence keeps the styles and
 * the later ones are plain text.
 *
 * @example
 * ```typescript
 * const link = new StyledTextBuilder('example.com')
 * attachClickableStyle(link, '#d32f2f', () => openBrowser())
 *
 * const message = format('Please visit %1$s', link)
 * message.toString() // "Please visit example.com"
 * ```
 *
 * @module format/span-formatter
 */

import { loadConfig } from '../config'
import { createLogger } from '../logger'
import type { Logger } from '../logger'
import { IndexOutOfRangeError } from '../types'
import type { LocaleOrNone, SpanFormatterConfig } from '../types'
import { StyledText, StyledTextBuilder, isSpanned } from '../text/styled-text'
import type { SpannedText } from '../text/styled-text'
import { formatValue } from './conversion'
import { findNextSpecifier, parseArgumentSelector } from './scanner'
import type { ConversionSpecifier } from './scanner'

/**
 * Anything usable as a template
 */
export type Template = string | SpannedText

export class SpanFormatter {
  private readonly locale: LocaleOrNone
  private readonly logger: Logger

  constructor(config: SpanFormatterConfig = {}) {
    const resolved = loadConfig(config)
    this.locale = resolved.locale
    this.logger = createLogger('SpanFormatter', resolved.debug)
  }

  /**
   * Format with this formatter's locale
   *
   * @param template - Format template, plain or styled
   * @param args - Values referenced by the template; extras are ignored
   * @throws {MalformedSpecifierError} An explicit index is not a positive integer
   * @throws {IndexOutOfRangeError} A specifier refers past the argument list
   * @throws {UnsupportedConversionError} A conversion rejects its flags or argument
   */
  format(template: Template, ...args: unknown[]): StyledText {
    return this.formatIn(this.locale, template, args)
  }

  /**
   * Format with an explicit locale; `null` disables localization
   */
  formatWithLocale(locale: LocaleOrNone, template: Template, ...args: unknown[]): StyledText {
    return this.formatIn(locale, template, args)
  }

  private formatIn(locale: LocaleOrNone, template: Template, args: readonly unknown[]): StyledText {
    const out = new StyledTextBuilder(template)

    let cursor = 0
    let lastIndex = -1

    while (cursor < out.length) {
      const specifier = findNextSpecifier(out.toString(), cursor)
      if (!specifier) break

      let replacement: string | SpannedText
      if (specifier.conversionTerm === '%') {
        replacement = '%'
      } else if (specifier.conversionTerm === 'n') {
        replacement = '\n'
      } else {
        const selector = parseArgumentSelector(specifier.argTerm)
        if (selector.kind === 'implicit') {
          lastIndex += 1
        } else if (selector.kind === 'explicit') {
          lastIndex = selector.index
        }
        replacement = this.resolve(locale, specifier, lastIndex, args)
      }

      this.logger.debug('substitute', {
        specifier: out.toString().slice(specifier.start, specifier.end),
        at: specifier.start,
        styled: isSpanned(replacement),
      })

      out.replace(specifier.start, specifier.end, replacement)
      cursor = specifier.start + replacement.length
    }

    return out.toStyledText()
  }

  private resolve(
    locale: LocaleOrNone,
    specifier: ConversionSpecifier,
    index: number,
    args: readonly unknown[]
  ): string | SpannedText {
    if (index < 0 || index >= args.length) {
      throw new IndexOutOfRangeError(index, args.length)
    }

    const arg = args[index]
    if (specifier.conversionTerm === 's' && isSpanned(arg)) {
      return arg
    }

    return formatValue(locale, `%${specifier.modifierTerm}${specifier.conversionTerm}`, arg)
  }
}

let shared: { envKey: string; formatter: SpanFormatter } | null = null

// Rebuilt whenever RICHFMT_LOCALE or RICHFMT_DEBUG change between calls
function sharedFormatter(): SpanFormatter {
  const envKey = `${process.env.RICHFMT_LOCALE ?? ''}|${process.env.RICHFMT_DEBUG ?? ''}`
  if (!shared || shared.envKey !== envKey) {
    shared = { envKey, formatter: new SpanFormatter() }
  }
  return shared.formatter
}

/**
 * Format with the default locale
 *
 * The default locale and debug switch are read from `RICHFMT_LOCALE` and
 * `RICHFMT_DEBUG` as they stand at the time of the call.
 *
 * @example
 * ```typescript
 * format('%s-%s', 'a', 'b').toString() // "a-b"
 * format('%2$s %1$s', 'x', 'y').toString() // "y x"
 * ```
 */
export function format(template: Template, ...args: unknown[]): StyledText {
  return sharedFormatter().format(template, ...args)
}

/**
 * Format with an explicit locale; `null` disables localization
 *
 * @example
 * ```typescript
 * formatWithLocale('de-DE', '%,.2f', 1234.5).toString() // "1.234,50"
 * ```
 */
export function formatWithLocale(
  locale: LocaleOrNone,
  template: Template,
  ...args: unknown[]
): StyledText {
  return sharedFormatter().formatWithLocale(locale, template, ...args)
}
