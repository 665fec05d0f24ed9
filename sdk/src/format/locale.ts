/**
 * Locale-dependent symbols for numeric and date/time conversions
 *
 * A `null` locale means no localization: ASCII digits, `.` as decimal
 * separator, `,` grouping by three and English names.
 *
 * @module format/locale
 */

export interface LocaleSymbols {
  zeroDigit: string
  decimalSeparator: string
  groupingSeparator: string
  groupingSize: number
}

const ROOT_SYMBOLS: LocaleSymbols = {
  zeroDigit: '0',
  decimalSeparator: '.',
  groupingSeparator: ',',
  groupingSize: 3,
}

const symbolCache = new Map<string, LocaleSymbols>()

export function localeSymbols(locale: string | null): LocaleSymbols {
  if (locale === null) {
    return ROOT_SYMBOLS
  }

  const cached = symbolCache.get(locale)
  if (cached) {
    return cached
  }

  const parts = new Intl.NumberFormat(locale).formatToParts(1234567.5)
  const integerGroups = parts.filter(part => part.type === 'integer')
  const lastGroup = integerGroups[integerGroups.length - 1]

  const symbols: LocaleSymbols = {
    zeroDigit: new Intl.NumberFormat(locale, { useGrouping: false }).format(0),
    decimalSeparator: parts.find(part => part.type === 'decimal')?.value ?? '.',
    groupingSeparator: parts.find(part => part.type === 'group')?.value ?? '',
    groupingSize: integerGroups.length > 1 && lastGroup ? lastGroup.value.length : 3,
  }

  symbolCache.set(locale, symbols)
  return symbols
}

/**
 * Map ASCII digits onto the locale's digit set; other characters pass through
 */
export function localizeDigits(text: string, symbols: LocaleSymbols): string {
  if (symbols.zeroDigit === '0') {
    return text
  }
  const zero = symbols.zeroDigit.codePointAt(0) ?? 48
  return text.replace(/[0-9]/g, digit => String.fromCodePoint(zero + Number(digit)))
}

export function toUpperCase(text: string, locale: string | null): string {
  return locale === null ? text.toUpperCase() : text.toLocaleUpperCase(locale)
}

export function toLowerCase(text: string, locale: string | null): string {
  return locale === null ? text.toLowerCase() : text.toLocaleLowerCase(locale)
}
