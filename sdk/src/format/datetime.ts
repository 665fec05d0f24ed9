/**
 * Date/time suffixes for the `t` and `T` conversions
 *
 * Fields are read in the runtime's local time zone. Names (months, week
 * days, am/pm, zone) come from `Intl`; a `null` locale reads them in US
 * English.
 *
 * @module format/datetime
 */

import { localeSymbols, localizeDigits, toLowerCase, toUpperCase } from './locale'

export const DATE_TIME_SUFFIXES = 'HIklMSLNpzZsQBbhAaCYyjmdeRTrDFc'

const NAME_LOCALE_FALLBACK = 'en-US'
const MS_PER_DAY = 86_400_000

export function isDateTimeSuffix(suffix: string): boolean {
  return suffix.length === 1 && DATE_TIME_SUFFIXES.includes(suffix)
}

/**
 * Render one date/time field
 *
 * `suffix` must satisfy `isDateTimeSuffix`.
 */
export function formatDateTimeField(date: Date, suffix: string, locale: string | null): string {
  const symbols = localeSymbols(locale)
  const number = (value: number, width: number): string =>
    localizeDigits(String(value).padStart(width, '0'), symbols)
  const field = (next: string): string => formatDateTimeField(date, next, locale)
  const nameLocale = locale ?? NAME_LOCALE_FALLBACK

  const hours = date.getHours()
  const hours12 = hours % 12 === 0 ? 12 : hours % 12

  switch (suffix) {
    // Time
    case 'H': return number(hours, 2)
    case 'I': return number(hours12, 2)
    case 'k': return number(hours, 0)
    case 'l': return number(hours12, 0)
    case 'M': return number(date.getMinutes(), 2)
    case 'S': return number(date.getSeconds(), 2)
    case 'L': return number(date.getMilliseconds(), 3)
    case 'N': return number(date.getMilliseconds() * 1_000_000, 9)
    case 'p': return toLowerCase(dayPeriod(date, nameLocale), nameLocale)
    case 'z': return zoneOffset(date, number)
    case 'Z': return zoneName(date, nameLocale)
    case 's': return number(Math.floor(date.getTime() / 1000), 0)
    case 'Q': return number(date.getTime(), 0)

    // Date
    case 'B': return new Intl.DateTimeFormat(nameLocale, { month: 'long' }).format(date)
    case 'b':
    case 'h': return new Intl.DateTimeFormat(nameLocale, { month: 'short' }).format(date)
    case 'A': return new Intl.DateTimeFormat(nameLocale, { weekday: 'long' }).format(date)
    case 'a': return new Intl.DateTimeFormat(nameLocale, { weekday: 'short' }).format(date)
    case 'C': return number(Math.floor(date.getFullYear() / 100), 2)
    case 'Y': return number(date.getFullYear(), 4)
    case 'y': return number(date.getFullYear() % 100, 2)
    case 'j': return number(dayOfYear(date), 3)
    case 'm': return number(date.getMonth() + 1, 2)
    case 'd': return number(date.getDate(), 2)
    case 'e': return number(date.getDate(), 0)

    // Composites
    case 'R': return `${field('H')}:${field('M')}`
    case 'T': return `${field('H')}:${field('M')}:${field('S')}`
    case 'r': return `${field('I')}:${field('M')}:${field('S')} ${toUpperCase(field('p'), nameLocale)}`
    case 'D': return `${field('m')}/${field('d')}/${field('y')}`
    case 'F': return `${field('Y')}-${field('m')}-${field('d')}`
    case 'c':
      return `${field('a')} ${field('b')} ${field('d')} ${field('T')} ${field('Z')} ${field('Y')}`

    default:
      throw new RangeError(`Unknown date/time suffix '${suffix}'`)
  }
}

function dayOfYear(date: Date): number {
  const today = Date.UTC(date.getFullYear(), date.getMonth(), date.getDate())
  const newYear = Date.UTC(date.getFullYear(), 0, 1)
  return (today - newYear) / MS_PER_DAY + 1
}

function dayPeriod(date: Date, locale: string): string {
  const parts = new Intl.DateTimeFormat(locale, { hour: 'numeric', hour12: true }).formatToParts(date)
  return parts.find(part => part.type === 'dayPeriod')?.value ?? (date.getHours() < 12 ? 'am' : 'pm')
}

function zoneOffset(date: Date, number: (value: number, width: number) => string): string {
  // getTimezoneOffset is positive west of UTC
  const offset = -date.getTimezoneOffset()
  const sign = offset < 0 ? '-' : '+'
  const magnitude = Math.abs(offset)
  return sign + number(Math.floor(magnitude / 60) * 100 + (magnitude % 60), 4)
}

function zoneName(date: Date, locale: string): string {
  const parts = new Intl.DateTimeFormat(locale, { timeZoneName: 'short' }).formatToParts(date)
  return parts.find(part => part.type === 'timeZoneName')?.value ?? 'UTC'
}
