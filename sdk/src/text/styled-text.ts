/**
 * Styled text: characters plus style attachments on character ranges
 *
 * `StyledText` is the immutable form handed to and returned from the
 * formatter. `StyledTextBuilder` is the in-place buffer the formatter
 * splices into; its `replace` keeps every attachment consistent while the
 * buffer's length changes.
 *
 * @example
 * ```typescript
 * const link = new StyledTextBuilder('docs')
 * link.setSpan(new FormatStyle({ href: '/docs' }), 0, link.length)
 *
 * const out = new StyledTextBuilder('Read the ')
 * out.append(link)
 * out.toString() // "Read the docs"
 * out.getSpanStart(link.getSpans()[0]) // 9
 * ```
 *
 * @module text/styled-text
 */

import { SpanRangeError } from '../types'
import { SpanFlags, SpanUtils } from './span'
import type { SpanRecord, Style } from './span'

/**
 * Constructor used to pick spans of one style class out of a buffer
 */
export type StyleKind<S extends Style> = abstract new (...args: never[]) => S

/**
 * Read-only view shared by the immutable and the mutable form
 */
export abstract class SpannedText {
  protected text: string
  protected records: SpanRecord[]

  protected constructor(source: string | SpannedText) {
    if (typeof source === 'string') {
      this.text = source
      this.records = []
    } else {
      this.text = source.text
      this.records = source.records.slice()
    }
  }

  get length(): number {
    return this.text.length
  }

  toString(): string {
    return this.text
  }

  charAt(index: number): string {
    return this.text.charAt(index)
  }

  /**
   * Snapshot of every attachment, in attachment order
   */
  spanRecords(): readonly SpanRecord[] {
    return this.records.slice()
  }

  /**
   * Styles attached over `[start, end]`, optionally only those of one class
   */
  getSpans(start?: number, end?: number): Style[]
  getSpans<S extends Style>(start: number, end: number, kind: StyleKind<S>): S[]
  getSpans<S extends Style>(
    start: number = 0,
    end: number = this.length,
    kind?: StyleKind<S>
  ): Style[] {
    const styles = this.records
      .filter(record => SpanUtils.intersects(record, start, end))
      .map(record => record.style)
    if (kind === undefined) {
      return styles
    }
    return styles.filter((style): style is S => style instanceof kind)
  }

  /**
   * Start offset of an attached style, or -1
   */
  getSpanStart(style: Style): number {
    return this.findRecord(style)?.start ?? -1
  }

  /**
   * End offset of an attached style, or -1
   */
  getSpanEnd(style: Style): number {
    return this.findRecord(style)?.end ?? -1
  }

  /**
   * Flags of an attached style, or 0
   */
  getSpanFlags(style: Style): SpanFlags | 0 {
    return this.findRecord(style)?.flags ?? 0
  }

  hasSpan(style: Style): boolean {
    return this.findRecord(style) !== undefined
  }

  /**
   * First offset after `start` where some span begins or ends, capped at `limit`
   */
  nextSpanTransition(start: number, limit: number, kind?: StyleKind<Style>): number {
    let next = limit
    for (const record of this.records) {
      if (kind !== undefined && !(record.style instanceof kind)) continue
      if (record.start > start && record.start < next) next = record.start
      if (record.end > start && record.end < next) next = record.end
    }
    return next
  }

  /**
   * Copy of `[start, end)` with attachments clipped to it
   */
  subSequence(start: number, end: number): StyledText {
    checkRange('subSequence', start, end, this.length)

    const records: SpanRecord[] = []
    for (const record of this.records) {
      const overlaps = record.start === record.end
        ? record.start >= start && record.start <= end
        : record.end > start && record.start < end
      if (!overlaps) continue

      records.push({
        style: record.style,
        start: Math.max(record.start, start) - start,
        end: Math.min(record.end, end) - start,
        flags: record.flags,
      })
    }

    return StyledText.fromParts(this.text.slice(start, end), records)
  }

  /**
   * Same characters and the same styles on the same ranges
   */
  equals(other: SpannedText): boolean {
    if (this.text !== other.text || this.records.length !== other.records.length) {
      return false
    }
    return this.records.every(record => {
      const match = other.findRecord(record.style)
      return (
        match !== undefined &&
        match.start === record.start &&
        match.end === record.end &&
        match.flags === record.flags
      )
    })
  }

  protected findRecord(style: Style): SpanRecord | undefined {
    return this.records.find(record => record.style === style)
  }
}

/**
 * Immutable styled text
 */
export class StyledText extends SpannedText {
  constructor(source: string | SpannedText = '') {
    super(source)
  }

  /** @internal */
  static fromParts(text: string, records: SpanRecord[]): StyledText {
    const result = new StyledText(text)
    result.records = records.slice()
    return result
  }
}

/**
 * Mutable styled text buffer
 */
export class StyledTextBuilder extends SpannedText {
  constructor(source: string | SpannedText = '') {
    super(source)
  }

  /**
   * Attach `style` to `[start, end)`
   *
   * A style that is already attached is moved to the new range.
   */
  setSpan(
    style: Style,
    start: number,
    end: number,
    flags: SpanFlags = SpanFlags.EXCLUSIVE_EXCLUSIVE
  ): this {
    checkRange('setSpan', start, end, this.length)
    if (start === end && flags === SpanFlags.EXCLUSIVE_EXCLUSIVE) {
      throw new SpanRangeError('Exclusive-exclusive spans cannot have a zero length')
    }

    const record: SpanRecord = { style, start, end, flags }
    const index = this.records.findIndex(existing => existing.style === style)
    if (index >= 0) {
      this.records[index] = record
    } else {
      this.records.push(record)
    }
    return this
  }

  removeSpan(style: Style): this {
    this.records = this.records.filter(record => record.style !== style)
    return this
  }

  clearSpans(): this {
    this.records = []
    return this
  }

  /**
   * Replace `[start, end)` with `replacement`
   *
   * Existing attachments are shifted, clipped or dropped according to their
   * flags. Attachments carried by a styled replacement are copied in at
   * `start`, except styles this buffer already holds: those keep their
   * current range and the inserted copy stays plain.
   */
  replace(start: number, end: number, replacement: string | SpannedText): this {
    checkRange('replace', start, end, this.length)

    const insertedText = replacement.toString()
    const inserted = typeof replacement === 'string' ? [] : replacement.spanRecords()

    this.text = this.text.slice(0, start) + insertedText + this.text.slice(end)

    const kept: SpanRecord[] = []
    for (const record of this.records) {
      const mapped = SpanUtils.remap(record, start, end, insertedText.length)
      if (mapped) kept.push(mapped)
    }
    this.records = kept

    for (const record of inserted) {
      if (this.hasSpan(record.style)) continue
      this.records.push({
        style: record.style,
        start: record.start + start,
        end: record.end + start,
        flags: record.flags,
      })
    }

    return this
  }

  insert(where: number, text: string | SpannedText): this {
    return this.replace(where, where, text)
  }

  append(text: string | SpannedText): this {
    return this.replace(this.length, this.length, text)
  }

  delete(start: number, end: number): this {
    return this.replace(start, end, '')
  }

  toStyledText(): StyledText {
    return new StyledText(this)
  }
}

/**
 * Check whether a value carries styled text
 */
export function isSpanned(value: unknown): value is SpannedText {
  return value instanceof SpannedText
}

function checkRange(operation: string, start: number, end: number, length: number): void {
  if (!Number.isInteger(start) || !Number.isInteger(end)) {
    throw new SpanRangeError(`${operation} (${start} ... ${end}) has non-integer offsets`)
  }
  if (start > end) {
    throw new SpanRangeError(`${operation} (${start} ... ${end}) has end before start`)
  }
  if (start < 0 || end > length) {
    throw new SpanRangeError(`${operation} (${start} ... ${end}) ends beyond length ${length}`)
  }
}
