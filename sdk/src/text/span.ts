/**
 * Span attachments
 *
 * A span ties a style object to a `[start, end)` character range. The flags
 * decide whether text inserted exactly at a boundary joins the span.
 */

/**
 * Any non-null object can be attached as a style. Identity matters: the same
 * object is attached to at most one range of one buffer.
 */
export type Style = object

export enum SpanFlags {
  /** Text inserted at either boundary stays outside the span */
  EXCLUSIVE_EXCLUSIVE = 0x21,
  /** Text inserted at the start joins the span, at the end does not */
  INCLUSIVE_EXCLUSIVE = 0x11,
  /** Text inserted at the end joins the span, at the start does not */
  EXCLUSIVE_INCLUSIVE = 0x22,
  /** Text inserted at either boundary joins the span */
  INCLUSIVE_INCLUSIVE = 0x12,
}

export interface SpanRecord<S extends Style = Style> {
  readonly style: S
  readonly start: number
  readonly end: number
  readonly flags: SpanFlags
}

export const SpanUtils = {
  startInclusive(flags: SpanFlags): boolean {
    return flags === SpanFlags.INCLUSIVE_EXCLUSIVE || flags === SpanFlags.INCLUSIVE_INCLUSIVE
  },

  endInclusive(flags: SpanFlags): boolean {
    return flags === SpanFlags.EXCLUSIVE_INCLUSIVE || flags === SpanFlags.INCLUSIVE_INCLUSIVE
  },

  /**
   * Check whether a span touches `[start, end]`
   *
   * Empty query ranges match spans that contain or border the point,
   * mirroring how cursors see styles.
   */
  intersects(span: SpanRecord, start: number, end: number): boolean {
    if (span.start > end || span.end < start) {
      return false
    }
    // Spans that merely border a non-empty query range are excluded
    if (span.start !== span.end && start !== end) {
      if (span.start === end || span.end === start) {
        return false
      }
    }
    return true
  },

  /**
   * Map a span through `replace(start, end, <insertedLength chars>)`
   *
   * When text is actually removed, a boundary sitting on the edge of the
   * removed range stays with the span, so a span over exactly `[start, end)`
   * ends up over the inserted text. Returns null when the span no longer
   * covers anything it should keep.
   */
  remap(
    span: SpanRecord,
    start: number,
    end: number,
    insertedLength: number
  ): SpanRecord | null {
    const delta = insertedLength - (end - start)
    const newEnd = start + insertedLength
    const removing = end > start

    let mappedStart: number
    if (span.start < start) {
      mappedStart = span.start
    } else if (span.start > end) {
      mappedStart = span.start + delta
    } else {
      const keep = SpanUtils.startInclusive(span.flags) || (removing && span.start === start)
      mappedStart = keep ? start : newEnd
    }

    let mappedEnd: number
    if (span.end < start) {
      mappedEnd = span.end
    } else if (span.end > end) {
      mappedEnd = span.end + delta
    } else {
      const keep = SpanUtils.endInclusive(span.flags) || (removing && span.end === end)
      mappedEnd = keep ? newEnd : start
    }

    if (mappedStart > mappedEnd) {
      return null
    }

    if (
      mappedStart === mappedEnd &&
      span.start !== span.end &&
      span.flags === SpanFlags.EXCLUSIVE_EXCLUSIVE
    ) {
      return null
    }

    if (mappedStart === span.start && mappedEnd === span.end) {
      return span
    }

    return { style: span.style, start: mappedStart, end: mappedEnd, flags: span.flags }
  },
}
