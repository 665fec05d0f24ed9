/**
 * Core TypeScript types for the richfmt SDK
 * @module types
 */

// ====================
// Configuration Types
// ====================

export interface SpanFormatterConfig {
  /**
   * BCP 47 locale used for plain-text conversions.
   * `null` disables localization; omitted means the runtime default.
   */
  locale?: string | null

  /** Log every substitution through the debug logger (default: false) */
  debug?: boolean
}

/**
 * Locale argument accepted by the formatting entry points.
 * `null` means "no localization".
 */
export type LocaleOrNone = string | null

// ====================
// Error Types
// ====================

export class RichFormatError extends Error {
  constructor(message: string, public code: string) {
    super(message)
    this.name = 'RichFormatError'
  }
}

/**
 * An explicit argument index (`%N$`) that is not a positive integer
 */
export class MalformedSpecifierError extends RichFormatError {
  constructor(message: string, public readonly specifier: string) {
    super(message, 'MALFORMED_SPECIFIER')
    this.name = 'MalformedSpecifierError'
  }
}

/**
 * A resolved argument index that falls outside the argument list
 */
export class IndexOutOfRangeError extends RichFormatError {
  constructor(
    public readonly index: number,
    public readonly argumentCount: number
  ) {
    super(
      `Argument index ${index} out of range (argument count: ${argumentCount})`,
      'INDEX_OUT_OF_RANGE'
    )
    this.name = 'IndexOutOfRangeError'
  }
}

/**
 * The conversion primitive rejected a flag/width/precision/conversion
 * combination, or the argument's runtime type for it
 */
export class UnsupportedConversionError extends RichFormatError {
  constructor(message: string, public readonly specifier: string) {
    super(message, 'UNSUPPORTED_CONVERSION')
    this.name = 'UnsupportedConversionError'
  }
}

export class SpanRangeError extends RichFormatError {
  constructor(message: string) {
    super(message, 'SPAN_RANGE')
    this.name = 'SpanRangeError'
  }
}

export class ConfigError extends RichFormatError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR')
    this.name = 'ConfigError'
  }
}
