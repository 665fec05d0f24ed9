/**
 * richfmt SDK
 * printf-style formatting for styled text
 *
 * Features: styled templates and arguments, positional and relative
 * argument references, locale-aware numeric and date/time conversions
 *
 * @packageDocumentation
 * @module @richfmt/sdk
 */

// Formatting
export { SpanFormatter, format, formatWithLocale } from './format/span-formatter'
export type { Template } from './format/span-formatter'
export { formatValue, parseDirective } from './format/conversion'
export type { Directive, FormatFlags } from './format/conversion'
export {
  FORMAT_SEQUENCE,
  findNextSpecifier,
  scanSpecifiers,
  parseArgumentSelector,
} from './format/scanner'
export type { ConversionSpecifier, ArgumentSelector } from './format/scanner'

// Styled text
export { StyledText, StyledTextBuilder, SpannedText, isSpanned } from './text/styled-text'
export type { StyleKind } from './text/styled-text'
export { SpanFlags, SpanUtils } from './text/span'
export type { SpanRecord, Style } from './text/span'

// Styles
export { attachClickableStyle } from './style/clickable'
export { ClickableStyle, AppearanceStyle, FormatStyle, InvalidStyleError } from './style/styles'
export type { DrawState } from './style/styles'
export { isHexColor, describeAttributes } from './style/attributes'
export type { FormatAttributes } from './style/attributes'

// Configuration
export { loadConfig } from './config'
export type { ResolvedConfig } from './config'

// Types
export type { SpanFormatterConfig, LocaleOrNone } from './types'

// Errors
export {
  RichFormatError,
  MalformedSpecifierError,
  IndexOutOfRangeError,
  UnsupportedConversionError,
  SpanRangeError,
  ConfigError,
} from './types'

// Version
export const VERSION = '0.1.0'
