/**
 * Format attributes carried by `FormatStyle`
 *
 * @module style/attributes
 */

export interface FormatAttributes {
  bold?: boolean
  italic?: boolean
  underline?: boolean
  strikethrough?: boolean
  /** #RRGGBB */
  color?: string
  /** #RRGGBB */
  background?: string
  href?: string

  /** Renderer-specific extras ('font-size', 'data-id', ...) */
  [key: string]: unknown
}

const HEX_COLOR = /^#[0-9A-Fa-f]{6}$/

export function isHexColor(color: string): boolean {
  return HEX_COLOR.test(color)
}

/**
 * Error message for the first color value that is not hex, or undefined
 */
export function findInvalidColor(attrs: FormatAttributes): string | undefined {
  for (const key of ['color', 'background'] as const) {
    const value = attrs[key]
    if (value !== undefined && !isHexColor(value)) {
      return `Invalid ${key}: ${value}. Expected hex format (#RRGGBB)`
    }
  }
  return undefined
}

/**
 * `[bold, href:/a]`: flags by name, other set values as `key:value`
 */
export function describeAttributes(attrs: FormatAttributes): string {
  const parts: string[] = []
  for (const [key, value] of Object.entries(attrs)) {
    if (value === undefined || value === null || value === false) continue
    parts.push(value === true ? key : `${key}:${String(value)}`)
  }
  return parts.length > 0 ? `[${parts.join(', ')}]` : '[none]'
}
