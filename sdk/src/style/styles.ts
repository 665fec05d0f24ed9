/**
 * Built-in style objects
 *
 * The formatter never looks inside a style; these classes exist for callers
 * and renderers. Each instance is its own attachment, so two equal-looking
 * styles are still two spans.
 */

import { RichFormatError } from '../types'
import { describeAttributes, findInvalidColor, isHexColor } from './attributes'
import type { FormatAttributes } from './attributes'

/**
 * Paint state a renderer hands to `AppearanceStyle#updateDrawState`
 */
export interface DrawState {
  color: string
  underline: boolean
}

export class InvalidStyleError extends RichFormatError {
  constructor(message: string) {
    super(message, 'INVALID_STYLE')
    this.name = 'InvalidStyleError'
  }
}

/**
 * Marks a range as activatable
 */
export class ClickableStyle {
  constructor(private readonly action?: () => void) {}

  onClick(): void {
    if (this.action) {
      this.action()
    }
  }
}

/**
 * Overrides text color and underline while drawing
 */
export class AppearanceStyle {
  constructor(
    public readonly color: string,
    public readonly underline: boolean = false
  ) {
    if (!isHexColor(color)) {
      throw new InvalidStyleError(`Invalid color: ${color}. Expected hex format (#RRGGBB)`)
    }
  }

  updateDrawState(state: DrawState): void {
    state.color = this.color
    state.underline = this.underline
  }
}

/**
 * A bag of format attributes (bold, color, link, ...)
 */
export class FormatStyle {
  public readonly attributes: Readonly<FormatAttributes>

  constructor(attributes: FormatAttributes) {
    const error = findInvalidColor(attributes)
    if (error) {
      throw new InvalidStyleError(error)
    }
    this.attributes = { ...attributes }
  }

  toString(): string {
    return `FormatStyle${describeAttributes(this.attributes)}`
  }
}
