import { SpanFlags } from '../text/span'
import type { StyledTextBuilder } from '../text/styled-text'
import { AppearanceStyle, ClickableStyle } from './styles'

/**
 * Make a whole piece of styled text clickable and recolor it without an
 * underline
 *
 * Typically called on an argument before it is passed to `format`:
 *
 * ```typescript
 * const link = new StyledTextBuilder('http://example.com')
 * attachClickableStyle(link, '#ff0000', () => openLink())
 * const message = format('Please visit %1$s', link)
 * ```
 *
 * @param text - Text to style, modified in place
 * @param color - Text color (#RRGGBB)
 * @param action - Invoked on click
 */
export function attachClickableStyle(
  text: StyledTextBuilder,
  color: string,
  action?: () => void
): void {
  const clickable = new ClickableStyle(action)
  const appearance = new AppearanceStyle(color, false)

  text.setSpan(clickable, 0, text.length, SpanFlags.EXCLUSIVE_EXCLUSIVE)
  text.setSpan(appearance, 0, text.length, SpanFlags.EXCLUSIVE_EXCLUSIVE)
}
