/**
 * Console logger used by the formatter
 *
 * Debug output is opt-in; warnings and errors always reach the console.
 */

export interface Logger {
  debug(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
  error(message: string, ...details: unknown[]): void
}

export function createLogger(scope: string, debugEnabled: boolean): Logger {
  const prefix = `[${scope}]`

  return {
    debug(message, ...details) {
      if (debugEnabled) {
        console.log(prefix, message, ...details)
      }
    },
    warn(message, ...details) {
      console.warn(prefix, message, ...details)
    },
    error(message, ...details) {
      console.error(prefix, message, ...details)
    },
  }
}
