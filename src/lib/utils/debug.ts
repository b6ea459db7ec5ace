/**
 * Debug logging, enabled by STATEMENTS_DEBUG=1
 */

export const isDebug = (): boolean => {
  return process.env.STATEMENTS_DEBUG === '1'
}

/**
 * Print only when debug logging is enabled
 */
export const dlog = (...args: unknown[]): void => {
  if (isDebug()) {
    console.log(...args)
  }
}
