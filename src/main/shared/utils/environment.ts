/**
 * Check if the process is running in development mode.
 * Anything other than an explicit production or test environment counts as development.
 *
 * @returns true if running in development, false in production and under the test runner
 */
export function isDevelopment(): boolean {
  const env = process.env.NODE_ENV
  return env !== 'production' && env !== 'test'
}

export function isTest(): boolean {
  return process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined
}
