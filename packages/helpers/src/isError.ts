import { types } from 'node:util'

/**
 * Errors raised by Node itself (fs, child_process) can come from another realm,
 * such as a test sandbox, where `instanceof Error` is false.
 */
export function isError(value: unknown): value is Error {
  return value instanceof Error || types.isNativeError(value)
}
