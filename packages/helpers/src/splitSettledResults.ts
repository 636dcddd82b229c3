import { isError } from './isError.js'

export interface SplitResults<T> {
  fulfilled: T[]
  rejected: Error[]
}

/**
 * Separates the values from the failures of `Promise.allSettled`, keeping
 * their order. Rejection reasons that aren't errors are wrapped in one.
 */
export function splitSettledResults<T>(results: readonly PromiseSettledResult<T>[]): SplitResults<T> {
  const split: SplitResults<T> = { fulfilled: [], rejected: [] }

  for (const result of results) {
    if (result.status === 'fulfilled') {
      split.fulfilled.push(result.value)
    } else if (isError(result.reason)) {
      split.rejected.push(result.reason)
    } else {
      split.rejected.push(new Error(String(result.reason), { cause: result.reason }))
    }
  }

  return split
}
