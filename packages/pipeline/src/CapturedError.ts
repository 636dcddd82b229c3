import pLimit from 'p-limit'

/**
 * The pipeline-wide error slot. Every access goes through a single-slot lock,
 * so stage tasks settling in any order see a consistent value.
 *
 * Stage failures only fill an empty slot, so the slot holds the first failure
 * to be observed. With several stages failing concurrently which one that is
 * depends on scheduling and is not deterministic.
 */
export class CapturedError {
  private value: Error | undefined
  private readonly lock = pLimit(1)

  /**
   * Records error unless one is already held. Resolves true if it was recorded.
   */
  capture(error: Error): Promise<boolean> {
    return this.lock(() => {
      if (this.value) {
        return false
      }
      this.value = error
      return true
    })
  }

  /**
   * Replaces whatever is held, including with nothing. Takes effect at once,
   * ahead of any capture still waiting on the lock.
   */
  override(error: Error | undefined): void {
    this.value = error
  }

  get(): Promise<Error | undefined> {
    return this.lock(() => this.value)
  }

  /**
   * The value as of the last completed update, without waiting on the lock.
   */
  peek(): Error | undefined {
    return this.value
  }
}
