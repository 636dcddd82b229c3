import { ReadCloser, Reader } from './types.js'
import { isReadCloser } from './io.js'

/**
 * Wraps a reader so that it closes itself, exactly once, the first time
 * end-of-stream is observed. Sources without a `close` of their own get a
 * no-op one.
 *
 * Once closed (by exhaustion or explicitly) every read resolves `null`.
 */
export class AutoCloseReader implements ReadCloser {
  private readonly source: ReadCloser
  private closing: Promise<void> | undefined

  constructor(source: Reader) {
    this.source = isReadCloser(source)
      ? source
      : { read: maxBytes => source.read(maxBytes), close: () => undefined }
  }

  static empty() {
    return new AutoCloseReader({ read: async () => null })
  }

  get isClosed() {
    return this.closing !== undefined
  }

  async read(maxBytes?: number): Promise<Uint8Array | null> {
    if (this.closing) {
      return null
    }

    const chunk = await this.source.read(maxBytes)
    if (chunk === null) {
      await this.close()
    }

    return chunk
  }

  close(): Promise<void> {
    this.closing ??= Promise.resolve(this.source.close())
    return this.closing
  }
}
