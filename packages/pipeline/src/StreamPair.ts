import { AsyncQueue } from '@pipeworks/helpers'
import { ClosedPipeError } from './errors.js'
import { ReadCloser, Reader, WriteCloser } from './types.js'
import { isReadCloser } from './io.js'

export const DEFAULT_READ_SIZE = 32 * 1024

interface PendingWrite {
  data: Uint8Array
  offset: number
  resolve: (written: number) => void
  reject: (error: Error) => void
}

/**
 * An in-process, unbuffered byte conduit with one write end and one read end.
 *
 * A write resolves only once readers have consumed every byte of it, so a
 * producer can never run ahead of its consumer. Closing either end closes the
 * pair: pending writes reject with {@link ClosedPipeError}, pending and later
 * reads resolve `null`.
 *
 * A pair created with {@link StreamPair.over} is read-only: reads are
 * forwarded to the wrapped source and closing the pair closes the source.
 */
export class StreamPair {
  private readonly writes: PendingWrite[] = []
  private readonly reads = new AsyncQueue<Uint8Array | null, number>()
  private closed = false
  private closing: Promise<void> | undefined

  readonly readEnd: ReadCloser = {
    read: maxBytes => this.read(maxBytes),
    close: () => this.close(),
  }

  readonly writeEnd: WriteCloser = {
    write: chunk => this.write(chunk),
    close: () => this.close(),
  }

  private constructor(private readonly source?: ReadCloser) {
  }

  static create() {
    return new StreamPair()
  }

  static over(source: Reader) {
    return new StreamPair(isReadCloser(source) ? source : { read: maxBytes => source.read(maxBytes), close: () => undefined })
  }

  get isClosed() {
    return this.closed
  }

  get isReadOnly() {
    return this.source !== undefined
  }

  async write(chunk: Uint8Array | string): Promise<number> {
    if (this.source) {
      throw new ClosedPipeError('write on read-only pipe')
    }
    if (this.closed) {
      throw new ClosedPipeError()
    }

    const data = typeof chunk === 'string' ? Buffer.from(chunk) : chunk
    if (data.length === 0) {
      return 0
    }

    return new Promise<number>((resolve, reject) => {
      this.writes.push({ data, offset: 0, resolve, reject })
      this.serve()
    })
  }

  async read(maxBytes = DEFAULT_READ_SIZE): Promise<Uint8Array | null> {
    if (this.closed) {
      return null
    }
    if (this.source) {
      return this.source.read(maxBytes)
    }

    return this.take(maxBytes) ?? this.reads.enqueue(maxBytes)
  }

  close(): Promise<void> {
    this.closing ??= this.release()
    return this.closing
  }

  private async release() {
    this.closed = true

    for (const pending of this.writes.splice(0)) {
      pending.reject(new ClosedPipeError())
    }

    while (this.reads.dequeue(() => null)) {
      // wake every parked reader with end-of-stream
    }

    await this.source?.close()
  }

  private serve() {
    while (this.writes.length && this.reads.dequeue(maxBytes => this.take(maxBytes) ?? null)) {
      // hand the head write to parked readers until one side runs out
    }
  }

  private take(maxBytes: number): Uint8Array | undefined {
    const head = this.writes[0]
    if (!head) {
      return undefined
    }

    const end = Math.min(head.offset + Math.max(1, maxBytes), head.data.length)
    const chunk = Buffer.from(head.data.subarray(head.offset, end))
    head.offset = end

    if (head.offset === head.data.length) {
      this.writes.shift()
      head.resolve(head.data.length)
    }

    return chunk
  }
}
