import { ReadCloser, Reader, Writer } from './types.js'

export function isReadCloser(reader: Reader): reader is ReadCloser {
  return 'close' in reader && typeof reader.close === 'function'
}

export function toBytes(chunk: Uint8Array | string): Uint8Array {
  return typeof chunk === 'string' ? Buffer.from(chunk) : chunk
}

/**
 * A writer that accepts and drops everything.
 */
export const discard: Writer = {
  write: async chunk => toBytes(chunk).length,
}

/**
 * Collects everything written to it in memory.
 */
export class BufferWriter implements Writer {
  private readonly chunks: Uint8Array[] = []
  private length = 0

  async write(chunk: Uint8Array | string): Promise<number> {
    // copy, the caller may reuse its buffer once the write resolves
    const data = Buffer.from(toBytes(chunk))
    this.chunks.push(data)
    this.length += data.length
    return data.length
  }

  get size() {
    return this.length
  }

  bytes(): Buffer {
    return Buffer.concat(this.chunks, this.length)
  }

  toString() {
    return this.bytes().toString('utf8')
  }
}

/**
 * Adapts a Node writable stream. Each write resolves once the stream has
 * flushed it, and rejects if the stream errors or has been destroyed.
 */
export function nodeWriter(stream: NodeJS.WritableStream): Writer {
  return {
    write: chunk => new Promise<number>((resolve, reject) => {
      const data = toBytes(chunk)
      stream.write(data, error => error ? reject(error) : resolve(data.length))
    }),
  }
}

/**
 * Adapts a Node readable stream. Closing the reader destroys the stream.
 */
export function nodeReader(stream: NodeJS.ReadableStream & { destroy?: () => void }): ReadCloser {
  const iterator = stream[Symbol.asyncIterator]()
  let pending: Uint8Array | undefined
  let closed = false

  return {
    async read(maxBytes) {
      if (closed) {
        return null
      }
      if (!pending) {
        const next = await iterator.next()
        if (next.done) {
          return null
        }
        pending = toBytes(next.value)
      }

      const limit = maxBytes ?? pending.length
      const chunk = pending.subarray(0, limit)
      pending = limit < pending.length ? pending.subarray(limit) : undefined
      return chunk
    },
    async close() {
      if (!closed) {
        closed = true
        await iterator.return?.()
        stream.destroy?.()
      }
    },
  }
}

/**
 * A reader over a fixed piece of text (or bytes).
 */
export function stringReader(text: string | Uint8Array): Reader {
  let remaining: Uint8Array = toBytes(text)

  return {
    async read(maxBytes) {
      if (remaining.length === 0) {
        return null
      }
      const limit = maxBytes ?? remaining.length
      const chunk = remaining.subarray(0, limit)
      remaining = remaining.subarray(chunk.length)
      return chunk
    },
  }
}

/**
 * Copies src to dst until src reports end-of-stream, returning the number of
 * bytes copied.
 */
export async function copy(dst: Writer, src: Reader): Promise<number> {
  let total = 0
  for (let chunk = await src.read(); chunk !== null; chunk = await src.read()) {
    total += await dst.write(chunk)
  }
  return total
}

export async function readAll(src: Reader): Promise<Buffer> {
  const buffer = new BufferWriter()
  await copy(buffer, src)
  return buffer.bytes()
}

export function writeLine(w: Writer, line: string) {
  return w.write(`${line}\n`)
}
