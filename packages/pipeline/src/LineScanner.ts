import { ScannerError } from './errors.js'
import { LineCallback, Reader, Stage } from './types.js'

export const DEFAULT_INITIAL_BUFFER_SIZE = 4096
export const DEFAULT_MAX_LINE_LENGTH = 2 ** 31 - 1

const NEWLINE = 0x0a
const CARRIAGE_RETURN = 0x0d

export interface ScannerOptions {
  initialBufferSize?: number
  maxLineLength?: number
}

function decodeLine(bytes: Buffer) {
  const end = bytes.length > 0 && bytes[bytes.length - 1] === CARRIAGE_RETURN ? bytes.length - 1 : bytes.length
  return bytes.toString('utf8', 0, end)
}

/**
 * Splits a byte stream into lines, with the terminator (`\n` or `\r\n`)
 * removed. A final line without a terminator is still produced; an empty
 * stream produces no lines.
 *
 * The buffer starts small and doubles as needed, so long lines are never
 * truncated. A line longer than `maxLineLength` bytes fails with a
 * {@link ScannerError}.
 */
export class LineScanner implements AsyncIterable<string> {
  private readonly initialBufferSize: number
  private readonly maxLineLength: number

  constructor(private readonly source: Reader, options: ScannerOptions = {}) {
    this.initialBufferSize = Math.max(1, options.initialBufferSize ?? DEFAULT_INITIAL_BUFFER_SIZE)
    this.maxLineLength = Math.max(1, options.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH)
  }

  private checkLength(length: number) {
    if (length > this.maxLineLength) {
      throw new ScannerError(`token too long: line exceeds ${this.maxLineLength} bytes`)
    }
  }

  private async* generator(): AsyncGenerator<string> {
    let buffer = Buffer.alloc(this.initialBufferSize)
    let start = 0
    let end = 0
    let scanned = 0
    let eof = false

    while (true) {
      const newline = buffer.subarray(scanned, end).indexOf(NEWLINE)

      if (newline !== -1) {
        const lineEnd = scanned + newline
        this.checkLength(lineEnd - start)
        yield decodeLine(buffer.subarray(start, lineEnd))
        start = scanned = lineEnd + 1
        continue
      }

      scanned = end
      this.checkLength(end - start)

      if (eof) {
        if (end > start) {
          yield decodeLine(buffer.subarray(start, end))
        }
        return
      }

      // make room: first by discarding consumed lines, then by growing
      if (end === buffer.length && start > 0) {
        buffer.copy(buffer, 0, start, end)
        end -= start
        scanned -= start
        start = 0
      }
      if (end === buffer.length) {
        buffer = this.grow(buffer, end, buffer.length * 2)
      }

      const chunk = await this.source.read(buffer.length - end)
      if (chunk === null) {
        eof = true
        continue
      }

      if (chunk.length > buffer.length - end) {
        buffer = this.grow(buffer, end, end + chunk.length)
      }
      buffer.set(chunk, end)
      end += chunk.length
    }
  }

  private grow(buffer: Buffer, used: number, size: number) {
    const grown = Buffer.alloc(size)
    buffer.copy(grown, 0, 0, used)
    return grown
  }

  [Symbol.asyncIterator]() {
    return this.generator()
  }
}

/**
 * Turns a per-line callback into a stage. The callback sees each line without
 * its terminator, in order.
 */
export function scanner(callback: LineCallback, options?: ScannerOptions): Stage {
  return async (stdin, stdout) => {
    for await (const line of new LineScanner(stdin, options)) {
      await callback(line, stdout)
    }
  }
}
