/**
 * A byte source. `read` resolves with at most `maxBytes` bytes, or `null` at
 * end-of-stream.
 */
export interface Reader {
  read(maxBytes?: number): Promise<Uint8Array | null>
}

export interface Closer {
  close(): Promise<void> | void
}

export interface ReadCloser extends Reader, Closer {
}

/**
 * A byte sink. `write` resolves with the number of bytes written once they
 * have been accepted.
 */
export interface Writer {
  write(chunk: Uint8Array | string): Promise<number>
}

export interface WriteCloser extends Writer, Closer {
}

/**
 * A pipeable program that doesn't write diagnostics. Failure is reported by
 * throwing (or rejecting).
 */
export interface Stage {
  (stdin: Reader, stdout: Writer): Promise<void> | void
}

/**
 * A pipeable program with a diagnostic stream.
 */
export interface DiagnosticStage {
  (stdin: Reader, stdout: Writer, stderr: Writer): Promise<void> | void
}

export interface LineCallback {
  (line: string, stdout: Writer): Promise<unknown> | void
}

/**
 * The outcome of a terminal operation: the materialised value together with
 * the pipeline's captured error, if any.
 */
export interface Settled<T> {
  value: T
  error: Error | undefined
}
