import { isError } from '@pipeworks/helpers'

export abstract class PipelineError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = this.constructor.name
  }
}

/**
 * Raised by a stage that wants the pipeline to report a specific exit status.
 */
export class ExitError extends PipelineError {
  readonly kind = 'exit-code'

  constructor(readonly code: number, message = `exit status ${code}`, options?: ErrorOptions) {
    super(message, options)
  }
}

/**
 * Raised when an external process terminates unsuccessfully.
 */
export class ProcessExitError extends PipelineError {
  readonly kind = 'process-exit'

  constructor(
    readonly exitCode: number,
    readonly signal: NodeJS.Signals | null = null,
    options?: ErrorOptions,
  ) {
    super(signal ? `signal: ${signal}` : `exit status ${exitCode}`, options)
  }
}

/**
 * A write to, or read from, a stream that has already been closed.
 */
export class ClosedPipeError extends PipelineError {
  constructor(message = 'write on closed pipe', options?: ErrorOptions) {
    super(message, options)
  }
}

export class ScannerError extends PipelineError {
}

/**
 * The pipeline's contents could not be converted to the requested type.
 */
export class ConversionError extends PipelineError {
  constructor(readonly input: string, target: string, options?: ErrorOptions) {
    super(`cannot convert ${JSON.stringify(input)} to ${target}`, options)
  }
}

export function isClosedPipe(error: unknown): boolean {
  if (error instanceof ClosedPipeError) {
    return true
  }
  return isError(error) && error.cause !== undefined && isClosedPipe(error.cause)
}

export function toError(error: unknown): Error {
  return isError(error) ? error : new Error(String(error))
}
