import { ExitError, ProcessExitError } from './errors.js'

export type ErrorClassification =
  | { kind: 'exit-code', code: number }
  | { kind: 'process-exit', code: number }
  | { kind: 'other', message: string }

const exitStatusPattern = /exit status (\d+)$/

export function classifyError(error: Error): ErrorClassification {
  if (error instanceof ExitError) {
    return { kind: error.kind, code: error.code }
  }
  if (error instanceof ProcessExitError) {
    return { kind: error.kind, code: error.exitCode }
  }
  return { kind: 'other', message: error.message }
}

/**
 * The process-style exit status for a captured error: 0 when there is none,
 * the carried code for exit and process errors, and otherwise whatever a
 * trailing "exit status N" in the message says (0 if nothing matches).
 */
export function exitStatus(error: Error | undefined): number {
  if (!error) {
    return 0
  }

  const classification = classifyError(error)
  switch (classification.kind) {
    case 'exit-code':
    case 'process-exit':
      return classification.code

    case 'other': {
      // legacy: errors from collaborators that only put the status in the text
      const match = exitStatusPattern.exec(classification.message)
      return match?.[1] ? Number.parseInt(match[1], 10) : 0
    }
  }
}
