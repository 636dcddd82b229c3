import { toError } from './errors.js'
import { DiagnosticStage, Stage } from './types.js'

/**
 * Lifts a plain stage into a diagnostic one: if the stage fails its message is
 * written to the diagnostic stream before the error is passed on.
 */
export function withErr(stage: Stage): DiagnosticStage {
  return async (stdin, stdout, stderr) => {
    try {
      await stage(stdin, stdout)
    } catch (error) {
      await stderr.write(`${toError(error).message}\n`)
      throw error
    }
  }
}
