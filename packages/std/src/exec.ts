import { spawn as nodeSpawn, SpawnOptions } from 'node:child_process'
import { EventEmitter } from 'node:events'
import { Readable, Writable } from 'node:stream'
import { parse } from 'shell-quote'
import { isError, splitSettledResults } from '@pipeworks/helpers'
import {
  copy,
  DiagnosticStage,
  ExitError,
  isReadCloser,
  nodeWriter,
  ProcessExitError,
  Reader,
  scanner,
  ScannerOptions,
  toError,
  Writer,
  writeLine,
} from '@pipeworks/pipeline'

/**
 * The part of a child process the exec stages use.
 */
export interface ChildProcessLike extends EventEmitter {
  readonly stdin: Writable | null
  readonly stdout: Readable | null
  readonly stderr: Readable | null
  kill(signal?: NodeJS.Signals | number): boolean
}

export type SpawnFunction = (command: string, args: readonly string[], options: SpawnOptions) => ChildProcessLike

export interface ExecOptions {
  /** line limits for execForEach */
  scanner?: ScannerOptions
  cwd?: string
  env?: NodeJS.ProcessEnv
  spawn?: SpawnFunction
}

type Termination =
  | { type: 'exit', code: number | null, signal: NodeJS.Signals | null }
  | { type: 'error', error: Error }

const emptyInput: Reader = {
  read: async () => null,
}

function terminated(child: ChildProcessLike) {
  return new Promise<Termination>(resolve => {
    child.once('error', (error: Error) => resolve({ type: 'error', error }))
    child.once('close', (code: number | null, signal: NodeJS.Signals | null) => resolve({ type: 'exit', code, signal }))
  })
}

function isStoppedReading(error: unknown) {
  const code = isError(error) && 'code' in error ? error.code : undefined
  return code === 'EPIPE' || code === 'ERR_STREAM_DESTROYED' || code === 'ERR_STREAM_WRITE_AFTER_END'
}

async function feed(child: ChildProcessLike, stdin: Reader) {
  if (!child.stdin) {
    return
  }
  const input = child.stdin
  // failures are reported to the write callbacks
  input.on('error', () => undefined)

  try {
    await copy(nodeWriter(input), stdin)
  } catch (error) {
    // the process exited without reading all of its input
    if (!isStoppedReading(error)) {
      throw error
    }
  } finally {
    input.end()
  }
}

async function drain(child: ChildProcessLike, source: Readable | null, target: Writer) {
  if (!source) {
    return
  }
  try {
    for await (const chunk of source) {
      await target.write(chunk)
    }
  } catch (error) {
    child.kill()
    throw error
  }
}

/**
 * Runs a program with its standard input fed from the stage's input, its
 * output written to the stage's output and its diagnostics to the stage's
 * diagnostic stream.
 *
 * A program that can't be started fails with an {@link ExitError} of code 1.
 * One that exits unsuccessfully fails with a {@link ProcessExitError}. Once
 * the program has exited the stage's input is closed, so upstream stages stop
 * instead of waiting for a reader.
 */
export function exec(name: string, args: readonly string[] = [], options: ExecOptions = {}): DiagnosticStage {
  const spawn: SpawnFunction = options.spawn ?? nodeSpawn

  return async (stdin, stdout, stderr) => {
    const child = spawn(name, args, { cwd: options.cwd, env: options.env, stdio: 'pipe' })
    const exited = terminated(child).finally(() => isReadCloser(stdin) ? stdin.close() : undefined)

    const [termination, results] = await Promise.all([
      exited,
      Promise.allSettled([
        feed(child, stdin),
        drain(child, child.stdout, stdout),
        drain(child, child.stderr, stderr),
      ]),
    ])

    if (termination.type === 'error') {
      await writeLine(stderr, termination.error.message)
      throw new ExitError(1, termination.error.message, { cause: termination.error })
    }

    const { rejected } = splitSettledResults(results)
    if (rejected.length > 0) {
      throw rejected[0]
    }

    if (termination.code !== 0) {
      throw new ProcessExitError(termination.code ?? -1, termination.signal)
    }
  }
}

/**
 * Splits a command line into words the way a POSIX shell would, expanding
 * `$VARIABLES` from env. Operators such as pipes and redirections are not
 * supported.
 */
export function parseCommandLine(commandLine: string, env: NodeJS.ProcessEnv = process.env): string[] {
  const words = parse(commandLine, key => env[key] ?? '').map(entry => {
    if (typeof entry === 'string') {
      return entry
    }
    if ('op' in entry && entry.op === 'glob') {
      return entry.pattern
    }
    if ('comment' in entry) {
      return undefined
    }
    throw new Error(`unsupported shell operator ${JSON.stringify(entry.op)} in ${JSON.stringify(commandLine)}`)
  })

  return words.filter((word): word is string => word !== undefined)
}

/**
 * Like {@link exec}, with the program and its arguments given as one command
 * line.
 */
export function shellExec(commandLine: string, options: ExecOptions = {}): DiagnosticStage {
  return async (stdin, stdout, stderr) => {
    let words: string[]
    try {
      words = parseCommandLine(commandLine, options.env)
    } catch (error) {
      await writeLine(stderr, toError(error).message)
      throw new ExitError(1, toError(error).message, { cause: error })
    }

    const [name, ...args] = words
    if (name === undefined) {
      await writeLine(stderr, 'empty command line')
      throw new ExitError(1, 'empty command line')
    }

    await exec(name, args, options)(stdin, stdout, stderr)
  }
}

/**
 * Runs a command once per input line, with `{{.}}` in the template replaced by
 * the line. Each command's output goes to the stage's output, in turn.
 * Commands that fail are reported on the diagnostic stream and the next line
 * is processed.
 */
export function execForEach(template: string, options: ExecOptions = {}): DiagnosticStage {
  return async (stdin, stdout, stderr) => {
    await scanner(async line => {
      try {
        await shellExec(template.replaceAll('{{.}}', line), options)(emptyInput, stdout, stderr)
      } catch (error) {
        if (error instanceof ProcessExitError) {
          await writeLine(stderr, error.message)
        } else if (!(error instanceof ExitError)) {
          throw error
        }
        // start failures have already been reported by exec
      }
    }, options.scanner)(stdin, stdout)
  }
}
