import { Logger } from '@aws-lambda-powertools/logger'
import { AutoCloseReader } from './AutoCloseReader.js'
import { CapturedError } from './CapturedError.js'
import { ConversionError, isClosedPipe, toError } from './errors.js'
import { exitStatus } from './exitStatus.js'
import { BufferWriter, discard, nodeWriter } from './io.js'
import { loadConfig } from './config.js'
import { scanner, ScannerOptions } from './LineScanner.js'
import { PipelineOptions, PipelineOptionsSchema } from './PipelineOptionsSchema.js'
import { withErr } from './stage.js'
import { StreamPair } from './StreamPair.js'
import { DiagnosticStage, LineCallback, ReadCloser, Reader, Settled, Stage, WriteCloser, Writer } from './types.js'

interface StageTask {
  id: number
  started: Promise<void>
  done: Promise<void>
}

const integerPattern = /^[+-]?\d+$/

/**
 * A chain of stages connected like a shell pipeline.
 *
 * Each call to {@link Pipeline.pipe} launches a stage that reads the current
 * tail of the pipeline and writes into a fresh {@link StreamPair}, whose read
 * end becomes the new tail. Stages run concurrently; since the pairs are
 * unbuffered, nothing moves until a terminal operation (`run`, `wait`,
 * `bytes`, `string`, `int`, `lines`) pulls on the tail.
 *
 * The first stage failure observed is captured and reported by the terminal
 * operations. Failures do not stop the other stages: they carry on with
 * whatever input they got. When several stages fail concurrently, which error
 * is captured depends on scheduling.
 */
export class Pipeline {
  private reader: AutoCloseReader = AutoCloseReader.empty()
  protected stdoutWriter: Writer
  private stderrWriter: Writer
  private exitOnError: boolean
  private readonly captured = new CapturedError()
  private readonly tasks: StageTask[] = []
  protected readonly scannerOptions: ScannerOptions
  protected readonly logger: Logger

  constructor(options: PipelineOptions = {}) {
    const config = loadConfig()
    const { stdout, stderr, exitOnError, logger, maxLineLength, initialBufferSize } = PipelineOptionsSchema.parse(options)

    this.stdoutWriter = stdout ?? nodeWriter(process.stdout)
    this.stderrWriter = stderr ?? discard
    this.exitOnError = exitOnError ?? config.exitOnError
    this.logger = logger ?? new Logger({ serviceName: 'pipeworks' })
    this.scannerOptions = {
      maxLineLength: maxLineLength ?? config.maxLineLength,
      initialBufferSize: initialBufferSize ?? config.initialBufferSize,
    }
  }

  /**
   * Adds a stage to the pipeline, reading the output of the previous one.
   *
   * Does nothing when exit-on-error is set and an error has already been
   * captured: the stage is never launched.
   */
  pipe(stage: DiagnosticStage): this {
    const id = this.tasks.length + 1

    if (this.exitOnError && this.captured.peek()) {
      this.logger.debug('Skipping stage, pipeline has already failed', { stage: id })
      return this
    }

    const stdin = this.reader
    const pair = StreamPair.create()
    this.reader = new AutoCloseReader(pair.readEnd)
    this.tasks.push(this.launch(id, stage, stdin, pair.writeEnd, this.stderrWriter))

    return this
  }

  /**
   * Adds a plain stage; its failure message goes to the diagnostic stream.
   */
  pipeE(stage: Stage): this {
    return this.pipe(withErr(stage))
  }

  /**
   * Adds a stage calling callback once per line of input.
   */
  scan(callback: LineCallback): this {
    return this.pipeE(scanner(callback, this.scannerOptions))
  }

  private launch(id: number, stage: DiagnosticStage, stdin: ReadCloser, stdout: WriteCloser, stderr: Writer): StageTask {
    let acknowledge: () => void = () => undefined
    const started = new Promise<void>(resolve => {
      acknowledge = resolve
    })

    // the body runs synchronously up to its first await, so the stage has
    // started before pipe() returns and the next stage is wired up
    const done = (async () => {
      acknowledge()
      this.logger.debug('Stage started', { stage: id })

      try {
        await stage(stdin, stdout, stderr)
        this.logger.debug('Stage finished', { stage: id })
      } catch (error) {
        await this.fail(id, error)
      } finally {
        const closed = await Promise.allSettled([stdout.close(), stdin.close()])
        for (const result of closed) {
          if (result.status === 'rejected') {
            await this.fail(id, result.reason)
          }
        }
      }
    })()

    return { id, started, done }
  }

  private async fail(id: number, error: unknown) {
    if (isClosedPipe(error)) {
      // the consumer went away, like SIGPIPE in a shell
      this.logger.debug('Stage stopped, its output was closed', { stage: id })
      return
    }

    const captured = await this.captured.capture(toError(error))
    this.logger.debug('Stage failed', { stage: id, captured, error: toError(error) })
  }

  /**
   * Resolves once every launched stage has started.
   */
  async ready(): Promise<void> {
    await Promise.all(this.tasks.map(task => task.started))
  }

  /**
   * Resolves once every launched stage has finished.
   */
  async settled(): Promise<void> {
    await Promise.all(this.tasks.map(task => task.done))
  }

  get stageCount() {
    return this.tasks.length
  }

  read(maxBytes?: number): Promise<Uint8Array | null> {
    return this.reader.read(maxBytes)
  }

  close(): Promise<void> {
    return this.reader.close()
  }

  error(): Promise<Error | undefined> {
    return this.captured.get()
  }

  async exitStatus(): Promise<number> {
    return exitStatus(await this.error())
  }

  /**
   * Replaces the captured error. Pass `undefined` to clear it.
   */
  withError(error: Error | undefined): this {
    this.captured.override(error)
    return this
  }

  /**
   * Sets the tail of the pipeline to reader. It is closed once fully read.
   */
  withReader(reader: Reader): this {
    this.reader = new AutoCloseReader(reader)
    return this
  }

  withStdout(writer: Writer): this {
    this.stdoutWriter = writer
    return this
  }

  /**
   * Redirects the diagnostic stream of stages added from now on.
   */
  withStderr(writer: Writer): this {
    this.stderrWriter = writer
    return this
  }

  setExitOnError(exitOnError: boolean): this {
    this.exitOnError = exitOnError
    return this
  }

  private async drain(destination: Writer): Promise<number> {
    let copied = 0

    try {
      for (let chunk = await this.reader.read(); chunk !== null; chunk = await this.reader.read()) {
        copied += await destination.write(chunk)
      }
    } catch (error) {
      this.logger.debug('Drain failed', { error: toError(error) })
      await this.captured.capture(toError(error))
      await this.reader.close()
    }

    await this.settled()
    return copied
  }

  /**
   * Appends stages, then copies the output to the configured stdout. Resolves
   * with the number of bytes copied.
   */
  async run(...stages: DiagnosticStage[]): Promise<Settled<number>> {
    for (const stage of stages) {
      this.pipe(stage)
    }
    const value = await this.drain(this.stdoutWriter)
    return { value, error: await this.error() }
  }

  /**
   * Reads the pipeline to completion and discards the output.
   */
  async wait(): Promise<this> {
    await this.drain(discard)
    return this
  }

  async bytes(): Promise<Settled<Buffer>> {
    const buffer = new BufferWriter()
    await this.drain(buffer)
    return { value: buffer.bytes(), error: await this.error() }
  }

  async string(): Promise<Settled<string>> {
    const { value, error } = await this.bytes()
    return { value: value.toString('utf8'), error }
  }

  /**
   * The output as a base-10 integer, ignoring surrounding whitespace. Content
   * that isn't an integer gives 0 and a {@link ConversionError}, with any
   * captured error as its cause.
   *
   * Only safe integers (up to 2^53 - 1 in magnitude) are accepted; larger
   * values are conversion errors too, rather than silently losing precision.
   */
  async int(): Promise<Settled<number>> {
    const { value, error } = await this.string()
    const text = value.trim()
    const result = Number(text)

    if (!integerPattern.test(text) || !Number.isSafeInteger(result)) {
      return { value: 0, error: new ConversionError(text, 'integer', { cause: error }) }
    }

    return { value: result, error }
  }

  /**
   * The output split into lines. Empty output gives no lines; a single
   * newline gives one empty line.
   */
  async lines(): Promise<Settled<string[]>> {
    const lines: string[] = []
    await this.scan(line => {
      lines.push(line)
    }).wait()
    return { value: lines, error: await this.error() }
  }
}
