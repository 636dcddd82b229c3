import { Pipeline, Settled, Writer } from '@pipeworks/pipeline'
import * as std from '@pipeworks/std'
import { ExecOptions, FetchFunction } from '@pipeworks/std'

/**
 * A {@link Pipeline} with a method for each stage of the standard library,
 * so pipelines read like shell one-liners:
 *
 * ```ts
 * const { value } = await file('access.log').column(1).freq().first(10).string()
 * ```
 */
export class Pipe extends Pipeline {
  private fetchFn: FetchFunction = fetch
  private execOptions: ExecOptions = {}

  /**
   * Sets the HTTP client used by the HTTP stages added from now on.
   */
  withFetch(fetchFn: FetchFunction): this {
    this.fetchFn = fetchFn
    return this
  }

  /**
   * Sets the working directory, environment or spawn function of the
   * process stages added from now on.
   */
  withExecOptions(options: ExecOptions): this {
    this.execOptions = options
    return this
  }

  // filters

  basename(): this {
    return this.pipeE(std.basename(this.scannerOptions))
  }

  column(col: number): this {
    return this.pipeE(std.column(col, this.scannerOptions))
  }

  concat(): this {
    return this.pipe(std.concat(this.scannerOptions))
  }

  dirname(): this {
    return this.pipeE(std.dirname(this.scannerOptions))
  }

  /**
   * Replaces the contents of the pipeline with text.
   */
  echo(text: string): this {
    return this.pipeE(std.echo(text))
  }

  /**
   * Calls callback on each line; whatever it appends to output becomes the
   * new contents once the input is exhausted. Prefer {@link Pipe.filterLine},
   * which streams.
   */
  eachLine(callback: (line: string, output: string[]) => void): this {
    return this.pipeE(std.eachLine(callback, this.scannerOptions))
  }

  filterLine(filter: (line: string) => string): this {
    return this.pipeE(std.filterLine(filter, this.scannerOptions))
  }

  first(n: number): this {
    return this.pipeE(std.first(n, this.scannerOptions))
  }

  freq(): this {
    return this.pipeE(std.freq(this.scannerOptions))
  }

  join(): this {
    return this.pipeE(std.join(this.scannerOptions))
  }

  last(n: number): this {
    return this.pipeE(std.last(n, this.scannerOptions))
  }

  match(text: string): this {
    return this.pipeE(std.match(text, this.scannerOptions))
  }

  matchRegexp(re: RegExp): this {
    return this.pipeE(std.matchRegexp(re, this.scannerOptions))
  }

  reject(text: string): this {
    return this.pipeE(std.reject(text, this.scannerOptions))
  }

  rejectRegexp(re: RegExp): this {
    return this.pipeE(std.rejectRegexp(re, this.scannerOptions))
  }

  replace(search: string, replacement: string): this {
    return this.pipeE(std.replace(search, replacement, this.scannerOptions))
  }

  replaceRegexp(re: RegExp, replacement: string): this {
    return this.pipeE(std.replaceRegexp(re, replacement, this.scannerOptions))
  }

  sha256Sums(): this {
    return this.pipe(std.sha256Sums(this.scannerOptions))
  }

  /**
   * Copies the contents to each writer as they pass through, or to the
   * pipeline's stdout when none is given.
   */
  tee(...writers: Writer[]): this {
    return this.pipeE(std.tee(...(writers.length > 0 ? writers : [this.stdoutWriter])))
  }

  // processes

  /**
   * Runs a command line, split into words like a shell would, with the
   * contents as its standard input.
   */
  exec(commandLine: string): this {
    return this.pipe(std.shellExec(commandLine, this.execOptions))
  }

  execForEach(template: string): this {
    return this.pipe(std.execForEach(template, { scanner: this.scannerOptions, ...this.execOptions }))
  }

  /**
   * Runs a program with the given arguments, without any shell parsing.
   */
  stdExec(name: string, ...args: string[]): this {
    return this.pipe(std.exec(name, args, this.execOptions))
  }

  // http

  request(url: string, init: RequestInit = {}): this {
    return this.pipeE(std.request(url, init, this.fetchFn))
  }

  get(url: string): this {
    return this.pipeE(std.get(url, this.fetchFn))
  }

  post(url: string): this {
    return this.pipeE(std.post(url, this.fetchFn))
  }

  // sinks

  appendFile(file: string): Promise<Settled<number>> {
    return this.pipe(std.appendFile(file)).int()
  }

  countLines(): Promise<Settled<number>> {
    return this.pipeE(std.countLines(this.scannerOptions)).int()
  }

  sha256Sum(): Promise<Settled<string>> {
    return this.pipeE(std.sha256Sum()).string()
  }

  /**
   * Copies the contents to the pipeline's stdout.
   */
  stdout(): Promise<Settled<number>> {
    return this.run()
  }

  writeFile(file: string): Promise<Settled<number>> {
    return this.pipe(std.writeFile(file)).int()
  }
}
