import { PipelineOptions, stringReader } from '@pipeworks/pipeline'
import * as std from '@pipeworks/std'
import { Pipe } from './Pipe.js'

export function newPipe(options?: PipelineOptions): Pipe {
  return new Pipe(options)
}

export function echo(text: string): Pipe {
  return newPipe().withReader(stringReader(text))
}

/**
 * One line per element.
 */
export function slice(lines: string[]): Pipe {
  return echo(lines.map(line => `${line}\n`).join(''))
}

/**
 * The command line arguments of the program, one per line.
 */
export function args(argv: string[] = process.argv.slice(2)): Pipe {
  return slice(argv)
}

export function file(path: string): Pipe {
  return newPipe().pipe(std.file(path))
}

export function exec(commandLine: string): Pipe {
  return newPipe().exec(commandLine)
}

export function stdExec(name: string, ...args: string[]): Pipe {
  return newPipe().stdExec(name, ...args)
}

export function stdin(): Pipe {
  return newPipe().pipeE(std.stdin())
}

export function listFiles(path: string): Pipe {
  return newPipe().pipeE(std.listFiles(path))
}

export function findFiles(dir: string): Pipe {
  return newPipe().pipeE(std.findFiles(dir))
}

/**
 * An empty pipe that has already failed when path doesn't exist. It exits on
 * error, so stages added to a failed pipe are never run.
 */
export function ifExists(path: string): Promise<Pipe> {
  return newPipe().setExitOnError(true).pipeE(std.ifExists(path)).wait()
}

export function get(url: string): Pipe {
  return newPipe().get(url)
}

export function post(url: string): Pipe {
  return newPipe().post(url)
}
