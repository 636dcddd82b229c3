import { createReadStream, Dirent } from 'node:fs'
import { open, readdir, stat } from 'node:fs/promises'
import path from 'node:path'
import { glob, hasMagic } from 'glob'
import { copy, DiagnosticStage, nodeReader, scanner, ScannerOptions, Stage, toBytes, toError, Writer, writeLine } from '@pipeworks/pipeline'

async function copyFile(stdout: Writer, file: string) {
  const reader = nodeReader(createReadStream(file))
  try {
    return await copy(stdout, reader)
  } finally {
    await reader.close()
  }
}

/**
 * Writes the contents of a file, ignoring any input.
 */
export function file(file: string): DiagnosticStage {
  return async (_stdin, stdout, stderr) => {
    try {
      await copyFile(stdout, file)
    } catch (error) {
      await writeLine(stderr, toError(error).message)
      throw error
    }
  }
}

/**
 * Writes the contents of every file named on the input, in order. Files that
 * can't be read are reported on the diagnostic stream and skipped, like cat.
 */
export function concat(options?: ScannerOptions): DiagnosticStage {
  return async (stdin, stdout, stderr) => {
    await scanner(async line => {
      try {
        await copyFile(stdout, line)
      } catch (error) {
        await writeLine(stderr, toError(error).message)
      }
    }, options)(stdin, stdout)
  }
}

/**
 * Copies the process's standard input, ignoring the pipeline's input.
 */
export function stdin(stream: NodeJS.ReadableStream = process.stdin): Stage {
  return async (_stdin, stdout) => {
    await copy(stdout, nodeReader(stream))
  }
}

/**
 * Lists the entries of a directory, or the paths matching a glob pattern, one
 * per line in lexical order. A plain file lists itself.
 */
export function listFiles(pattern: string): Stage {
  return async (_stdin, stdout) => {
    let paths: string[]

    if (hasMagic(pattern)) {
      paths = await glob(pattern)
    } else {
      const info = await stat(pattern)
      paths = info.isDirectory()
        ? (await readdir(pattern)).map(name => path.join(pattern, name))
        : [pattern]
    }

    for (const entry of paths.sort()) {
      await writeLine(stdout, entry)
    }
  }
}

async function* walk(dir: string): AsyncGenerator<string> {
  const entries: Dirent[] = await readdir(dir, { withFileTypes: true })
  entries.sort((a, b) => a.name < b.name ? -1 : a.name > b.name ? 1 : 0)

  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name)
    if (entry.isDirectory()) {
      yield* walk(entryPath)
    } else {
      yield entryPath
    }
  }
}

/**
 * Every file below dir, recursively, in lexical order. Directories
 * themselves are not listed.
 */
export function findFiles(dir: string): Stage {
  return async (_stdin, stdout) => {
    for await (const entry of walk(dir)) {
      await writeLine(stdout, entry)
    }
  }
}

/**
 * Fails unless path exists. Produces no output.
 */
export function ifExists(file: string): Stage {
  return async () => {
    await stat(file)
  }
}

function fileWriter(file: string, flags: 'w' | 'a'): DiagnosticStage {
  return async (stdin, stdout, stderr) => {
    let written = 0
    try {
      const handle = await open(file, flags, 0o666)
      try {
        written = await copy({
          write: async chunk => (await handle.write(toBytes(chunk))).bytesWritten,
        }, stdin)
      } finally {
        await handle.close()
      }
    } catch (error) {
      await writeLine(stderr, toError(error).message)
      throw error
    } finally {
      await stdout.write(`${written}`)
    }
  }
}

/**
 * Writes the input to a file, replacing its contents, and outputs the number
 * of bytes written.
 */
export function writeFile(file: string): DiagnosticStage {
  return fileWriter(file, 'w')
}

/**
 * Appends the input to a file, creating it if needed, and outputs the number
 * of bytes written.
 */
export function appendFile(file: string): DiagnosticStage {
  return fileWriter(file, 'a')
}
