import path from 'node:path'
import { LineScanner, scanner, ScannerOptions, Stage, writeLine } from '@pipeworks/pipeline'

function withoutGlobalFlag(re: RegExp) {
  return new RegExp(re.source, re.flags.replace('g', ''))
}

function withGlobalFlag(re: RegExp) {
  return re.flags.includes('g') ? new RegExp(re.source, re.flags) : new RegExp(re.source, `${re.flags}g`)
}

/**
 * Writes text, ignoring any input.
 */
export function echo(text: string): Stage {
  return async (_stdin, stdout) => {
    await stdout.write(text)
  }
}

/**
 * Calls filter on each line and writes whatever it returns.
 */
export function filterLine(filter: (line: string) => string, options?: ScannerOptions): Stage {
  return scanner(async (line, stdout) => {
    await writeLine(stdout, filter(line))
  }, options)
}

/**
 * Calls callback on each line, collecting whatever it appends to the output.
 * The collected output is written once the input is exhausted.
 */
export function eachLine(callback: (line: string, output: string[]) => void, options?: ScannerOptions): Stage {
  return async (stdin, stdout) => {
    const output: string[] = []
    for await (const line of new LineScanner(stdin, options)) {
      callback(line, output)
    }
    await stdout.write(output.join(''))
  }
}

export function match(text: string, options?: ScannerOptions): Stage {
  return scanner(async (line, stdout) => {
    if (line.includes(text)) {
      await writeLine(stdout, line)
    }
  }, options)
}

export function matchRegexp(re: RegExp, options?: ScannerOptions): Stage {
  const pattern = withoutGlobalFlag(re)
  return scanner(async (line, stdout) => {
    if (pattern.test(line)) {
      await writeLine(stdout, line)
    }
  }, options)
}

export function reject(text: string, options?: ScannerOptions): Stage {
  return scanner(async (line, stdout) => {
    if (!line.includes(text)) {
      await writeLine(stdout, line)
    }
  }, options)
}

export function rejectRegexp(re: RegExp, options?: ScannerOptions): Stage {
  const pattern = withoutGlobalFlag(re)
  return scanner(async (line, stdout) => {
    if (!pattern.test(line)) {
      await writeLine(stdout, line)
    }
  }, options)
}

/**
 * Replaces every occurrence of search in each line.
 */
export function replace(search: string, replacement: string, options?: ScannerOptions): Stage {
  return filterLine(line => line.replaceAll(search, replacement), options)
}

/**
 * Replaces every match of re in each line. The replacement may refer to
 * capture groups as `$1`, `$<name>` and so on.
 */
export function replaceRegexp(re: RegExp, replacement: string, options?: ScannerOptions): Stage {
  const pattern = withGlobalFlag(re)
  return filterLine(line => line.replace(pattern, replacement), options)
}

/**
 * Passes the first n lines and stops reading.
 */
export function first(n: number, options?: ScannerOptions): Stage {
  return async (stdin, stdout) => {
    if (n <= 0) {
      return
    }
    let count = 0
    for await (const line of new LineScanner(stdin, options)) {
      await writeLine(stdout, line)
      if (++count >= n) {
        break
      }
    }
  }
}

/**
 * Passes the last n lines, once the input is exhausted.
 */
export function last(n: number, options?: ScannerOptions): Stage {
  return async (stdin, stdout) => {
    if (n <= 0) {
      return
    }
    const lines: string[] = []
    for await (const line of new LineScanner(stdin, options)) {
      lines.push(line)
      if (lines.length > n) {
        lines.shift()
      }
    }
    for (const line of lines) {
      await writeLine(stdout, line)
    }
  }
}

/**
 * The 1-based nth whitespace separated column of each line. Lines with fewer
 * columns are dropped.
 */
export function column(col: number, options?: ScannerOptions): Stage {
  return scanner(async (line, stdout) => {
    const columns = line.split(/\s+/).filter(field => field.length > 0)
    if (col > 0 && col <= columns.length) {
      await writeLine(stdout, columns[col - 1])
    }
  }, options)
}

/**
 * Joins all lines with single spaces, followed by a newline.
 */
export function join(options?: ScannerOptions): Stage {
  return async (stdin, stdout) => {
    const lines: string[] = []
    for await (const line of new LineScanner(stdin, options)) {
      lines.push(line)
    }
    await writeLine(stdout, lines.join(' '))
  }
}

export function countLines(options?: ScannerOptions): Stage {
  return async (stdin, stdout) => {
    let count = 0
    for await (const _line of new LineScanner(stdin, options)) {
      count++
    }
    await writeLine(stdout, `${count}`)
  }
}

export function basename(options?: ScannerOptions): Stage {
  return filterLine(line => {
    if (line === '') {
      return '.'
    }
    return path.basename(line) || path.sep
  }, options)
}

/**
 * Every line but its last path element. Paths relative to `./` keep the
 * prefix.
 */
export function dirname(options?: ScannerOptions): Stage {
  return filterLine(line => {
    const dir = path.dirname(line)
    return line.startsWith('./') && dir !== '.' && !dir.startsWith('./') ? `./${dir}` : dir
  }, options)
}
