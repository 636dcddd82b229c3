import { LineScanner, ScannerOptions, Stage, writeLine } from '@pipeworks/pipeline'

/**
 * Counts how often each distinct line occurs. The output has one line per
 * distinct input line, prefixed with its count, most frequent first and
 * alphabetically among equal counts. Counts are right aligned to the widest.
 *
 * @example
 * ```
 * b        3 a
 * a   =>   2 b
 * b
 * a
 * a
 * ```
 */
export function freq(options?: ScannerOptions): Stage {
  return async (stdin, stdout) => {
    const counts = new Map<string, number>()
    for await (const line of new LineScanner(stdin, options)) {
      counts.set(line, (counts.get(line) ?? 0) + 1)
    }

    const entries = [...counts].sort(([lineA, countA], [lineB, countB]) => {
      if (countA !== countB) {
        return countB - countA
      }
      return lineA < lineB ? -1 : lineA > lineB ? 1 : 0
    })

    const width = entries.length > 0 ? `${entries[0][1]}`.length : 0
    for (const [line, count] of entries) {
      await writeLine(stdout, `${`${count}`.padStart(width)} ${line}`)
    }
  }
}
