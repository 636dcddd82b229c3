import { createHash } from 'node:crypto'
import { createReadStream } from 'node:fs'
import { DiagnosticStage, nodeReader, Reader, scanner, ScannerOptions, Stage, toError, writeLine } from '@pipeworks/pipeline'

async function digest(source: Reader) {
  const hash = createHash('sha256')
  for (let chunk = await source.read(); chunk !== null; chunk = await source.read()) {
    hash.update(chunk)
  }
  return hash.digest('hex')
}

/**
 * The hex encoded SHA-256 digest of the input, without a trailing newline.
 */
export function sha256Sum(): Stage {
  return async (stdin, stdout) => {
    await stdout.write(await digest(stdin))
  }
}

/**
 * The digest of each file named on the input, one per line. Files that can't
 * be read are reported on the diagnostic stream and skipped.
 */
export function sha256Sums(options?: ScannerOptions): DiagnosticStage {
  return async (stdin, stdout, stderr) => {
    await scanner(async line => {
      const reader = nodeReader(createReadStream(line))
      try {
        await writeLine(stdout, await digest(reader))
      } catch (error) {
        await writeLine(stderr, toError(error).message)
      } finally {
        await reader.close()
      }
    }, options)(stdin, stdout)
  }
}
