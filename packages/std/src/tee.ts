import { Stage, Writer } from '@pipeworks/pipeline'

/**
 * Copies the input to the output and to every writer.
 */
export function tee(...writers: Writer[]): Stage {
  return async (stdin, stdout) => {
    const targets = [stdout, ...writers]
    for (let chunk = await stdin.read(); chunk !== null; chunk = await stdin.read()) {
      const data = chunk
      await Promise.all(targets.map(target => target.write(data)))
    }
  }
}
