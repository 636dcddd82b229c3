import { Logger } from '@aws-lambda-powertools/logger'
import { mock, mockFn } from 'jest-mock-extended'
import { Pipeline } from './Pipeline.js'
import { ConversionError, ExitError } from './errors.js'
import { BufferWriter, copy, stringReader } from './io.js'
import { LineScanner } from './LineScanner.js'
import { DiagnosticStage, ReadCloser, Stage } from './types.js'

const echo = (text: string): Stage => async (_stdin, stdout) => {
  await stdout.write(text)
}

const passThrough: Stage = async (stdin, stdout) => {
  await copy(stdout, stdin)
}

const failWith = (code: number): Stage => async () => {
  throw new ExitError(code)
}

const first = (n: number): Stage => async (stdin, stdout) => {
  let count = 0
  for await (const line of new LineScanner(stdin)) {
    if (count >= n) {
      break
    }
    await stdout.write(`${line}\n`)
    count++
  }
}

describe('Pipeline', () => {
  let logger: Logger
  let stdout: BufferWriter
  let sut: Pipeline

  beforeEach(() => {
    logger = mock<Logger>()
    stdout = new BufferWriter()
    sut = new Pipeline({ logger, stdout })
  })

  describe('run', () => {

    it('should copy the input unchanged when there are no stages', async () => {
      const result = await sut.withReader(stringReader('hello\nworld\n')).run()

      expect(result).toEqual({ value: 12, error: undefined })
      expect(stdout.toString()).toEqual('hello\nworld\n')
    })

    it('should append the given stages', async () => {
      const result = await sut.run(mockFn<DiagnosticStage>().mockImplementation(async (_stdin, w) => {
        await w.write('hi')
      }))

      expect(result).toEqual({ value: 2, error: undefined })
      expect(stdout.toString()).toEqual('hi')
    })

    it('should pass data through every stage in order', async () => {
      await sut
        .pipeE(echo('a\nb\n'))
        .pipeE(passThrough)
        .scan(async (line, w) => {
          await w.write(`<${line}>`)
        })
        .run()

      expect(stdout.toString()).toEqual('<a><b>')
    })

    it('should capture a failure to write the output', async () => {
      // Arrange
      const failing = new Pipeline({
        logger,
        stdout: {
          write: async () => {
            throw new Error('disk full')
          },
        },
      })

      // Act
      const result = await failing.pipeE(echo('x')).run()

      // Assert
      expect(result.value).toEqual(0)
      expect(result.error?.message).toEqual('disk full')
    })
  })

  describe('errors', () => {

    it('should report the exit status of a failed stage', async () => {
      await sut.pipeE(failWith(3)).pipeE(passThrough).wait()

      expect(await sut.exitStatus()).toEqual(3)
      expect(await sut.error()).toBeInstanceOf(ExitError)
    })

    it('should report 0 when nothing failed', async () => {
      await sut.pipeE(echo('fine')).wait()

      expect(await sut.exitStatus()).toEqual(0)
      expect(await sut.error()).toBeUndefined()
    })

    it('should keep running later stages after a failure', async () => {
      const result = await sut.pipeE(failWith(1)).pipeE(echo('still here')).string()

      expect(result.value).toEqual('still here')
      expect(result.error).toBeInstanceOf(ExitError)
    })

    it('should keep output written before a failure', async () => {
      const partial: Stage = async (_stdin, w) => {
        await w.write('partial')
        throw new Error('gave up')
      }

      const result = await sut.pipeE(partial).string()

      expect(result).toEqual({ value: 'partial', error: new Error('gave up') })
    })

    it('should write the failure message to the diagnostic stream', async () => {
      const stderr = new BufferWriter()

      await sut.withStderr(stderr).pipeE(failWith(2)).wait()

      expect(stderr.toString()).toEqual('exit status 2\n')
    })

    it('should normalise thrown values that are not errors', async () => {
      await sut.pipe(async () => {
        throw 'plain string'
      }).wait()

      expect((await sut.error())?.message).toEqual('plain string')
    })

    it('should let the caller override the captured error', async () => {
      await sut.pipeE(failWith(1)).wait()

      sut.withError(new ExitError(7))
      expect(await sut.exitStatus()).toEqual(7)

      sut.withError(undefined)
      expect(await sut.error()).toBeUndefined()
    })

    it('should not capture a broken pipe', async () => {
      // Arrange
      const producer: Stage = async (_stdin, w) => {
        for (let i = 0; i < 100; i++) {
          await w.write(`${i}\n`)
        }
      }

      // Act
      const result = await sut.pipeE(producer).pipeE(first(1)).string()

      // Assert
      expect(result).toEqual({ value: '0\n', error: undefined })
      expect(logger.debug).toHaveBeenCalledWith('Stage stopped, its output was closed', { stage: 1 })
    })
  })

  describe('exit on error', () => {

    it('should not launch stages once an error is captured', async () => {
      // Arrange
      const later = mockFn<DiagnosticStage>()
      sut.setExitOnError(true)
      await sut.pipeE(failWith(1)).wait()

      // Act
      sut.pipe(later)

      // Assert
      expect(later).not.toHaveBeenCalled()
      expect(sut.stageCount).toEqual(1)
      expect(logger.debug).toHaveBeenCalledWith('Skipping stage, pipeline has already failed', { stage: 2 })
    })

    it('should not launch stages after the caller sets an error', async () => {
      // Arrange
      const stage = mockFn<DiagnosticStage>()
      const pipeline = new Pipeline({ logger, stdout, exitOnError: true })

      // Act
      pipeline.withError(new Error('already failed')).pipe(stage)
      await pipeline.wait()

      // Assert
      expect(stage).not.toHaveBeenCalled()
      expect(pipeline.stageCount).toEqual(0)
      expect((await pipeline.error())?.message).toEqual('already failed')
    })

    it('should launch stages while no error is captured', async () => {
      const result = await new Pipeline({ logger, exitOnError: true }).pipeE(echo('ok')).pipeE(passThrough).string()

      expect(result).toEqual({ value: 'ok', error: undefined })
    })
  })

  describe('launch', () => {

    it('should start a stage before pipe returns', async () => {
      const stage = mockFn<DiagnosticStage>()

      sut.pipe(stage)

      expect(stage).toHaveBeenCalledTimes(1)
      await expect(sut.ready()).resolves.toBeUndefined()
      await sut.wait()
    })

    it('should route diagnostics to the stream configured when the stage was added', async () => {
      const early = new BufferWriter()
      const late = new BufferWriter()

      sut.withStderr(early).pipeE(failWith(1))
      sut.withStderr(late)
      await sut.wait()

      expect(early.toString()).toEqual('exit status 1\n')
      expect(late.toString()).toEqual('')
    })

    it('should close the input of a stage once it returns', async () => {
      const close = mockFn<() => void>()

      const source: ReadCloser = { read: async () => Buffer.from('never ending'), close }

      await sut.withReader(source).pipeE(echo('done')).wait()

      expect(close).toHaveBeenCalledTimes(1)
    })

    it('should settle every stage', async () => {
      const finished: number[] = []
      const track = (id: number): Stage => async (stdin, w) => {
        await copy(w, stdin)
        finished.push(id)
      }

      await sut.pipeE(echo('x')).pipeE(track(1)).pipeE(track(2)).wait()

      expect(finished.sort()).toEqual([1, 2])
    })
  })

  describe('materializers', () => {

    it('should return the output as bytes', async () => {
      const result = await sut.pipeE(echo('abc')).bytes()
      expect(result).toEqual({ value: Buffer.from('abc'), error: undefined })
    })

    it('should read the tail directly', async () => {
      sut.pipeE(echo('direct'))
      expect(await sut.read()).toEqual(Buffer.from('direct'))
      expect(await sut.read()).toBeNull()
      await sut.close()
    })

    it('should parse an integer ignoring surrounding whitespace', async () => {
      expect(await sut.pipeE(echo('  42\n')).int()).toEqual({ value: 42, error: undefined })
    })

    it('should parse a negative integer', async () => {
      expect(await sut.pipeE(echo('-17')).int()).toEqual({ value: -17, error: undefined })
    })

    it('should fail to parse content that is not an integer', async () => {
      const result = await sut.pipeE(echo('abc')).int()

      expect(result.value).toEqual(0)
      expect(result.error).toBeInstanceOf(ConversionError)
      expect(result.error?.message).toEqual('cannot convert "abc" to integer')
    })

    it('should reject integers beyond the safe range', async () => {
      const result = await sut.pipeE(echo('9007199254740993\n')).int()

      expect(result.value).toEqual(0)
      expect(result.error).toBeInstanceOf(ConversionError)
      expect(result.error?.message).toEqual('cannot convert "9007199254740993" to integer')
    })

    it('should not capture a conversion error', async () => {
      await sut.pipeE(echo('4.5')).int()
      expect(await sut.error()).toBeUndefined()
    })

    it('should carry the captured error as the cause of a conversion error', async () => {
      const result = await sut.pipeE(failWith(5)).int()

      expect(result.error).toBeInstanceOf(ConversionError)
      expect(result.error?.cause).toBeInstanceOf(ExitError)
    })

    it('should return the captured error with a parsed integer', async () => {
      const result = await sut.pipeE(echo('1')).pipeE(failWith(9)).pipeE(echo('8')).int()

      expect(result.value).toEqual(8)
      expect(result.error).toBeInstanceOf(ExitError)
    })

    it.each([
      { input: '', expected: [] },
      { input: '\n', expected: [''] },
      { input: 'one\ntwo\n', expected: ['one', 'two'] },
    ])('should split $input into lines', async ({ input, expected }) => {
      expect(await sut.pipeE(echo(input)).lines()).toEqual({ value: expected, error: undefined })
    })

    it('should yield no lines for an empty pipeline', async () => {
      expect(await sut.lines()).toEqual({ value: [], error: undefined })
    })

    it('should reproduce the input when lines are joined', async () => {
      const input = 'alpha\n\nbeta gamma\ndelta\n'

      const { value } = await sut.pipeE(echo(input)).lines()

      expect(value.map(line => `${line}\n`).join('')).toEqual(input)
    })

    it('should keep the first lines of a longer input', async () => {
      const result = await sut.pipeE(echo('1\n2\n3\n4\n5\n')).pipeE(first(2)).lines()
      expect(result).toEqual({ value: ['1', '2'], error: undefined })
    })
  })

  describe('options', () => {

    it('should reject options that are not valid', () => {
      expect(() => new Pipeline({ maxLineLength: -1 })).toThrow()
    })

    it('should apply the scanner limits to line callbacks', async () => {
      const limited = new Pipeline({ logger, maxLineLength: 4 })

      const result = await limited.pipeE(echo('too long\n')).lines()

      expect(result.value).toEqual([])
      expect(result.error?.message).toEqual('token too long: line exceeds 4 bytes')
    })
  })
})
