import { classifyError, exitStatus } from './exitStatus.js'
import { ExitError, ProcessExitError } from './errors.js'

describe('exitStatus', () => {

  it('should be 0 without an error', () => {
    expect(exitStatus(undefined)).toEqual(0)
  })

  it.each([1, 42, 255])('should return the code carried by an ExitError (%i)', code => {
    expect(exitStatus(new ExitError(code))).toEqual(code)
  })

  it('should return the exit code of a process', () => {
    expect(exitStatus(new ProcessExitError(2))).toEqual(2)
  })

  it('should prefer the carried code over the message', () => {
    expect(exitStatus(new ExitError(3, 'exit status 9'))).toEqual(3)
  })

  it.each([
    { message: 'exit status 12', expected: 12 },
    { message: 'command failed: exit status 7', expected: 7 },
    { message: 'exit status 12 and more', expected: 0 },
    { message: 'boom', expected: 0 },
  ])('should read "$message" as $expected', ({ message, expected }) => {
    expect(exitStatus(new Error(message))).toEqual(expected)
  })
})

describe('classifyError', () => {

  it('should classify each kind of error', () => {
    expect(classifyError(new ExitError(4))).toEqual({ kind: 'exit-code', code: 4 })
    expect(classifyError(new ProcessExitError(5))).toEqual({ kind: 'process-exit', code: 5 })
    expect(classifyError(new Error('boom'))).toEqual({ kind: 'other', message: 'boom' })
  })

  it('should describe processes killed by a signal', () => {
    const error = new ProcessExitError(-1, 'SIGTERM')
    expect(error.message).toEqual('signal: SIGTERM')
    expect(exitStatus(error)).toEqual(-1)
  })
})
