import { clamp } from './clamp.js'

describe('clamp', () => {

  it.each([
    { value: 5, min: 0, max: 10, expected: 5 },
    { value: -1, min: 0, max: 10, expected: 0 },
    { value: 11, min: 0, max: 10, expected: 10 },
    { value: 4096, min: 64, max: 1024, expected: 1024 },
    { value: 2.5, min: 0, max: 10, expected: 2.5 },
  ])('should clamp $value into [$min, $max]', ({ value, min, max, expected }) => {
    expect(clamp(value, { min, max })).toEqual(expected)
  })

  it('should truncate to an integer when asked', () => {
    expect(clamp(7.9, { max: 10, integer: true })).toEqual(7)
    expect(clamp(0.5, { min: 1, max: 10, integer: true })).toEqual(1)
  })

  it('should reject NaN', () => {
    expect(() => clamp(NaN, { max: 10 })).toThrow('Value must be a number')
  })
})
