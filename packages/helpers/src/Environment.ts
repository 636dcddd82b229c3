import { clamp } from './clamp.js'

interface IntegerRange {
  min?: number
  max: number
}

/**
 * A single environment variable, read as a typed setting.
 */
export class EnvironmentValue<T extends string | undefined> {
  constructor(private readonly name: string, private readonly value: T) {
  }

  default(defaultValue: string): EnvironmentValue<string> {
    return new EnvironmentValue(this.name, this.value ?? defaultValue)
  }

  asNumber(): number {
    const text = (this.value ?? '').trim()
    const value = Number(text)
    if (text === '' || Number.isNaN(value)) {
      throw new Error(`Value for ${this.name} is not a number`)
    }
    return value
  }

  /**
   * The value truncated to an integer and clamped into range.
   */
  asInteger(range: IntegerRange): number {
    return clamp(this.asNumber(), { ...range, integer: true })
  }

  asBoolean(): boolean {
    return /^(?:true|yes|on|1)$/i.test((this.value ?? '').trim())
  }
}

export class Environment<Key extends string> {
  constructor(private readonly env: Record<string, string | undefined>) {
  }

  get(name: Key) {
    return new EnvironmentValue(name, this.env[name])
  }
}
