interface ClampOptions {
  min?: number
  max: number
  /** round towards zero before clamping */
  integer?: boolean
}

export function clamp(value: number, { min = 0, max, integer = false }: ClampOptions) {
  if (Number.isNaN(value)) {
    throw new Error('Value must be a number')
  }
  value = integer ? Math.trunc(value) : value
  return Math.min(Math.max(min, value), max)
}
