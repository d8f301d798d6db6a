/**
 * Argument validation
 * Structural mistakes throw; missing data never does (it becomes NaN)
 */

export class InvalidArgumentError extends Error {
  readonly argument: string

  constructor(argument: string, message: string) {
    super(`${argument}: ${message}`)
    this.name = 'InvalidArgumentError'
    this.argument = argument
  }
}

export function assertInteger(name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new InvalidArgumentError(name, `expected an integer >= ${min}, got ${value}`)
  }
}

/**
 * Window must satisfy 1 <= w <= n
 */
export function assertWindow(window: number, length: number): void {
  assertInteger('window', window, 1)
  if (window > length) {
    throw new InvalidArgumentError(
      'window',
      `window ${window} exceeds sequence length ${length}`
    )
  }
}

export function assertSameLength(x: ArrayLike<number>, y: ArrayLike<number>): void {
  if (x.length !== y.length) {
    throw new InvalidArgumentError(
      'y',
      `length ${y.length} does not match x length ${x.length}`
    )
  }
}

export function assertNonEmpty(name: string, x: ArrayLike<number>): void {
  if (x.length === 0) {
    throw new InvalidArgumentError(name, 'sequence must not be empty')
  }
}

export function assertInRange(
  name: string,
  value: number,
  lo: number,
  hi: number
): void {
  if (!(value >= lo && value <= hi)) {
    throw new InvalidArgumentError(name, `expected a value in [${lo}, ${hi}], got ${value}`)
  }
}
