/**
 * Error thrown when pool options are out of range.
 */
export class InvalidPoolOptionsError extends Error {
  constructor(
    public readonly option: string,
    public readonly value: unknown
  ) {
    super(`Invalid oscillator pool option '${option}': ${String(value)}`)
    this.name = 'InvalidPoolOptionsError'
  }
}

/**
 * Error thrown when a mix request names an impossible buffer format.
 */
export class AudioFormatError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'AudioFormatError'
  }
}

/**
 * Error thrown when the pool guard is entered while already held.
 *
 * Each critical section only snapshots or mutates the oscillator list,
 * so re-entry means a caller is running pool code from inside the guard.
 */
export class PoolGuardError extends Error {
  constructor() {
    super('Oscillator pool guard is already held')
    this.name = 'PoolGuardError'
  }
}
