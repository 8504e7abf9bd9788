/**
 * Error thrown when session options are out of range.
 */
export class InvalidOptionsError extends Error {
  constructor(
    public readonly option: string,
    public readonly value: unknown,
    reason: string = 'out of range'
  ) {
    super(`Invalid option '${option}' (${String(value)}): ${reason}`)
    this.name = 'InvalidOptionsError'
  }
}

export class UnknownAlgorithmError extends Error {
  constructor(public readonly algorithm: string) {
    super(`Unknown sort algorithm: '${algorithm}'`)
    this.name = 'UnknownAlgorithmError'
  }
}

export class UnknownGeneratorError extends Error {
  constructor(public readonly generator: string) {
    super(`Unknown initial condition: '${generator}'`)
    this.name = 'UnknownGeneratorError'
  }
}

export class SessionDisposedError extends Error {
  constructor() {
    super('SortSession has been disposed.')
    this.name = 'SessionDisposedError'
  }
}
