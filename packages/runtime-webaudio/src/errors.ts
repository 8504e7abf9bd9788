/**
 * Error thrown when output options are out of range.
 */
export class InvalidOutputOptionsError extends Error {
  constructor(
    public readonly option: string,
    public readonly value: unknown
  ) {
    super(`Invalid Web Audio output option '${option}': ${String(value)}`)
    this.name = 'InvalidOutputOptionsError'
  }
}
