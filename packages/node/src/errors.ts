/**
 * Error thrown for command lines the CLI cannot run.
 */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CliUsageError'
  }
}
