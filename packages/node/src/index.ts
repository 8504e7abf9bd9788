/**
 * @sortphony/node
 *
 * Offline rendering, WAV export and the sortphony CLI.
 * Requires Node.js 20+.
 */

export { renderSession } from './render'
export type { RenderOptions, RenderResult } from './render'
export { encodeWav, floatToInt16 } from './wav'
export { renderAsciiBars } from './ascii'
export type { AsciiBarsOptions } from './ascii'
export { main, parseCliArgs, USAGE } from './cli'
export type { CliCommand, CliIO, CliOptions } from './cli'
export { CliUsageError } from './errors'
