/**
 * sortphony command line.
 *
 * Renders one sort session offline, prints its outcome and counters, and
 * optionally writes the audio as a WAV file.
 */

import { promises as fs } from 'fs'
import { format, parseArgs } from 'util'
import {
  getSortAlgorithm,
  isInitialCondition,
  isSortAlgorithm,
  NEUTRAL,
  SORT_ALGORITHMS,
  INITIAL_CONDITIONS
} from '@sortphony/core'
import type { InitialCondition, SessionLogger, SortAlgorithm } from '@sortphony/core'
import { renderSession } from './render'
import { encodeWav } from './wav'
import { renderAsciiBars } from './ascii'
import { CliUsageError } from './errors'

export const USAGE = `Usage: sortphony <algorithm> [options]

Algorithms: ${Object.keys(SORT_ALGORITHMS).join(', ')}

Options:
  -g, --generator <kind>   Initial condition: ${Object.keys(INITIAL_CONDITIONS).join(', ')} (default: uniform)
  -n, --size <n>           Number of bars (default: 100)
  -s, --seed <n>           Random seed (default: time-based)
  -r, --frame-rate <n>     Steps per second (default: 30)
  -o, --out <file.wav>     Write the rendered audio
  -a, --ascii              Print the final bars
  -h, --help               Show this help`

export interface CliOptions {
  algorithm: SortAlgorithm
  generator: InitialCondition
  size: number
  seed: number | undefined
  frameRate: number
  out: string | undefined
  ascii: boolean
}

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'render'; options: CliOptions }

export interface CliIO {
  stdout: { write(text: string): unknown }
  stderr: { write(text: string): unknown }
  writeFile(path: string, data: Uint8Array): Promise<void>
}

const defaultIO: CliIO = {
  stdout: process.stdout,
  stderr: process.stderr,
  writeFile: (path, data) => fs.writeFile(path, data)
}

function parseNumber(flag: string, raw: string, integer: boolean): number {
  const value = Number(raw)
  if (raw.trim() === '' || !Number.isFinite(value) || (integer && !Number.isInteger(value))) {
    throw new CliUsageError(`--${flag} expects ${integer ? 'an integer' : 'a number'}, got '${raw}'`)
  }
  return value
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        generator: { type: 'string', short: 'g' },
        size: { type: 'string', short: 'n' },
        seed: { type: 'string', short: 's' },
        'frame-rate': { type: 'string', short: 'r' },
        out: { type: 'string', short: 'o' },
        ascii: { type: 'boolean', short: 'a' },
        help: { type: 'boolean', short: 'h' }
      }
    })
  } catch (e) {
    throw new CliUsageError(e instanceof Error ? e.message : String(e))
  }
}

/**
 * Parse CLI arguments (without the node and script entries).
 * Throws `CliUsageError`.
 */
export function parseCliArgs(argv: string[]): CliCommand {
  const { values, positionals } = readArgs(argv)
  if (values.help === true) return { kind: 'help' }

  if (positionals.length !== 1) {
    throw new CliUsageError('Expected exactly one algorithm')
  }
  const algorithm = positionals[0]
  if (!isSortAlgorithm(algorithm)) {
    throw new CliUsageError(`Unknown algorithm '${algorithm}'`)
  }
  const generator = values.generator ?? 'uniform'
  if (!isInitialCondition(generator)) {
    throw new CliUsageError(`Unknown generator '${generator}'`)
  }

  const size = parseNumber('size', values.size ?? '100', true)
  if (size < 1) {
    throw new CliUsageError(`--size must be at least 1, got ${size}`)
  }
  const frameRate = parseNumber('frame-rate', values['frame-rate'] ?? '30', false)
  if (frameRate <= 0) {
    throw new CliUsageError(`--frame-rate must be positive, got ${frameRate}`)
  }

  return {
    kind: 'render',
    options: {
      algorithm,
      generator,
      size,
      seed: values.seed === undefined ? undefined : parseNumber('seed', values.seed, true),
      frameRate,
      out: values.out,
      ascii: values.ascii === true
    }
  }
}

function createCliLogger(io: CliIO): SessionLogger {
  return {
    debug(): void {},
    info(): void {},
    warn(...args: unknown[]): void {
      io.stderr.write(format(...args) + '\n')
    },
    error(...args: unknown[]): void {
      io.stderr.write(format(...args) + '\n')
    }
  }
}

/**
 * Run the CLI. Resolves to the process exit code.
 */
export async function main(argv: string[], io: CliIO = defaultIO): Promise<number> {
  let command: CliCommand
  try {
    command = parseCliArgs(argv)
  } catch (e) {
    if (e instanceof CliUsageError) {
      io.stderr.write(`${e.message}\n\n${USAGE}\n`)
      return 2
    }
    throw e
  }

  if (command.kind === 'help') {
    io.stdout.write(USAGE + '\n')
    return 0
  }

  const { options } = command
  const result = renderSession({
    algorithm: options.algorithm,
    generator: options.generator,
    arraySize: options.size,
    seed: options.seed,
    frameRate: options.frameRate,
    logger: createCliLogger(io)
  })

  const { label } = getSortAlgorithm(options.algorithm)
  const { comparisons, swaps, writes, steps } = result.stats
  io.stdout.write(
    `${label}, ${options.size} bars (${options.generator}, seed ${result.seed}): ${result.outcome}\n`
  )
  io.stdout.write(`comparisons ${comparisons}  swaps ${swaps}  writes ${writes}  steps ${steps}\n`)

  if (options.ascii) {
    const colors = result.values.map(() => NEUTRAL)
    io.stdout.write(renderAsciiBars(result.values, colors) + '\n')
  }

  if (options.out) {
    await io.writeFile(options.out, encodeWav(result.samples, result.channelCount, result.sampleRate))
    const seconds = (result.frameCount / result.sampleRate).toFixed(2)
    io.stdout.write(`Wrote ${options.out} (${seconds}s)\n`)
  }

  return result.outcome === 'sorted' ? 0 : 1
}
