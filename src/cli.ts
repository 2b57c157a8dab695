import { parseArgs } from 'node:util'
import { YAMLError } from 'yaml'
import { ConfigValidationError, defaultConfig, loadConfigFile, type SplitBy, type SweepstatConfig } from './config.js'
import { EmptyResultSetError, UnknownParameterError } from './errors.js'
import { describeError } from './error-utils.js'
import type { PlotRenderer } from './report/plot.js'
import { listParameters, renderParameterList, runReport, type ReportMode } from './report/report.js'

export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_USAGE = 2

export interface CliIo {
  readonly stdout: (text: string) => void
  readonly stderr: (text: string) => void
}

export interface CliDeps {
  readonly loadRenderer?: () => Promise<PlotRenderer | null>
}

const processIo: CliIo = {
  stdout: (text) => {
    process.stdout.write(text + '\n')
  },
  stderr: (text) => {
    process.stderr.write(text + '\n')
  },
}

export const USAGE = [
  'Usage:',
  '  sweepstat report <results-dir> <x-axis> <y-axis> [--split application|optimized|none] [--summary] [--output-dir dir] [--config file]',
  '  sweepstat plot <results-dir> <x-axis> <y-axis> [--split application|optimized|none] [--summary] [--output-dir dir] [--config file]',
  '  sweepstat params <results-dir> [--config file]',
  '',
  'Plots are written as plot_<x-axis>_vs_<y-axis>.svg in the output directory (default: the results directory).',
].join('\n')

const SPLIT_VALUES: readonly SplitBy[] = ['application', 'optimized', 'none']

function isSplitBy(value: string): value is SplitBy {
  return SPLIT_VALUES.some((candidate) => candidate === value)
}

class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

function parseCommandLine(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      options: {
        split: { type: 'string' },
        summary: { type: 'boolean', default: false },
        'output-dir': { type: 'string' },
        config: { type: 'string' },
        help: { type: 'boolean', short: 'h', default: false },
      },
      allowPositionals: true,
      strict: true,
    })
  } catch (err) {
    throw new UsageError(describeError(err))
  }
}

async function resolveConfig(configPath: string | undefined): Promise<SweepstatConfig> {
  return configPath === undefined ? defaultConfig() : loadConfigFile(configPath)
}

function isReportMode(command: string): command is ReportMode {
  return command === 'report' || command === 'plot'
}

async function dispatch(argv: readonly string[], io: CliIo, deps: CliDeps): Promise<number> {
  const { values, positionals } = parseCommandLine(argv)
  const [command, ...args] = positionals

  if (values.help) {
    io.stdout(USAGE)
    return EXIT_OK
  }
  if (command === undefined) throw new UsageError('missing command')

  if (command === 'params') {
    const [resultsDir, ...extra] = args
    if (resultsDir === undefined || extra.length > 0) {
      throw new UsageError('params takes exactly one argument: <results-dir>')
    }
    const config = await resolveConfig(values.config)
    io.stdout(renderParameterList(await listParameters(resultsDir, config)))
    return EXIT_OK
  }

  if (!isReportMode(command)) throw new UsageError(`unknown command "${command}"`)

  const [resultsDir, xAxis, yAxis, ...extra] = args
  if (resultsDir === undefined || xAxis === undefined || yAxis === undefined || extra.length > 0) {
    throw new UsageError(`${command} takes exactly three arguments: <results-dir> <x-axis> <y-axis>`)
  }
  const split = values.split
  if (split !== undefined && !isSplitBy(split)) {
    throw new UsageError(`--split must be one of ${SPLIT_VALUES.join(', ')}; got "${split}"`)
  }

  const config = await resolveConfig(values.config)
  const outcome = await runReport(
    {
      resultsDir,
      xAxis,
      yAxis,
      mode: command,
      summary: values.summary,
      ...(split !== undefined ? { splitBy: split } : {}),
      ...(values['output-dir'] !== undefined ? { outputDir: values['output-dir'] } : {}),
    },
    { config, ...(deps.loadRenderer !== undefined ? { loadRenderer: deps.loadRenderer } : {}) }
  )

  if (outcome.notice !== undefined) io.stderr(`Notice: ${outcome.notice}`)
  if (outcome.plotPath !== undefined) io.stdout(`Plot saved to ${outcome.plotPath}`)
  if (outcome.output !== '') io.stdout(outcome.output)
  return EXIT_OK
}

/**
 * Runs the command line and returns the exit code. Expected failures are
 * printed to stderr; anything else propagates.
 */
export async function runCli(argv: readonly string[], io: CliIo = processIo, deps: CliDeps = {}): Promise<number> {
  try {
    return await dispatch(argv, io, deps)
  } catch (err) {
    if (err instanceof UsageError) {
      io.stderr(`Error: ${err.message}`)
      io.stderr(USAGE)
      return EXIT_USAGE
    }
    if (
      err instanceof UnknownParameterError ||
      err instanceof EmptyResultSetError ||
      err instanceof ConfigValidationError ||
      err instanceof YAMLError
    ) {
      io.stderr(`Error: ${err.message}`)
      return EXIT_FAILURE
    }
    throw err
  }
}
