/**
 * fairness-check command line.
 *
 *   fairness-check report <config_file> [--verbose] [--json] [--fail-on-violation]
 *   fairness-check validate <config_file> [--verbose]
 *   fairness-check --version | --help
 *
 * `run` never calls process.exit; it resolves to the exit code so the entry
 * point (and the tests) decide what to do with it.
 */

import { Command, CommanderError } from 'commander'
import { loadConfig, readEnv, resolveRunSettings } from '@fairness-check/config'
import { loadDataset } from '@fairness-check/dataset'
import { runEvaluation } from '@fairness-check/evaluation'
import { createInferenceClient, type FetchLike } from '@fairness-check/inference-client'
import { createLogger, type LogSink } from '@fairness-check/shared'
import { causeChain, describeError } from './errors'
import { formatReport, thresholdsMet } from './report'

export const VERSION = '0.1.0'

export const EXIT_OK = 0
export const EXIT_ERROR = 1
export const EXIT_VIOLATION = 2

export interface CliIO {
  stdout: LogSink
  stderr: LogSink
  /** Defaults to process.env. */
  env?: NodeJS.ProcessEnv
  /** Transport for the inference client. Defaults to global fetch. */
  fetch?: FetchLike
}

interface ReportFlags {
  verbose?: boolean
  json?: boolean
  failOnViolation?: boolean
}

interface ValidateFlags {
  verbose?: boolean
}

function printError(io: CliIO, err: unknown, verbose: boolean): void {
  const { message, hint } = describeError(err)
  io.stderr.write(`Error: ${message}\n`)
  if (hint) io.stderr.write(`Hint: ${hint}\n`)
  if (verbose) io.stderr.write(causeChain(err).join('\n') + '\n')
}

// ─── Commands ───────────────────────────────────────────────────────────────

async function validateCommand(configFile: string, flags: ValidateFlags, io: CliIO): Promise<number> {
  try {
    const config = await loadConfig(configFile, readEnv(io.env))
    io.stdout.write(
      [
        `✓ Configuration file '${configFile}' is valid`,
        `  Endpoint: ${config.endpoint.url}`,
        `  Test dataset: ${config.dataset.path}`,
      ].join('\n') + '\n',
    )
    return EXIT_OK
  } catch (err) {
    printError(io, err, flags.verbose ?? false)
    return EXIT_ERROR
  }
}

async function reportCommand(configFile: string, flags: ReportFlags, io: CliIO): Promise<number> {
  const verbose = flags.verbose ?? false
  try {
    const env = readEnv(io.env)
    const logger = createLogger({
      level: env.logLevel ?? (verbose ? 'info' : 'warn'),
      sink: io.stderr,
      bindings: { command: 'report' },
    })

    const config = await loadConfig(configFile, env)
    logger.info('config_loaded', { path: configFile, endpoint: config.endpoint.url })

    const settings = resolveRunSettings(config)
    const table = await loadDataset(settings.datasetPath)
    logger.info('dataset_loaded', { path: settings.datasetPath, rows: table.rows.length })

    const report = await runEvaluation({
      table,
      thresholds: settings.thresholds,
      columns: settings.columns,
      logger,
      createClient: () => createInferenceClient(settings.endpoint, { fetch: io.fetch, logger }),
    })

    io.stdout.write(flags.json ? JSON.stringify(report, null, 2) + '\n' : formatReport(report, { verbose }))

    if (flags.failOnViolation && !thresholdsMet(report)) return EXIT_VIOLATION
    return EXIT_OK
  } catch (err) {
    printError(io, err, verbose)
    return EXIT_ERROR
  }
}

// ─── Program ────────────────────────────────────────────────────────────────

export async function run(argv: readonly string[], io: CliIO): Promise<number> {
  let exitCode = EXIT_OK

  const program = new Command('fairness-check')
    .description('Evaluate a classifier endpoint for group fairness.')
    .version(VERSION, '--version', 'Show version.')
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.stdout.write(str),
      writeErr: (str) => io.stderr.write(str),
    })

  program
    .command('report')
    .description('Generate a fairness report against the configured classifier endpoint.')
    .argument('<config_file>', 'YAML configuration file')
    .option('--verbose', 'Show progress, per-group rates and error details.')
    .option('--json', 'Print the report as JSON.')
    .option('--fail-on-violation', 'Exit with code 2 when a threshold is not met.')
    .action(async (configFile: string, flags: ReportFlags) => {
      exitCode = await reportCommand(configFile, flags, io)
    })

  program
    .command('validate')
    .description('Check the configuration file without running the evaluation.')
    .argument('<config_file>', 'YAML configuration file')
    .option('--verbose', 'Show error details.')
    .action(async (configFile: string, flags: ValidateFlags) => {
      exitCode = await validateCommand(configFile, flags, io)
    })

  try {
    await program.parseAsync([...argv], { from: 'user' })
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode
    printError(io, err, false)
    return EXIT_ERROR
  }
  return exitCode
}
