/**
 * Fisheries exchange-value cleaning CLI
 *
 * Commands:
 * - run: validate, filter and summarize both datasets
 * - validate: check one CSV against a variant's rules and print the report
 * - init-config: write a settings file with default values
 */

import log from 'electron-log/node'
import { Command, InvalidArgumentError } from 'commander'
import { ConfigurationError, errorMessage } from '../errors'
import { SettingsManager } from '../SettingsManager'
import { VARIANTS, loadVariantDefinitions } from '../rules'
import { parseCsv } from '../parsers'
import { validateTable } from '../validation'
import { formatRunStamp, runFullPipeline } from '../workflow'
import { configureLogging, consoleErrorsOnly } from '../logging'
import type { AppSettings, RejectionPolicy, Variant } from '../types'

export const CLI_NAME = 'fisheries-ev'
export const CLI_VERSION = '1.0.0'

const TRUE_VALUES = new Set(['true', 'yes', '1'])
const FALSE_VALUES = new Set(['false', 'no', '0'])

/**
 * Parse a boolean switch value; anything unrecognized is a setup error
 */
export function parseSwitch(value: string, name: string = 'switch'): boolean {
  const normalized = value.trim().toLowerCase()
  if (TRUE_VALUES.has(normalized)) return true
  if (FALSE_VALUES.has(normalized)) return false
  throw new ConfigurationError(`Unrecognized value for ${name}: "${value}" (expected true or false)`)
}

const REJECTION_POLICIES: readonly RejectionPolicy[] = ['warn', 'reject']

export function parseRejectionPolicy(value: string): RejectionPolicy {
  const normalized = value.trim().toLowerCase()
  const match = REJECTION_POLICIES.find(policy => policy === normalized)
  if (!match) {
    throw new ConfigurationError(
      `Unrecognized value for --rejection-policy: "${value}" (expected ${REJECTION_POLICIES.join(' or ')})`
    )
  }
  return match
}

export function parseVariant(value: string): Variant {
  const match = VARIANTS.find(variant => variant === value)
  if (!match) {
    throw new InvalidArgumentError(`Unknown variant "${value}" (expected ${VARIANTS.join(' or ')})`)
  }
  return match
}

export interface RunCommandOptions {
  config?: string
  input?: string
  output?: string
  logDir?: string
  removeAggregates?: string
  removeDisplay?: string
  rejectionPolicy?: string
  strict?: boolean
  diagnostics?: boolean
  rules?: string
  verbose?: boolean
}

function optionalSwitch(value: string | undefined, name: string): boolean | undefined {
  return value === undefined ? undefined : parseSwitch(value, name)
}

function resolveRejectionPolicy(options: RunCommandOptions): RejectionPolicy | undefined {
  const policy = options.rejectionPolicy === undefined ? undefined : parseRejectionPolicy(options.rejectionPolicy)
  if (options.strict && policy === 'warn') {
    throw new ConfigurationError('--strict conflicts with --rejection-policy warn')
  }
  return options.strict ? 'reject' : policy
}

/**
 * Settings from the optional file, overridden by command-line flags.
 * Switch values are parsed here so a bad one surfaces as a ConfigurationError.
 */
export function resolveRunSettings(options: RunCommandOptions): AppSettings {
  const manager = new SettingsManager(options.config)
  manager.updateSettings({
    inputDir: options.input,
    outputDir: options.output,
    logDir: options.logDir,
    removeAggregates: optionalSwitch(options.removeAggregates, '--remove-aggregates'),
    removeDisplay: optionalSwitch(options.removeDisplay, '--remove-display'),
    rejectionPolicy: resolveRejectionPolicy(options),
    writeDiagnostics: options.diagnostics,
    rulesPath: options.rules
  })
  return manager.getSettings()
}

export function buildProgram(): Command {
  const program = new Command()

  program
    .name(CLI_NAME)
    .description('Validate and filter tidied fisheries exchange-value datasets')
    .version(CLI_VERSION)

  program
    .command('run')
    .description('Clean commercial and non-commercial datasets and write a combined summary')
    .option('-c, --config <file>', 'settings JSON file')
    .option('-i, --input <dir>', 'input directory')
    .option('-o, --output <dir>', 'output directory')
    .option('--log-dir <dir>', 'log directory')
    .option('--remove-aggregates <bool>', 'drop "All Species"/"All Ecosystems" rows')
    .option('--remove-display <bool>', 'drop *_olelo and *_formatted columns')
    .option('--rejection-policy <policy>', 'warn keeps rows that fail checks, reject drops them')
    .option('--strict', 'same as --rejection-policy reject')
    .option('--diagnostics', 'write validation reports next to the cleaned files')
    .option('--rules <file>', 'schema rules JSON file')
    .option('-v, --verbose', 'debug logging, including per-step timings')
    .action((options: RunCommandOptions) => {
      const settings = resolveRunSettings(options)
      const now = new Date()
      configureLogging({ logDir: settings.logDir, runStamp: formatRunStamp(now), verbose: options.verbose })

      const result = runFullPipeline({
        ...settings,
        definitions: loadVariantDefinitions(settings.rulesPath),
        now
      })
      process.exitCode = result.ok ? 0 : 1
    })

  program
    .command('validate')
    .description('Validate one CSV file and print the report as JSON')
    .argument('<file>', 'CSV file to validate')
    .requiredOption('--variant <variant>', `dataset variant (${VARIANTS.join(', ')})`, parseVariant)
    .option('--rules <file>', 'schema rules JSON file')
    .action((file: string, options: { variant: Variant; rules?: string }) => {
      consoleErrorsOnly()
      const definitions = loadVariantDefinitions(options.rules)
      const report = validateTable(parseCsv(file), definitions[options.variant].rules)
      process.stdout.write(JSON.stringify(report, null, 2) + '\n')
      process.exitCode = report.fatal ? 1 : 0
    })

  program
    .command('init-config')
    .description('Write a settings file with default values')
    .argument('[file]', 'settings file to create', 'fisheries-ev.config.json')
    .action((file: string) => {
      const manager = new SettingsManager(file)
      manager.resetSettings()
      manager.saveSettings()
      process.stdout.write(`Wrote default settings to ${file}\n`)
    })

  return program
}

/**
 * Parse argv and run the chosen command. Returns the process exit code:
 * 2 for configuration errors, 1 for other failures.
 */
export function main(argv: readonly string[], program: Command = buildProgram()): number {
  try {
    program.parse([...argv])
  } catch (error) {
    if (error instanceof ConfigurationError) {
      log.error(`[CONFIG] ${error.message}`)
      return 2
    }
    log.error('[ERROR] Pipeline aborted:', errorMessage(error))
    return 1
  }
  return typeof process.exitCode === 'number' ? process.exitCode : 0
}
