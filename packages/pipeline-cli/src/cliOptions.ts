import { resolve } from 'node:path'

import {
  isPipelineEventKind,
  PIPELINE_EVENT_KINDS,
  type PipelineEventKind,
} from '@relayci/pipeline-core'

/**
 * Invalid command line arguments.
 */
export class CliUsageError extends Error {
  public constructor(message: string) {
    super(message)
    this.name = 'CliUsageError'
  }
}

/**
 * Console output format.
 */
export type CliOutputFormat = 'pretty' | 'json'

/**
 * Step executor selected on the command line.
 */
export type CliExecutorKind = 'shell' | 'container'

/**
 * Event fields given as flags. Unset fields fall back to `RELAYCI_*` variables.
 */
export interface CliEventOverrides {
  readonly eventKind?: PipelineEventKind
  readonly branch?: string
  readonly tag?: string
  readonly ref?: string
  readonly repoSlug?: string
  readonly commit?: string
}

/**
 * Parsed CLI runtime options.
 */
export interface CliOptions {
  /** Absolute working directory for pipeline discovery and execution. */
  readonly cwd: string
  /** Optional explicit pipeline file path. */
  readonly configPath?: string
  /** Pipeline to run when the file defines several. */
  readonly pipelineName?: string
  /** Event fields given as flags. */
  readonly event: CliEventOverrides
  /** Step executor. */
  readonly executor: CliExecutorKind
  /** Container runtime binary for the container executor. */
  readonly containerRuntime?: string
  /** Optional YAML or JSON secrets file. */
  readonly secretsFile?: string
  /** Per-step timeout in milliseconds. */
  readonly stepTimeoutMs?: number
  /** Selected output format. */
  readonly format: CliOutputFormat
  /** Emits full output for successful steps when true. */
  readonly verbose: boolean
  /** Keeps running after a halting step failure when true. */
  readonly continueOnError: boolean
  /** Prints which steps would run and exits when true. */
  readonly plan: boolean
  /** Prints the pipelines of the file and exits when true. */
  readonly listPipelines: boolean
  /** Prints usage and exits when true. */
  readonly help: boolean
}

const VALUE_OPTIONS = [
  '--config',
  '--pipeline',
  '--event',
  '--branch',
  '--tag',
  '--ref',
  '--repo',
  '--commit',
  '--executor',
  '--container-runtime',
  '--secrets-file',
  '--step-timeout',
  '--format',
  '--cwd',
] as const

type ValueOption = (typeof VALUE_OPTIONS)[number]

const VALUE_OPTION_NAMES: ReadonlySet<string> = new Set(VALUE_OPTIONS)

const isValueOption = (value: string): value is ValueOption => {
  return VALUE_OPTION_NAMES.has(value)
}

interface MutableCliOptions {
  cwd: string
  configPath?: string
  pipelineName?: string
  event: {
    eventKind?: PipelineEventKind
    branch?: string
    tag?: string
    ref?: string
    repoSlug?: string
    commit?: string
  }
  executor: CliExecutorKind
  containerRuntime?: string
  secretsFile?: string
  stepTimeoutMs?: number
  format: CliOutputFormat
  verbose: boolean
  continueOnError: boolean
  plan: boolean
  listPipelines: boolean
  help: boolean
}

/**
 * Parses process arguments for the relayci CLI.
 *
 * Value options accept both `--name value` and `--name=value`.
 *
 * @param argv Raw argument list excluding node and script path.
 * @param baseCwd Base working directory.
 * @returns Parsed CLI options.
 * @throws CliUsageError when an argument is invalid.
 */
export const parseCliOptions = (argv: readonly string[], baseCwd: string): CliOptions => {
  const options: MutableCliOptions = {
    cwd: baseCwd,
    event: {},
    executor: 'shell',
    format: 'pretty',
    verbose: false,
    continueOnError: false,
    plan: false,
    listPipelines: false,
    help: false,
  }

  for (let index = 0; index < argv.length; index += 1) {
    const argument = argv[index]
    if (!argument) {
      continue
    }

    if (argument === '--help' || argument === '-h') {
      options.help = true
      continue
    }

    if (argument === '--verbose') {
      options.verbose = true
      continue
    }

    if (argument === '--continue-on-error') {
      options.continueOnError = true
      continue
    }

    if (argument === '--plan') {
      options.plan = true
      continue
    }

    if (argument === '--list-pipelines') {
      options.listPipelines = true
      continue
    }

    const separatorIndex = argument.indexOf('=')
    const name = separatorIndex === -1 ? argument : argument.slice(0, separatorIndex)
    if (!argument.startsWith('--') || !isValueOption(name)) {
      throw new CliUsageError(`Unknown argument: ${argument}`)
    }

    let value: string | undefined
    if (separatorIndex === -1) {
      value = argv[index + 1]
      index += 1
    } else {
      value = argument.slice(separatorIndex + 1)
    }

    if (!value) {
      throw new CliUsageError(`${name} requires a value`)
    }

    applyValueOption(options, name, value, baseCwd)
  }

  return {
    cwd: options.cwd,
    ...(options.configPath ? { configPath: options.configPath } : {}),
    ...(options.pipelineName ? { pipelineName: options.pipelineName } : {}),
    event: options.event,
    executor: options.executor,
    ...(options.containerRuntime ? { containerRuntime: options.containerRuntime } : {}),
    ...(options.secretsFile ? { secretsFile: options.secretsFile } : {}),
    ...(options.stepTimeoutMs !== undefined ? { stepTimeoutMs: options.stepTimeoutMs } : {}),
    format: options.format,
    verbose: options.verbose,
    continueOnError: options.continueOnError,
    plan: options.plan,
    listPipelines: options.listPipelines,
    help: options.help,
  }
}

const applyValueOption = (
  options: MutableCliOptions,
  name: ValueOption,
  value: string,
  baseCwd: string
): void => {
  switch (name) {
    case '--config':
      options.configPath = value
      return
    case '--pipeline':
      options.pipelineName = value
      return
    case '--event':
      if (!isPipelineEventKind(value)) {
        throw new CliUsageError(
          `--event must be one of: ${PIPELINE_EVENT_KINDS.join(', ')}`
        )
      }
      options.event.eventKind = value
      return
    case '--branch':
      options.event.branch = value
      return
    case '--tag':
      options.event.tag = value
      return
    case '--ref':
      options.event.ref = value
      return
    case '--repo':
      options.event.repoSlug = value
      return
    case '--commit':
      options.event.commit = value
      return
    case '--executor':
      if (value !== 'shell' && value !== 'container') {
        throw new CliUsageError('--executor must be "shell" or "container"')
      }
      options.executor = value
      return
    case '--container-runtime':
      options.containerRuntime = value
      return
    case '--secrets-file':
      options.secretsFile = value
      return
    case '--step-timeout': {
      const timeoutMs = Number(value)
      if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
        throw new CliUsageError('--step-timeout must be a positive number of milliseconds')
      }
      options.stepTimeoutMs = timeoutMs
      return
    }
    case '--format':
      if (value !== 'pretty' && value !== 'json') {
        throw new CliUsageError('--format must be "pretty" or "json"')
      }
      options.format = value
      return
    case '--cwd':
      options.cwd = resolve(baseCwd, value)
      return
  }
}

/**
 * Returns help text for the relayci CLI.
 *
 * @returns Human-readable usage text.
 */
export const getCliHelpText = (): string => {
  return [
    'Usage: relayci [options]',
    '',
    'Options:',
    '  --config <path>            Pipeline file (default: pipeline.yml, pipeline.yaml,',
    '                             pipeline.json or pipeline.config.ts)',
    '  --pipeline <name>          Pipeline to run when the file defines several',
    `  --event <kind>             Event kind: ${PIPELINE_EVENT_KINDS.join(' | ')}`,
    '  --branch <name>            Branch of the event (default: main)',
    '  --tag <name>               Tag of the event; implies --event tag',
    '  --ref <ref>                Full git ref (default: derived from branch or tag)',
    '  --repo <owner/name>        Repository slug',
    '  --commit <sha>             Commit of the event',
    '  --executor <type>          Step executor: shell | container (default: shell)',
    '  --container-runtime <bin>  Container runtime binary (default: docker)',
    '  --secrets-file <path>      YAML or JSON file mapping secret names to values',
    '  --step-timeout <ms>        Kill steps running longer than this',
    '  --format <type>            Output format: pretty | json (default: pretty)',
    '  --verbose                  Show stdout/stderr for successful steps',
    '  --continue-on-error        Keep running steps after a failure',
    '  --plan                     Print which steps would run and exit',
    '  --list-pipelines           Print the pipelines of the file and exit',
    '  --cwd <path>               Base working directory',
    '  -h, --help                 Show this help',
    '',
    'Event fields not given as options are read from RELAYCI_EVENT, RELAYCI_BRANCH,',
    'RELAYCI_TAG, RELAYCI_REF, RELAYCI_REPO and RELAYCI_COMMIT. Secrets not found in',
    'the secrets file are read from RELAYCI_SECRET_<NAME>.',
  ].join('\n')
}
