export type {
  CliEventOverrides,
  CliExecutorKind,
  CliOptions,
  CliOutputFormat,
} from './cliOptions.js'
export { CliUsageError, getCliHelpText, parseCliOptions } from './cliOptions.js'

export type { LoadedPipelineSource } from './config/loadPipelineSource.js'
export { loadPipelineSource, PIPELINE_FILE_CANDIDATES } from './config/loadPipelineSource.js'
export { loadSecretsFile } from './config/loadSecretsFile.js'
export { resolvePipelineEvent } from './config/resolveEvent.js'

export type { PrettyReporterOptions } from './reporters/prettyReporter.js'
export { PrettyReporter } from './reporters/prettyReporter.js'

export type { RunCliPipelineOptions } from './runPipeline.js'
export { runCliPipeline } from './runPipeline.js'
