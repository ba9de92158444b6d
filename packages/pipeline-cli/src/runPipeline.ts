import { resolve } from 'node:path'

import {
  createChainedSecretProvider,
  createContainerStepExecutor,
  createEnvSecretProvider,
  createPipelineRunner,
  createShellStepExecutor,
  createStaticSecretProvider,
  formatPipelinePlanAsJson,
  formatRunReportAsJson,
  planPipeline,
  selectPipeline,
  type Pipeline,
  type PipelinePlan,
  type SecretProvider,
  type StepExecutor,
} from '@relayci/pipeline-core'

import type { CliEventOverrides, CliExecutorKind, CliOutputFormat } from './cliOptions.js'
import { loadPipelineSource } from './config/loadPipelineSource.js'
import { loadSecretsFile } from './config/loadSecretsFile.js'
import { resolvePipelineEvent } from './config/resolveEvent.js'
import { colorize, PrettyReporter } from './reporters/prettyReporter.js'

/**
 * Runtime options for a CLI execution.
 */
export interface RunCliPipelineOptions {
  /** Base working directory. */
  readonly cwd: string
  /** Optional explicit pipeline file path. */
  readonly configPath?: string
  /** Pipeline to run when the file defines several. */
  readonly pipelineName?: string
  /** Event fields given as flags. */
  readonly event: CliEventOverrides
  /** Step executor. */
  readonly executor: CliExecutorKind
  /** Container runtime binary. */
  readonly containerRuntime?: string
  /** Optional secrets file path, relative to `cwd`. */
  readonly secretsFile?: string
  /** Per-step timeout in milliseconds. */
  readonly stepTimeoutMs?: number
  /** Output format selection. */
  readonly format: CliOutputFormat
  /** Verbose output mode. */
  readonly verbose: boolean
  /** Keeps running after a halting failure. */
  readonly continueOnError: boolean
  /** Prints the plan instead of running. */
  readonly plan: boolean
  /** Prints the pipelines of the file instead of running. */
  readonly listPipelines: boolean
  /** Environment for event and secret fallbacks. Defaults to `process.env`. */
  readonly env?: Readonly<Record<string, string | undefined>>
}

/**
 * Executes a pipeline according to CLI options.
 *
 * @param options CLI runtime options.
 * @returns Final exit code.
 */
export const runCliPipeline = async (options: RunCliPipelineOptions): Promise<number> => {
  const env = options.env ?? process.env
  const source = await loadPipelineSource(options.cwd, options.configPath)

  if (options.listPipelines) {
    printPipelines(source.pipelines, options.format)
    return 0
  }

  const pipeline = selectPipeline(source.pipelines, options.pipelineName)
  const event = resolvePipelineEvent(options.event, env)

  if (options.plan) {
    const plan = planPipeline(pipeline, event)
    if (options.format === 'json') {
      process.stdout.write(`${formatPipelinePlanAsJson(plan)}\n`)
    } else {
      printPlan(plan)
    }
    return 0
  }

  const runner = createPipelineRunner({
    executor: createStepExecutor(options.executor, options.containerRuntime),
    secrets: await createSecretProvider(options.cwd, options.secretsFile, env),
    reporters: options.format === 'pretty' ? [new PrettyReporter({ verbose: options.verbose })] : [],
    cwd: options.cwd,
    continueOnError: options.continueOnError,
    stepTimeoutMs: options.stepTimeoutMs,
  })

  const report = await runner.run(pipeline, event)
  if (options.format === 'json') {
    process.stdout.write(`${formatRunReportAsJson(report)}\n`)
  }

  return report.exitCode
}

const createStepExecutor = (
  kind: CliExecutorKind,
  containerRuntime: string | undefined
): StepExecutor => {
  if (kind === 'container') {
    return createContainerStepExecutor({ runtime: containerRuntime })
  }

  return createShellStepExecutor()
}

const createSecretProvider = async (
  cwd: string,
  secretsFile: string | undefined,
  env: Readonly<Record<string, string | undefined>>
): Promise<SecretProvider> => {
  const providers: SecretProvider[] = []

  if (secretsFile) {
    providers.push(createStaticSecretProvider(await loadSecretsFile(resolve(cwd, secretsFile))))
  }
  providers.push(createEnvSecretProvider(env))

  return createChainedSecretProvider(providers)
}

const printPipelines = (pipelines: readonly Pipeline[], format: CliOutputFormat): void => {
  if (format === 'json') {
    const payload = {
      pipelines: pipelines.map((pipeline) => ({
        name: pipeline.name,
        type: pipeline.type,
        steps: pipeline.steps.map((step) => step.name),
      })),
    }
    process.stdout.write(`${JSON.stringify(payload)}\n`)
    return
  }

  process.stdout.write('Configured pipelines:\n')
  for (const pipeline of pipelines) {
    process.stdout.write(`- ${pipeline.name} (${pipeline.steps.length} steps)\n`)
  }
}

const printPlan = (plan: PipelinePlan): void => {
  if (!plan.triggered) {
    process.stdout.write(
      colorize(`Pipeline ${plan.pipelineName} is not triggered (${plan.trigger})\n`, 'yellow')
    )
  } else {
    process.stdout.write(`Pipeline ${plan.pipelineName} (${plan.trigger})\n`)
  }

  for (const step of plan.steps) {
    const line = `${step.willRun ? 'run ' : 'skip'} ${step.stepName} [${step.condition}]\n`
    process.stdout.write(step.willRun ? colorize(line, 'green') : line)
  }
}
