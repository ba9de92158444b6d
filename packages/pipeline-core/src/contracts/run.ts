import type { PipelineEvent } from './event.js'
import type { StepExecutor } from './executor.js'
import type { PipelineReporter } from './reporter.js'
import type { SecretProvider } from './secrets.js'

/**
 * Terminal status of a pipeline step.
 */
export type StepStatus = 'skipped' | 'succeeded' | 'failed'

/**
 * Reason assigned to skipped or failed step results.
 */
export type StepResultReason =
  | 'condition_not_met'
  | 'pipeline_halted'
  | 'secret_missing'
  | 'command_failed'
  | 'command_timeout'
  | 'executor_error'

/**
 * Captured executor output for one step.
 */
export interface StepOutput {
  /** Captured stdout content with secret values masked. */
  readonly stdout: string
  /** Captured stderr content with secret values masked. */
  readonly stderr: string
}

/**
 * Serializable error summary attached to a failed step.
 */
export interface StepErrorSummary {
  /** Error class name, for example `ExecutorError`. */
  readonly name: string
  /** Error message with secret values masked. */
  readonly message: string
}

/**
 * Outcome of one declared step.
 */
export interface StepResult {
  /** Step name copied from the definition. */
  readonly stepName: string
  /** Executor image copied from the definition. */
  readonly image: string
  /** Final status. */
  readonly status: StepStatus
  /** Reason for skipped and failed outcomes. */
  readonly reason?: StepResultReason
  /** Process exit code when the executor ran to completion. */
  readonly exitCode?: number
  /** Error summary for failures raised before or during invocation. */
  readonly error?: StepErrorSummary
  /** True when the step failed under `failure: ignore`. */
  readonly failureIgnored?: true
  /** Step start timestamp in Unix milliseconds. */
  readonly startedAt: number
  /** Step finish timestamp in Unix milliseconds. */
  readonly finishedAt: number
  /** Step duration in milliseconds. */
  readonly durationMs: number
  /** Captured output, empty for steps that never ran. */
  readonly output: StepOutput
}

/**
 * Overall status of a pipeline run.
 */
export type RunStatus = 'succeeded' | 'failed' | 'skipped'

/**
 * Summary counts for one pipeline run.
 */
export interface RunSummary {
  /** Number of declared steps. */
  readonly total: number
  /** Number of succeeded steps. */
  readonly succeeded: number
  /** Number of failed steps. */
  readonly failed: number
  /** Number of skipped steps. */
  readonly skipped: number
  /** Total run duration in milliseconds. */
  readonly durationMs: number
}

/**
 * Ordered collection of step outcomes produced by one run.
 */
export interface RunReport {
  /** Name of the pipeline that ran. */
  readonly pipelineName: string
  /** Overall status. */
  readonly status: RunStatus
  /** False when the pipeline trigger did not match the event. */
  readonly triggered: boolean
  /** Event the run was evaluated against. */
  readonly event: PipelineEvent
  /** Step results in declaration order. */
  readonly steps: readonly StepResult[]
  /** Aggregated counts. */
  readonly summary: RunSummary
  /** Process-style exit code derived from the status. */
  readonly exitCode: 0 | 1
  /** Run start timestamp in Unix milliseconds. */
  readonly startedAt: number
  /** Run finish timestamp in Unix milliseconds. */
  readonly finishedAt: number
}

/**
 * Options for the pipeline runner.
 */
export interface PipelineRunnerOptions {
  /** Executor every matching step is delegated to. */
  readonly executor: StepExecutor
  /** Secret store consulted at invocation time. */
  readonly secrets: SecretProvider
  /** Optional reporters for lifecycle hooks. */
  readonly reporters?: readonly PipelineReporter[]
  /** Workspace directory shared by all steps. */
  readonly cwd?: string
  /** Base environment merged into each step execution. */
  readonly env?: Readonly<Record<string, string>>
  /** Keeps running after a halting failure when true. */
  readonly continueOnError?: boolean
  /** Timeout applied to every step invocation. */
  readonly stepTimeoutMs?: number
  /** Time source injection for deterministic tests. */
  readonly now?: () => number
}

/**
 * Dry-run entry for one step.
 */
export interface PlannedStep {
  /** Step name. */
  readonly stepName: string
  /** Executor image. */
  readonly image: string
  /** True when the step condition matches the event. */
  readonly willRun: boolean
  /** Human-readable condition. */
  readonly condition: string
}

/**
 * Dry-run result for one pipeline and event.
 */
export interface PipelinePlan {
  /** Pipeline name. */
  readonly pipelineName: string
  /** True when the trigger matches the event. */
  readonly triggered: boolean
  /** Human-readable trigger. */
  readonly trigger: string
  /** Steps in declaration order. */
  readonly steps: readonly PlannedStep[]
}
