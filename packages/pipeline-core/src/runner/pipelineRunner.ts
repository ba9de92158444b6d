import type { PipelineEvent } from '../contracts/event.js'
import type { StepExecutionOutcome, StepExecutionRequest } from '../contracts/executor.js'
import type { Pipeline } from '../contracts/pipeline.js'
import type {
  PipelineRunnerOptions,
  RunReport,
  RunSummary,
  StepErrorSummary,
  StepResult,
  StepResultReason,
  StepStatus,
} from '../contracts/run.js'
import {
  isSecretReference,
  type PipelineStep,
  type ResolvedSettingValue,
  type SettingValue,
} from '../contracts/step.js'
import { ExecutorError, SecretResolutionError } from '../errors/pipelineErrors.js'
import { encodeSettingValue } from '../execution/pluginEnvironment.js'
import { evaluatePredicate } from '../predicates/evaluatePredicate.js'

import { buildRunVariables, maskSecrets, substituteVariables } from './runVariables.js'

type RunVariables = Readonly<Record<string, string>>

/**
 * Sequential, fail-fast pipeline execution engine.
 */
export class PipelineRunner {
  private readonly options: Required<Pick<PipelineRunnerOptions, 'continueOnError' | 'now'>> &
    Omit<PipelineRunnerOptions, 'continueOnError' | 'now'>

  /**
   * Creates a pipeline runner.
   *
   * @param options Runtime options.
   */
  public constructor(options: PipelineRunnerOptions) {
    this.options = {
      ...options,
      continueOnError: options.continueOnError ?? false,
      now: options.now ?? Date.now,
    }
  }

  /**
   * Runs a pipeline for one event.
   *
   * Steps run strictly one at a time in declaration order. A step whose
   * condition does not match is skipped without invoking the executor. After
   * a halting failure every remaining step is skipped.
   *
   * @param pipeline Loaded pipeline.
   * @param event Run event.
   * @returns Final run report.
   */
  public async run(pipeline: Pipeline, event: PipelineEvent): Promise<RunReport> {
    const runStartedAt = this.options.now()
    const stepResults: StepResult[] = []

    await this.emitPipelineStart(pipeline, event)

    if (!evaluatePredicate(pipeline.trigger, event)) {
      return await this.complete(pipeline, event, false, stepResults, runStartedAt)
    }

    const variables: RunVariables = {
      ...this.options.env,
      ...buildRunVariables(pipeline, event),
    }
    let halted = false

    for (const [index, step] of pipeline.steps.entries()) {
      let stepResult: StepResult

      if (halted) {
        stepResult = this.buildSkippedResult(step, 'pipeline_halted')
      } else if (!evaluatePredicate(step.condition, event)) {
        stepResult = this.buildSkippedResult(step, 'condition_not_met')
      } else {
        await this.emitStepStart(step, index)
        stepResult = await this.executeStep(step, variables)

        if (stepResult.status === 'failed') {
          if (step.failure === 'ignore') {
            stepResult = { ...stepResult, failureIgnored: true }
          } else if (!this.options.continueOnError) {
            halted = true
          }
        }
      }

      stepResults.push(stepResult)
      await this.emitStepComplete(stepResult, index)
    }

    return await this.complete(pipeline, event, true, stepResults, runStartedAt)
  }

  private async complete(
    pipeline: Pipeline,
    event: PipelineEvent,
    triggered: boolean,
    stepResults: readonly StepResult[],
    runStartedAt: number
  ): Promise<RunReport> {
    const runFinishedAt = this.options.now()
    const summary = buildSummary(stepResults, runFinishedAt - runStartedAt)
    const hasHardFailure = stepResults.some(
      (result) => result.status === 'failed' && !result.failureIgnored
    )
    const status = !triggered ? 'skipped' : hasHardFailure ? 'failed' : 'succeeded'

    const report: RunReport = {
      pipelineName: pipeline.name,
      status,
      triggered,
      event,
      steps: stepResults,
      summary,
      exitCode: status === 'failed' ? 1 : 0,
      startedAt: runStartedAt,
      finishedAt: runFinishedAt,
    }

    await this.emitPipelineComplete(report)

    return report
  }

  private async executeStep(step: PipelineStep, variables: RunVariables): Promise<StepResult> {
    const startedAt = this.options.now()

    let secrets: ReadonlyMap<string, string>
    try {
      secrets = await this.resolveSecrets(step)
    } catch (error: unknown) {
      const secretError =
        error instanceof SecretResolutionError
          ? error
          : new SecretResolutionError(step.name, '<unknown>', { cause: error })
      return this.buildStepResult({
        step,
        status: 'failed',
        reason: 'secret_missing',
        startedAt,
        error: summarizeError(secretError),
      })
    }

    const mask = (text: string): string => maskSecrets(text, secrets.values())
    const request: StepExecutionRequest = {
      stepName: step.name,
      image: substituteVariables(step.executor.image, variables),
      commands: step.commands,
      settings: resolveSettings(step.settings, secrets, variables),
      environment: {
        ...variables,
        ...encodeEnvironment(resolveSettings(step.environment, secrets, variables)),
      },
      secrets,
      cwd: this.options.cwd ?? process.cwd(),
      timeoutMs: this.options.stepTimeoutMs,
    }

    let outcome: StepExecutionOutcome
    try {
      outcome = await this.options.executor.execute(request)
    } catch (error: unknown) {
      const executorError = new ExecutorError(describeCause(error), step.name, { cause: error })
      return this.buildStepResult({
        step,
        status: 'failed',
        reason: 'executor_error',
        startedAt,
        error: summarizeError(executorError, mask),
      })
    }

    const output = { stdout: mask(outcome.stdout), stderr: mask(outcome.stderr) }

    if (outcome.error !== undefined) {
      const executorError = new ExecutorError(describeCause(outcome.error), step.name, {
        cause: outcome.error,
      })
      return this.buildStepResult({
        step,
        status: 'failed',
        reason: 'executor_error',
        startedAt,
        output,
        error: summarizeError(executorError, mask),
      })
    }

    if (outcome.timedOut) {
      const executorError = new ExecutorError(
        `Step "${step.name}" timed out after ${request.timeoutMs ?? 0}ms`,
        step.name
      )
      return this.buildStepResult({
        step,
        status: 'failed',
        reason: 'command_timeout',
        startedAt,
        output,
        error: summarizeError(executorError),
      })
    }

    if (outcome.exitCode === 0) {
      return this.buildStepResult({
        step,
        status: 'succeeded',
        startedAt,
        exitCode: 0,
        output,
      })
    }

    return this.buildStepResult({
      step,
      status: 'failed',
      reason: 'command_failed',
      startedAt,
      exitCode: outcome.exitCode ?? undefined,
      output,
    })
  }

  private async resolveSecrets(step: PipelineStep): Promise<ReadonlyMap<string, string>> {
    const secretNames = new Set<string>()
    collectSecretNames(Object.values(step.settings), secretNames)
    collectSecretNames(Object.values(step.environment), secretNames)

    const secrets = new Map<string, string>()
    for (const secretName of secretNames) {
      let value: string | undefined
      try {
        value = await this.options.secrets.resolve(secretName)
      } catch (error: unknown) {
        throw new SecretResolutionError(step.name, secretName, { cause: error })
      }

      if (value === undefined) {
        throw new SecretResolutionError(step.name, secretName)
      }
      secrets.set(secretName, value)
    }

    return secrets
  }

  private buildSkippedResult(step: PipelineStep, reason: StepResultReason): StepResult {
    const timestamp = this.options.now()

    return {
      stepName: step.name,
      image: step.executor.image,
      status: 'skipped',
      reason,
      startedAt: timestamp,
      finishedAt: timestamp,
      durationMs: 0,
      output: { stdout: '', stderr: '' },
    }
  }

  private buildStepResult(input: {
    step: PipelineStep
    status: StepStatus
    reason?: StepResultReason
    startedAt: number
    exitCode?: number
    output?: StepResult['output']
    error?: StepErrorSummary
  }): StepResult {
    const finishedAt = this.options.now()

    return {
      stepName: input.step.name,
      image: input.step.executor.image,
      status: input.status,
      ...(input.reason ? { reason: input.reason } : {}),
      ...(input.exitCode !== undefined ? { exitCode: input.exitCode } : {}),
      ...(input.error ? { error: input.error } : {}),
      startedAt: input.startedAt,
      finishedAt,
      durationMs: finishedAt - input.startedAt,
      output: input.output ?? { stdout: '', stderr: '' },
    }
  }

  private async emitPipelineStart(pipeline: Pipeline, event: PipelineEvent): Promise<void> {
    const reporters = this.options.reporters ?? []
    for (const reporter of reporters) {
      await reporter.onPipelineStart?.(pipeline, event)
    }
  }

  private async emitStepStart(step: PipelineStep, index: number): Promise<void> {
    const reporters = this.options.reporters ?? []
    for (const reporter of reporters) {
      await reporter.onStepStart?.(step, index)
    }
  }

  private async emitStepComplete(result: StepResult, index: number): Promise<void> {
    const reporters = this.options.reporters ?? []
    for (const reporter of reporters) {
      await reporter.onStepComplete?.(result, index)
    }
  }

  private async emitPipelineComplete(report: RunReport): Promise<void> {
    const reporters = this.options.reporters ?? []
    for (const reporter of reporters) {
      await reporter.onPipelineComplete?.(report)
    }
  }
}

/**
 * Creates a pipeline runner instance.
 *
 * @param options Runtime options.
 * @returns Pipeline runner.
 */
export const createPipelineRunner = (options: PipelineRunnerOptions): PipelineRunner => {
  return new PipelineRunner(options)
}

/**
 * Runs a pipeline once with a throwaway runner.
 *
 * @param pipeline Loaded pipeline.
 * @param event Run event.
 * @param options Runtime options.
 * @returns Final run report.
 */
export const runPipeline = async (
  pipeline: Pipeline,
  event: PipelineEvent,
  options: PipelineRunnerOptions
): Promise<RunReport> => {
  return await createPipelineRunner(options).run(pipeline, event)
}

const collectSecretNames = (values: readonly SettingValue[], names: Set<string>): void => {
  for (const value of values) {
    if (value === null || typeof value !== 'object') {
      continue
    }

    if (isSecretReference(value)) {
      names.add(value.fromSecret)
      continue
    }

    collectSecretNames(isSettingList(value) ? value : Object.values(value), names)
  }
}

const resolveSettings = (
  settings: Readonly<Record<string, SettingValue>>,
  secrets: ReadonlyMap<string, string>,
  variables: RunVariables
): Record<string, ResolvedSettingValue> => {
  const resolved: Record<string, ResolvedSettingValue> = {}
  for (const [key, value] of Object.entries(settings)) {
    resolved[key] = resolveSettingValue(value, secrets, variables)
  }

  return resolved
}

const resolveSettingValue = (
  value: SettingValue,
  secrets: ReadonlyMap<string, string>,
  variables: RunVariables
): ResolvedSettingValue => {
  if (typeof value === 'string') {
    return substituteVariables(value, variables)
  }

  if (value === null || typeof value !== 'object') {
    return value
  }

  if (isSecretReference(value)) {
    return secrets.get(value.fromSecret) ?? ''
  }

  if (isSettingList(value)) {
    return value.map((entry) => resolveSettingValue(entry, secrets, variables))
  }

  return resolveSettings(value, secrets, variables)
}

const encodeEnvironment = (
  environment: Readonly<Record<string, ResolvedSettingValue>>
): Record<string, string> => {
  const encoded: Record<string, string> = {}
  for (const [key, value] of Object.entries(environment)) {
    const encodedValue = encodeSettingValue(value)
    if (encodedValue !== undefined) {
      encoded[key] = encodedValue
    }
  }

  return encoded
}

const isSettingList = (value: SettingValue): value is readonly SettingValue[] => {
  return Array.isArray(value)
}

const buildSummary = (stepResults: readonly StepResult[], durationMs: number): RunSummary => {
  const succeeded = stepResults.filter((result) => result.status === 'succeeded').length
  const failed = stepResults.filter((result) => result.status === 'failed').length
  const skipped = stepResults.filter((result) => result.status === 'skipped').length

  return {
    total: stepResults.length,
    succeeded,
    failed,
    skipped,
    durationMs,
  }
}

const summarizeError = (
  error: Error,
  mask: (text: string) => string = (text) => text
): StepErrorSummary => {
  return {
    name: error.name,
    message: mask(error.message),
  }
}

const describeCause = (error: unknown): string => {
  return error instanceof Error ? error.message : String(error)
}
