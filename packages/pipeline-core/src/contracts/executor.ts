import type { ResolvedSettingValue } from './step.js'

/**
 * Input contract for one step invocation.
 */
export interface StepExecutionRequest {
  /** Name of the step being executed. */
  readonly stepName: string
  /** Container image or tool reference. */
  readonly image: string
  /** Shell commands, empty for plugin steps. */
  readonly commands: readonly string[]
  /** Settings with secret references already resolved. */
  readonly settings: Readonly<Record<string, ResolvedSettingValue>>
  /** Environment for the step: run variables plus resolved step environment. */
  readonly environment: Readonly<Record<string, string>>
  /** Secret values resolved for this step, keyed by secret name. */
  readonly secrets: ReadonlyMap<string, string>
  /** Workspace directory shared by all steps. */
  readonly cwd: string
  /** Optional process timeout in milliseconds. */
  readonly timeoutMs?: number
}

/**
 * Output contract from one step invocation.
 */
export interface StepExecutionOutcome {
  /** Exit code returned by the process, or null when unavailable. */
  readonly exitCode: number | null
  /** Termination signal if the process ended by signal. */
  readonly signal: NodeJS.Signals | null
  /** Captured stdout content. */
  readonly stdout: string
  /** Captured stderr content. */
  readonly stderr: string
  /** True when the invocation reached the timeout handling path. */
  readonly timedOut: boolean
  /** Total invocation duration in milliseconds. */
  readonly durationMs: number
  /** Original error object for spawn-level failures. */
  readonly error?: unknown
}

/**
 * External tool abstraction each matching step is delegated to.
 */
export interface StepExecutor {
  /**
   * Runs one step and captures its exit status.
   *
   * @param request Execution input data.
   * @returns Execution outcome.
   */
  execute(request: StepExecutionRequest): Promise<StepExecutionOutcome>
}
