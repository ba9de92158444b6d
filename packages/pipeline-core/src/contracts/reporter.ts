import type { PipelineEvent } from './event.js'
import type { Pipeline } from './pipeline.js'
import type { RunReport, StepResult } from './run.js'
import type { PipelineStep } from './step.js'

/**
 * Event hooks for pipeline run reporting.
 */
export interface PipelineReporter {
  /**
   * Called once before any step is evaluated.
   *
   * @param pipeline Pipeline about to run.
   * @param event Event the run is evaluated against.
   */
  onPipelineStart?(pipeline: Pipeline, event: PipelineEvent): Promise<void> | void

  /**
   * Called before a step's executor is invoked. Not called for skipped steps.
   *
   * @param step Step definition.
   * @param index Zero-based step index.
   */
  onStepStart?(step: PipelineStep, index: number): Promise<void> | void

  /**
   * Called after every declared step has a result, including skipped ones.
   *
   * @param result Step result.
   * @param index Zero-based step index.
   */
  onStepComplete?(result: StepResult, index: number): Promise<void> | void

  /**
   * Called once after the run finishes, also when the trigger did not match.
   *
   * @param report Final run report.
   */
  onPipelineComplete?(report: RunReport): Promise<void> | void
}
