import type { Predicate } from './predicate.js'
import type { PipelineStep } from './step.js'

/**
 * Loaded pipeline definition. Read-only for the duration of a run.
 */
export interface Pipeline {
  /** Document kind, always `pipeline`. */
  readonly kind: 'pipeline'
  /** Runner type declared by the document, for example `docker`. */
  readonly type: string
  /** Pipeline name. */
  readonly name: string
  /** Steps in declaration order. */
  readonly steps: readonly PipelineStep[]
  /** Gate deciding whether the pipeline runs at all. */
  readonly trigger: Predicate
}
