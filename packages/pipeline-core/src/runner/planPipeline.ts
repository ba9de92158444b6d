import type { PipelineEvent } from '../contracts/event.js'
import type { Pipeline } from '../contracts/pipeline.js'
import type { PipelinePlan } from '../contracts/run.js'
import { describePredicate, evaluatePredicate } from '../predicates/evaluatePredicate.js'

/**
 * Evaluates a pipeline's trigger and step conditions without running anything.
 *
 * Steps of an untriggered pipeline are all reported as not running.
 *
 * @param pipeline Loaded pipeline.
 * @param event Run event.
 * @returns Dry-run plan in declaration order.
 */
export const planPipeline = (pipeline: Pipeline, event: PipelineEvent): PipelinePlan => {
  const triggered = evaluatePredicate(pipeline.trigger, event)

  return {
    pipelineName: pipeline.name,
    triggered,
    trigger: describePredicate(pipeline.trigger),
    steps: pipeline.steps.map((step) => ({
      stepName: step.name,
      image: step.executor.image,
      willRun: triggered && evaluatePredicate(step.condition, event),
      condition: describePredicate(step.condition),
    })),
  }
}
