import type { PipelineEvent, PipelineEventInput } from '../contracts/event.js'
import { ConfigError } from '../errors/pipelineErrors.js'

/**
 * Creates a frozen pipeline event, deriving the ref when it is not given.
 *
 * @param input Event fields.
 * @returns Immutable event.
 * @throws ConfigError when a tag event has no tag name.
 */
export const createPipelineEvent = (input: PipelineEventInput): PipelineEvent => {
  if (input.eventKind === 'tag' && !input.tag) {
    throw new ConfigError('A tag event requires a tag name')
  }

  const branch = input.branch ?? ''
  const ref = input.ref ?? (input.tag ? `refs/tags/${input.tag}` : `refs/heads/${branch}`)

  return Object.freeze({
    eventKind: input.eventKind,
    branch,
    ...(input.tag ? { tag: input.tag } : {}),
    ref,
    repoSlug: input.repoSlug ?? '',
    ...(input.commit ? { commit: input.commit } : {}),
  })
}
