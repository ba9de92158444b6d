import {
  ConfigError,
  createPipelineEvent,
  isPipelineEventKind,
  PIPELINE_EVENT_KINDS,
  type PipelineEvent,
  type PipelineEventKind,
} from '@relayci/pipeline-core'

import type { CliEventOverrides } from '../cliOptions.js'

const DEFAULT_BRANCH = 'main'

/**
 * Builds the run event from CLI flags, falling back to `RELAYCI_EVENT`,
 * `RELAYCI_BRANCH`, `RELAYCI_TAG`, `RELAYCI_REF`, `RELAYCI_REPO` and
 * `RELAYCI_COMMIT`.
 *
 * The event kind defaults to `tag` when a tag is known and to `push`
 * otherwise. The branch defaults to `main` except for tag events.
 *
 * @param overrides Event fields given as flags.
 * @param env Environment to read fallbacks from.
 * @returns Frozen pipeline event.
 * @throws ConfigError when `RELAYCI_EVENT` is unknown or a tag event has no tag.
 */
export const resolvePipelineEvent = (
  overrides: CliEventOverrides,
  env: Readonly<Record<string, string | undefined>>
): PipelineEvent => {
  const tag = overrides.tag ?? readVariable(env, 'RELAYCI_TAG')
  const eventKind = overrides.eventKind ?? parseEventKind(readVariable(env, 'RELAYCI_EVENT'), tag)
  const branch =
    overrides.branch ??
    readVariable(env, 'RELAYCI_BRANCH') ??
    (eventKind === 'tag' ? '' : DEFAULT_BRANCH)

  return createPipelineEvent({
    eventKind,
    branch,
    tag,
    ref: overrides.ref ?? readVariable(env, 'RELAYCI_REF'),
    repoSlug: overrides.repoSlug ?? readVariable(env, 'RELAYCI_REPO'),
    commit: overrides.commit ?? readVariable(env, 'RELAYCI_COMMIT'),
  })
}

const parseEventKind = (value: string | undefined, tag: string | undefined): PipelineEventKind => {
  if (value === undefined) {
    return tag ? 'tag' : 'push'
  }

  if (!isPipelineEventKind(value)) {
    throw new ConfigError(`RELAYCI_EVENT must be one of: ${PIPELINE_EVENT_KINDS.join(', ')}`)
  }

  return value
}

const readVariable = (
  env: Readonly<Record<string, string | undefined>>,
  name: string
): string | undefined => {
  const value = env[name]
  return value ? value : undefined
}
