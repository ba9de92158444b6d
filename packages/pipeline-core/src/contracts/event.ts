/**
 * Event kinds a pipeline can be started for.
 */
export const PIPELINE_EVENT_KINDS = [
  'push',
  'tag',
  'pull_request',
  'promote',
  'rollback',
  'cron',
  'custom',
] as const

/**
 * Kind of repository event that started a run.
 */
export type PipelineEventKind = (typeof PIPELINE_EVENT_KINDS)[number]

/**
 * Immutable description of the event a pipeline runs for.
 */
export interface PipelineEvent {
  /** Event kind. */
  readonly eventKind: PipelineEventKind
  /** Branch name, empty for tag events without a branch. */
  readonly branch: string
  /** Tag name for tag events. */
  readonly tag?: string
  /** Full git ref, for example `refs/heads/master` or `refs/tags/v1.0.0`. */
  readonly ref: string
  /** Repository slug in `owner/name` form. */
  readonly repoSlug: string
  /** Commit sha when known. */
  readonly commit?: string
}

/**
 * Input accepted by {@link createPipelineEvent}.
 */
export interface PipelineEventInput {
  readonly eventKind: PipelineEventKind
  readonly branch?: string
  readonly tag?: string
  readonly ref?: string
  readonly repoSlug?: string
  readonly commit?: string
}

/**
 * Checks whether a string names a supported event kind.
 *
 * @param value Candidate value.
 * @returns True for known event kinds.
 */
export const isPipelineEventKind = (value: string): value is PipelineEventKind => {
  return EVENT_KIND_NAMES.has(value)
}

const EVENT_KIND_NAMES: ReadonlySet<string> = new Set(PIPELINE_EVENT_KINDS)
