import type { PipelineEventKind } from './event.js'

/**
 * Predicate that is always true. Used for steps without a `when` block.
 */
export interface AlwaysPredicate {
  readonly kind: 'always'
}

/**
 * Matches when the event branch is one of the listed names.
 */
export interface BranchInPredicate {
  readonly kind: 'branch_in'
  readonly branches: readonly string[]
}

/**
 * Matches when the event kind is one of the listed kinds.
 */
export interface EventEqualsPredicate {
  readonly kind: 'event_equals'
  readonly events: readonly PipelineEventKind[]
}

/**
 * Matches when any glob matches the full event ref.
 */
export interface RefGlobPredicate {
  readonly kind: 'ref_glob'
  readonly patterns: readonly string[]
}

/**
 * Matches when any glob matches the repository slug.
 */
export interface RepoGlobPredicate {
  readonly kind: 'repo_glob'
  readonly patterns: readonly string[]
}

/**
 * Negates a nested predicate.
 */
export interface NotPredicate {
  readonly kind: 'not'
  readonly clause: Predicate
}

/**
 * Conjunction of clauses. An empty conjunction is true.
 */
export interface AndPredicate {
  readonly kind: 'and'
  readonly clauses: readonly Predicate[]
}

/**
 * Condition evaluated against a pipeline event.
 */
export type Predicate =
  | AlwaysPredicate
  | BranchInPredicate
  | EventEqualsPredicate
  | RefGlobPredicate
  | RepoGlobPredicate
  | NotPredicate
  | AndPredicate
