import type { PipelineEvent } from '../contracts/event.js'
import type { Predicate } from '../contracts/predicate.js'

import { matchesGlob } from './globPattern.js'

/**
 * Shared always-true predicate.
 */
export const ALWAYS: Predicate = Object.freeze({ kind: 'always' })

/**
 * Evaluates a predicate against an event.
 *
 * @param predicate Predicate to evaluate.
 * @param event Run event.
 * @returns True when the event satisfies the predicate.
 */
export const evaluatePredicate = (predicate: Predicate, event: PipelineEvent): boolean => {
  switch (predicate.kind) {
    case 'always':
      return true
    case 'branch_in':
      return predicate.branches.includes(event.branch)
    case 'event_equals':
      return predicate.events.includes(event.eventKind)
    case 'ref_glob':
      return predicate.patterns.some((pattern) => matchesGlob(pattern, event.ref))
    case 'repo_glob':
      return predicate.patterns.some((pattern) => matchesGlob(pattern, event.repoSlug))
    case 'not':
      return !evaluatePredicate(predicate.clause, event)
    case 'and':
      return predicate.clauses.every((clause) => evaluatePredicate(clause, event))
  }
}

/**
 * Renders a predicate in a compact human-readable form.
 *
 * @param predicate Predicate to describe.
 * @returns Description such as `event in [tag] and branch in [master]`.
 */
export const describePredicate = (predicate: Predicate): string => {
  switch (predicate.kind) {
    case 'always':
      return 'always'
    case 'branch_in':
      return `branch in [${predicate.branches.join(', ')}]`
    case 'event_equals':
      return `event in [${predicate.events.join(', ')}]`
    case 'ref_glob':
      return `ref matches [${predicate.patterns.join(', ')}]`
    case 'repo_glob':
      return `repo matches [${predicate.patterns.join(', ')}]`
    case 'not':
      return `not (${describePredicate(predicate.clause)})`
    case 'and':
      return predicate.clauses.length === 0
        ? 'always'
        : predicate.clauses.map(describePredicate).join(' and ')
  }
}
