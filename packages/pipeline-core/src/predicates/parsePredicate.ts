import { isPipelineEventKind, type PipelineEventKind } from '../contracts/event.js'
import type { Predicate } from '../contracts/predicate.js'
import { PredicateError } from '../errors/pipelineErrors.js'

import { ALWAYS } from './evaluatePredicate.js'

type PredicateField = 'branch' | 'event' | 'ref' | 'repo'

const PREDICATE_FIELDS: readonly PredicateField[] = ['branch', 'event', 'ref', 'repo']

interface FieldValues {
  readonly include?: readonly string[]
  readonly exclude?: readonly string[]
}

/**
 * Parses a `when` or `trigger` block into a predicate.
 *
 * Each field takes a single value, a list of values, or an
 * `{ include, exclude }` mapping. Fields are combined with a conjunction.
 * An absent or empty block is always true.
 *
 * @param value Raw block value.
 * @param path Document path used in error messages.
 * @returns Parsed predicate.
 * @throws PredicateError when the block is malformed.
 */
export const parsePredicate = (value: unknown, path: string): Predicate => {
  if (value === undefined || value === null) {
    return ALWAYS
  }

  if (!isRecord(value)) {
    throw new PredicateError(`${path} must be an object`, path)
  }

  const clauses: Predicate[] = []

  for (const [field, fieldValue] of Object.entries(value)) {
    if (!isPredicateField(field)) {
      throw new PredicateError(
        `${path}.${field} is not a supported condition (expected one of: ${PREDICATE_FIELDS.join(', ')})`,
        `${path}.${field}`
      )
    }

    const fieldPath = `${path}.${field}`
    const values = parseFieldValues(fieldValue, fieldPath)

    if (values.include) {
      clauses.push(buildClause(field, values.include, fieldPath))
    }

    if (values.exclude) {
      clauses.push({ kind: 'not', clause: buildClause(field, values.exclude, fieldPath) })
    }
  }

  if (clauses.length === 0) {
    return ALWAYS
  }

  const [firstClause] = clauses
  if (clauses.length === 1 && firstClause) {
    return firstClause
  }

  return { kind: 'and', clauses }
}

const buildClause = (
  field: PredicateField,
  values: readonly string[],
  path: string
): Predicate => {
  switch (field) {
    case 'branch':
      return { kind: 'branch_in', branches: values }
    case 'event':
      return { kind: 'event_equals', events: values.map((entry) => toEventKind(entry, path)) }
    case 'ref':
      return { kind: 'ref_glob', patterns: values }
    case 'repo':
      return { kind: 'repo_glob', patterns: values }
  }
}

const toEventKind = (value: string, path: string): PipelineEventKind => {
  if (!isPipelineEventKind(value)) {
    throw new PredicateError(`${path} references unknown event kind: ${value}`, path)
  }

  return value
}

const parseFieldValues = (value: unknown, path: string): FieldValues => {
  if (typeof value === 'string' || Array.isArray(value)) {
    return { include: parseValueList(value, path) }
  }

  if (!isRecord(value)) {
    throw new PredicateError(`${path} must be a string, a list or an include/exclude object`, path)
  }

  for (const key of Object.keys(value)) {
    if (key !== 'include' && key !== 'exclude') {
      throw new PredicateError(`${path}.${key} is not supported (expected include or exclude)`, path)
    }
  }

  const include =
    value.include === undefined ? undefined : parseValueList(value.include, `${path}.include`)
  const exclude =
    value.exclude === undefined ? undefined : parseValueList(value.exclude, `${path}.exclude`)

  if (!include && !exclude) {
    throw new PredicateError(`${path} must define include or exclude`, path)
  }

  return { include, exclude }
}

const parseValueList = (value: unknown, path: string): readonly string[] => {
  if (typeof value === 'string') {
    if (value.length === 0) {
      throw new PredicateError(`${path} must be a non-empty string`, path)
    }
    return [value]
  }

  if (!Array.isArray(value)) {
    throw new PredicateError(`${path} must be a string or a list of strings`, path)
  }

  if (value.length === 0) {
    throw new PredicateError(`${path} must list at least one value`, path)
  }

  const result: string[] = []
  for (const [index, entry] of value.entries()) {
    if (typeof entry !== 'string' || entry.length === 0) {
      throw new PredicateError(`${path}[${index}] must be a non-empty string`, `${path}[${index}]`)
    }
    result.push(entry)
  }

  return result
}

const PREDICATE_FIELD_NAMES: ReadonlySet<string> = new Set(PREDICATE_FIELDS)

const isPredicateField = (value: string): value is PredicateField => {
  return PREDICATE_FIELD_NAMES.has(value)
}

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
