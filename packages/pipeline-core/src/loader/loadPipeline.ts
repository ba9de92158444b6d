import { parseAllDocuments } from 'yaml'

import type { PipelineDocument } from '../contracts/document.js'
import type { Pipeline } from '../contracts/pipeline.js'
import type { PipelineStep, SettingValue, StepFailurePolicy } from '../contracts/step.js'
import { ConfigError } from '../errors/pipelineErrors.js'
import { parsePredicate } from '../predicates/parsePredicate.js'

const DEFAULT_PIPELINE_NAME = 'default'
const DEFAULT_PIPELINE_TYPE = 'docker'

/**
 * Options for {@link loadPipeline}.
 */
export interface LoadPipelineOptions {
  /** Selects a pipeline by name when the source holds several. */
  readonly name?: string
}

/**
 * Loads every pipeline document from a YAML or JSON text.
 *
 * @param source Document text. Several YAML documents may be separated by `---`.
 * @returns Pipelines in document order.
 * @throws ConfigError when the text cannot be parsed or a document is invalid.
 * @throws PredicateError when a `when` or `trigger` block is malformed.
 */
export const loadPipelines = (source: string): readonly Pipeline[] => {
  const documents = parseAllDocuments(source, { merge: true })
  const values: unknown[] = []

  for (const document of documents) {
    const [firstError] = document.errors
    if (firstError) {
      throw new ConfigError(`Invalid pipeline document: ${firstError.message}`, undefined, {
        cause: firstError,
      })
    }

    const value: unknown = document.toJS()
    if (value === null || value === undefined) {
      continue
    }

    values.push(value)
  }

  return parsePipelineDocuments(values)
}

/**
 * Loads one pipeline from a document text or an already parsed document.
 *
 * @param source Document text or document object.
 * @param options Selection options.
 * @returns Loaded pipeline.
 * @throws ConfigError when the document is invalid or the selection is ambiguous.
 * @throws PredicateError when a `when` or `trigger` block is malformed.
 */
export const loadPipeline = (
  source: string | PipelineDocument,
  options: LoadPipelineOptions = {}
): Pipeline => {
  const pipelines =
    typeof source === 'string' ? loadPipelines(source) : [parsePipelineDocument(source)]

  return selectPipeline(pipelines, options.name)
}

/**
 * Validates a list of raw documents.
 *
 * @param values Raw documents.
 * @returns Pipelines in document order.
 * @throws ConfigError when no document is present or pipeline names repeat.
 */
export const parsePipelineDocuments = (values: readonly unknown[]): readonly Pipeline[] => {
  if (values.length === 0) {
    throw new ConfigError('Pipeline source contains no documents')
  }

  const pipelines = values.map((value, index) =>
    parsePipelineDocument(value, values.length > 1 ? `documents[${index}]` : '')
  )

  const seenNames = new Set<string>()
  for (const pipeline of pipelines) {
    if (seenNames.has(pipeline.name)) {
      throw new ConfigError(`pipelines must use unique names (duplicate: ${pipeline.name})`)
    }
    seenNames.add(pipeline.name)
  }

  return pipelines
}

/**
 * Validates one raw pipeline document.
 *
 * @param value Raw document.
 * @param basePath Path prefix used in error messages.
 * @returns Frozen pipeline.
 * @throws ConfigError when required fields are missing or step names repeat.
 * @throws PredicateError when a `when` or `trigger` block is malformed.
 */
export const parsePipelineDocument = (value: unknown, basePath = ''): Pipeline => {
  const at = (path: string): string => (basePath ? `${basePath}.${path}` : path)

  if (!isRecord(value)) {
    throw new ConfigError(`${basePath || 'Pipeline document'} must be an object`, basePath)
  }

  if (value.kind !== 'pipeline') {
    throw new ConfigError(`${at('kind')} must be "pipeline"`, at('kind'))
  }

  const name = parseOptionalString(value.name, at('name')) ?? DEFAULT_PIPELINE_NAME
  const type = parseOptionalString(value.type, at('type')) ?? DEFAULT_PIPELINE_TYPE

  const stepsValue = value.steps
  if (!Array.isArray(stepsValue)) {
    throw new ConfigError(`${at('steps')} must be an array`, at('steps'))
  }

  const steps = stepsValue.map((stepValue: unknown, index: number) =>
    parseStep(stepValue, at(`steps[${index}]`))
  )
  assertUniqueStepNames(steps, at('steps'))

  const trigger = parsePredicate(value.trigger, at('trigger'))

  const pipeline: Pipeline = {
    kind: 'pipeline',
    type,
    name,
    steps,
    trigger,
  }

  return deepFreeze(pipeline)
}

/**
 * Picks the pipeline named `name`, or the only pipeline when no name is given.
 *
 * @param pipelines Loaded pipelines.
 * @param name Optional pipeline name.
 * @returns Selected pipeline.
 * @throws ConfigError when the name is unknown or the selection is ambiguous.
 */
export const selectPipeline = (
  pipelines: readonly Pipeline[],
  name: string | undefined
): Pipeline => {
  if (name !== undefined) {
    const selected = pipelines.find((pipeline) => pipeline.name === name)
    if (!selected) {
      throw new ConfigError(`Unknown pipeline: ${name}`)
    }
    return selected
  }

  const [onlyPipeline] = pipelines
  if (!onlyPipeline || pipelines.length > 1) {
    throw new ConfigError(
      `Source defines ${pipelines.length} pipelines; select one by name (${pipelines
        .map((pipeline) => pipeline.name)
        .join(', ')})`
    )
  }

  return onlyPipeline
}

const parseStep = (value: unknown, path: string): PipelineStep => {
  if (!isRecord(value)) {
    throw new ConfigError(`${path} must be an object`, path)
  }

  const name = parseRequiredString(value.name, `${path}.name`)

  if (value.image !== undefined && value.executor_image !== undefined) {
    throw new ConfigError(`${path} must not set both image and executor_image`, path)
  }
  const image = parseRequiredString(value.image ?? value.executor_image, `${path}.image`)

  const commands = parseOptionalStringArray(value.commands, `${path}.commands`) ?? []
  const settings = parseSettingsRecord(value.settings, `${path}.settings`)
  const environment = parseSettingsRecord(value.environment, `${path}.environment`)
  const failure = parseFailurePolicy(value.failure, `${path}.failure`)
  const condition = parsePredicate(value.when, `${path}.when`)

  return {
    name,
    executor: { image },
    commands,
    settings,
    environment,
    condition,
    failure,
  }
}

const assertUniqueStepNames = (steps: readonly PipelineStep[], path: string): void => {
  const seenNames = new Set<string>()

  for (const step of steps) {
    if (seenNames.has(step.name)) {
      throw new ConfigError(`${path} must use unique names (duplicate: ${step.name})`, path)
    }
    seenNames.add(step.name)
  }
}

const parseFailurePolicy = (value: unknown, path: string): StepFailurePolicy => {
  if (value === undefined || value === null) {
    return 'halt'
  }

  if (value !== 'halt' && value !== 'ignore') {
    throw new ConfigError(`${path} must be "halt" or "ignore"`, path)
  }

  return value
}

const parseSettingsRecord = (
  value: unknown,
  path: string
): Readonly<Record<string, SettingValue>> => {
  if (value === undefined || value === null) {
    return {}
  }

  if (!isRecord(value)) {
    throw new ConfigError(`${path} must be an object`, path)
  }

  const parsed: Record<string, SettingValue> = {}
  for (const [key, entryValue] of Object.entries(value)) {
    parsed[key] = parseSettingValue(entryValue, `${path}.${key}`)
  }

  return parsed
}

const parseSettingValue = (value: unknown, path: string): SettingValue => {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return value
  }

  if (Array.isArray(value)) {
    return value.map((entry: unknown, index: number) =>
      parseSettingValue(entry, `${path}[${index}]`)
    )
  }

  if (!isRecord(value)) {
    throw new ConfigError(`${path} has an unsupported value type`, path)
  }

  if ('from_secret' in value) {
    const secretName = value.from_secret
    if (typeof secretName !== 'string' || secretName.length === 0) {
      throw new ConfigError(`${path}.from_secret must be a non-empty string`, `${path}.from_secret`)
    }
    if (Object.keys(value).length > 1) {
      throw new ConfigError(`${path} must not combine from_secret with other keys`, path)
    }
    return { fromSecret: secretName }
  }

  const parsed: Record<string, SettingValue> = {}
  for (const [key, entryValue] of Object.entries(value)) {
    parsed[key] = parseSettingValue(entryValue, `${path}.${key}`)
  }

  return parsed
}

const parseRequiredString = (value: unknown, path: string): string => {
  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigError(`${path} must be a non-empty string`, path)
  }

  return value
}

const parseOptionalString = (value: unknown, path: string): string | undefined => {
  if (value === undefined || value === null) {
    return undefined
  }

  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigError(`${path} must be a non-empty string`, path)
  }

  return value
}

const parseOptionalStringArray = (value: unknown, path: string): readonly string[] | undefined => {
  if (value === undefined || value === null) {
    return undefined
  }

  if (!Array.isArray(value)) {
    throw new ConfigError(`${path} must be an array`, path)
  }

  const result: string[] = []
  for (const [index, entry] of value.entries()) {
    if (typeof entry !== 'string' || entry.length === 0) {
      throw new ConfigError(`${path}[${index}] must be a non-empty string`, `${path}[${index}]`)
    }
    result.push(entry)
  }

  return result
}

const deepFreeze = <T>(value: T): T => {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const entry of Object.values(value)) {
      deepFreeze(entry)
    }
  }

  return value
}

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
