import type { Predicate } from './predicate.js'

/**
 * Named indirection to a secret resolved by the host at run time.
 */
export interface SecretReference {
  /** Secret name looked up in the secret provider. */
  readonly fromSecret: string
}

/**
 * Opaque step setting value. Secret references may appear at any depth.
 */
export type SettingValue =
  | string
  | number
  | boolean
  | null
  | SecretReference
  | readonly SettingValue[]
  | { readonly [key: string]: SettingValue }

/**
 * Setting value after secret references have been replaced by their values.
 */
export type ResolvedSettingValue =
  | string
  | number
  | boolean
  | null
  | readonly ResolvedSettingValue[]
  | { readonly [key: string]: ResolvedSettingValue }

/**
 * Reference to the external tool a step delegates its work to.
 */
export interface ExecutorReference {
  /** Container image or tool name. */
  readonly image: string
}

/**
 * What a failed step does to the rest of the pipeline.
 */
export type StepFailurePolicy = 'halt' | 'ignore'

/**
 * Immutable definition of one pipeline step.
 */
export interface PipelineStep {
  /** Unique name within the pipeline. */
  readonly name: string
  /** External tool reference. */
  readonly executor: ExecutorReference
  /** Shell commands, empty for plugin steps. */
  readonly commands: readonly string[]
  /** Plugin settings handed to the executor. */
  readonly settings: Readonly<Record<string, SettingValue>>
  /** Extra environment variables for the step. */
  readonly environment: Readonly<Record<string, SettingValue>>
  /** Gate evaluated against the run event. */
  readonly condition: Predicate
  /** Failure policy, `halt` unless the document says otherwise. */
  readonly failure: StepFailurePolicy
}

/**
 * Checks whether a setting value is a secret reference.
 *
 * @param value Setting value.
 * @returns True for `{ fromSecret }` values.
 */
export const isSecretReference = (value: SettingValue): value is SecretReference => {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    'fromSecret' in value &&
    typeof value.fromSecret === 'string'
  )
}
