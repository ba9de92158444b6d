/**
 * Values accepted by one condition field.
 */
export type ConditionValues =
  | string
  | readonly string[]
  | {
      readonly include?: string | readonly string[]
      readonly exclude?: string | readonly string[]
    }

/**
 * Raw `when` or `trigger` block.
 */
export interface ConditionDocument {
  /** Branch name membership. */
  readonly branch?: ConditionValues
  /** Event kind membership. */
  readonly event?: ConditionValues
  /** Glob match against the full ref. */
  readonly ref?: ConditionValues
  /** Glob match against the repository slug. */
  readonly repo?: ConditionValues
}

/**
 * Raw setting value as written in a pipeline document.
 */
export type SettingDocumentValue =
  | string
  | number
  | boolean
  | null
  | { readonly from_secret: string }
  | readonly SettingDocumentValue[]
  | { readonly [key: string]: SettingDocumentValue }

interface PipelineStepDocumentFields {
  readonly name: string
  readonly commands?: readonly string[]
  readonly settings?: Readonly<Record<string, SettingDocumentValue>>
  readonly environment?: Readonly<Record<string, SettingDocumentValue>>
  readonly when?: ConditionDocument
  readonly failure?: 'halt' | 'ignore'
}

/**
 * Raw step entry. The image is given as `image` or `executor_image`, never both.
 */
export type PipelineStepDocument = PipelineStepDocumentFields &
  (
    | { readonly image: string; readonly executor_image?: never }
    | { readonly executor_image: string; readonly image?: never }
  )

/**
 * Typed shape of a pipeline document, usable from `pipeline.config.ts` files.
 */
export interface PipelineDocument {
  readonly kind: 'pipeline'
  readonly type?: string
  readonly name?: string
  readonly steps: readonly PipelineStepDocument[]
  readonly trigger?: ConditionDocument
}
