/**
 * Discriminator shared by all pipeline errors.
 */
export type PipelineErrorKind = 'config' | 'predicate' | 'executor' | 'secret_resolution'

/**
 * Base class for errors raised while loading or running a pipeline.
 */
export abstract class PipelineError extends Error {
  public abstract readonly kind: PipelineErrorKind

  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'PipelineError'
  }
}

/**
 * Malformed or incomplete pipeline document. Fatal at load time.
 */
export class ConfigError extends PipelineError {
  public readonly kind = 'config'

  /**
   * @param message Error message.
   * @param path Document path of the offending value, for example `steps[2].name`.
   */
  public constructor(
    message: string,
    public readonly path?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'ConfigError'
  }
}

/**
 * Malformed `when` or `trigger` block. Fatal at load time.
 */
export class PredicateError extends PipelineError {
  public readonly kind = 'predicate'

  public constructor(
    message: string,
    public readonly path: string
  ) {
    super(message)
    this.name = 'PredicateError'
  }
}

/**
 * External tool invocation failed.
 */
export class ExecutorError extends PipelineError {
  public readonly kind = 'executor'

  public constructor(
    message: string,
    public readonly stepName: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'ExecutorError'
  }
}

/**
 * A step referenced a secret the provider does not know.
 */
export class SecretResolutionError extends PipelineError {
  public readonly kind = 'secret_resolution'

  public constructor(
    public readonly stepName: string,
    public readonly secretName: string,
    options?: { cause?: unknown }
  ) {
    super(`Secret "${secretName}" required by step "${stepName}" could not be resolved`, options)
    this.name = 'SecretResolutionError'
  }
}
