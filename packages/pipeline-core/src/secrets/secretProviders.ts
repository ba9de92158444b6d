import type { SecretProvider } from '../contracts/secrets.js'

/**
 * Default prefix for secrets read from the environment.
 */
export const DEFAULT_SECRET_ENV_PREFIX = 'RELAYCI_SECRET_'

/**
 * Options for {@link createEnvSecretProvider}.
 */
export interface EnvSecretProviderOptions {
  /** Variable name prefix. Defaults to `RELAYCI_SECRET_`. */
  readonly prefix?: string
}

/**
 * Creates a provider backed by a fixed name to value record.
 *
 * @param secrets Secret values keyed by secret name.
 * @returns Secret provider.
 */
export const createStaticSecretProvider = (
  secrets: Readonly<Record<string, string>>
): SecretProvider => {
  const values = new Map(Object.entries(secrets))

  return {
    resolve: async (name: string): Promise<string | undefined> => values.get(name),
  }
}

/**
 * Creates a provider reading `<prefix><NAME>` variables, where `NAME` is the
 * secret name uppercased with non-alphanumerics replaced by `_`.
 *
 * @param env Environment to read from.
 * @param options Provider options.
 * @returns Secret provider.
 */
export const createEnvSecretProvider = (
  env: Readonly<Record<string, string | undefined>>,
  options: EnvSecretProviderOptions = {}
): SecretProvider => {
  const prefix = options.prefix ?? DEFAULT_SECRET_ENV_PREFIX

  return {
    resolve: async (name: string): Promise<string | undefined> => {
      return env[`${prefix}${toEnvironmentKey(name)}`]
    },
  }
}

/**
 * Creates a provider asking each provider in turn. The first defined value wins.
 *
 * @param providers Providers in priority order.
 * @returns Secret provider.
 */
export const createChainedSecretProvider = (
  providers: readonly SecretProvider[]
): SecretProvider => {
  return {
    resolve: async (name: string): Promise<string | undefined> => {
      for (const provider of providers) {
        const value = await provider.resolve(name)
        if (value !== undefined) {
          return value
        }
      }

      return undefined
    },
  }
}

/**
 * Converts a name into an environment variable key.
 *
 * @param name Secret or setting name.
 * @returns Uppercased key, for example `github_ssh-key` becomes `GITHUB_SSH_KEY`.
 */
export const toEnvironmentKey = (name: string): string => {
  return name.toUpperCase().replace(/[^A-Z0-9]/g, '_')
}
