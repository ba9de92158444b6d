import { readFile } from 'node:fs/promises'

import { ConfigError } from '@relayci/pipeline-core'
import { parse } from 'yaml'

/**
 * Reads a YAML or JSON mapping of secret names to string values.
 *
 * @param filePath Absolute file path.
 * @returns Secret values keyed by name.
 * @throws ConfigError when the file cannot be read or is not a string mapping.
 */
export const loadSecretsFile = async (
  filePath: string
): Promise<Readonly<Record<string, string>>> => {
  let content: string
  try {
    content = await readFile(filePath, 'utf8')
  } catch (error) {
    throw new ConfigError(`Cannot read secrets file ${filePath}`, undefined, { cause: error })
  }

  let value: unknown
  try {
    value = parse(content)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ConfigError(`Invalid secrets file ${filePath}: ${reason}`, undefined, {
      cause: error,
    })
  }

  if (value === null || value === undefined) {
    return {}
  }

  if (typeof value !== 'object' || Array.isArray(value)) {
    throw new ConfigError(`Secrets file ${filePath} must contain a mapping`)
  }

  const secrets: Record<string, string> = {}
  for (const [name, secret] of Object.entries(value)) {
    if (typeof secret !== 'string') {
      throw new ConfigError(`Secret "${name}" in ${filePath} must be a string`, name)
    }
    secrets[name] = secret
  }

  return secrets
}
