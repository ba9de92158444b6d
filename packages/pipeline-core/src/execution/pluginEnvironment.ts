import type { ResolvedSettingValue } from '../contracts/step.js'
import { toEnvironmentKey } from '../secrets/secretProviders.js'

/**
 * Converts plugin settings into `PLUGIN_*` environment variables.
 *
 * Scalars are stringified, lists of scalars are joined with `,` and
 * everything else is JSON encoded. `null` settings are left out.
 *
 * @param settings Resolved step settings.
 * @returns Environment variable record.
 */
export const settingsToEnvironment = (
  settings: Readonly<Record<string, ResolvedSettingValue>>
): Record<string, string> => {
  const environment: Record<string, string> = {}

  for (const [key, value] of Object.entries(settings)) {
    const encoded = encodeSettingValue(value)
    if (encoded === undefined) {
      continue
    }
    environment[`PLUGIN_${toEnvironmentKey(key)}`] = encoded
  }

  return environment
}

/**
 * Encodes one setting value as an environment variable value.
 *
 * @param value Resolved setting value.
 * @returns Encoded value, or undefined for `null`.
 */
export const encodeSettingValue = (value: ResolvedSettingValue): string | undefined => {
  if (value === null) {
    return undefined
  }

  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return String(value)
  }

  if (Array.isArray(value) && value.every(isScalar)) {
    return value.map(String).join(',')
  }

  return JSON.stringify(value)
}

const isScalar = (value: ResolvedSettingValue): value is string | number | boolean => {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean'
}
