import type { PipelineEvent } from '../contracts/event.js'
import type { Pipeline } from '../contracts/pipeline.js'

const SECRET_MASK = '********'

/**
 * Builds the variables exposed to every step of a run.
 *
 * Besides the `CI_*` names, the `DRONE_*` names used by existing `.drone.yml`
 * documents are set to the same values, so those documents run unchanged.
 *
 * @param pipeline Running pipeline.
 * @param event Run event.
 * @returns Variable record.
 */
export const buildRunVariables = (
  pipeline: Pipeline,
  event: PipelineEvent
): Readonly<Record<string, string>> => {
  const [repoOwner = '', repoName = ''] = event.repoSlug.split('/')
  const tag = event.tag ?? ''
  const commit = event.commit ?? ''

  return {
    CI: 'true',
    CI_PIPELINE_NAME: pipeline.name,
    CI_EVENT: event.eventKind,
    CI_BRANCH: event.branch,
    CI_TAG: tag,
    CI_REF: event.ref,
    CI_REPO: event.repoSlug,
    CI_REPO_OWNER: repoOwner,
    CI_REPO_NAME: repoName,
    CI_COMMIT: commit,
    DRONE: 'true',
    DRONE_STAGE_NAME: pipeline.name,
    DRONE_BUILD_EVENT: event.eventKind,
    DRONE_BRANCH: event.branch,
    DRONE_COMMIT_BRANCH: event.branch,
    DRONE_TAG: tag,
    DRONE_COMMIT_REF: event.ref,
    DRONE_REPO: event.repoSlug,
    DRONE_REPO_OWNER: repoOwner,
    DRONE_REPO_NAME: repoName,
    DRONE_COMMIT: commit,
    DRONE_COMMIT_SHA: commit,
  }
}

/**
 * Replaces `${NAME}` placeholders with variable values. Unknown names are
 * replaced with an empty string; `$${NAME}` escapes a literal placeholder.
 *
 * @param text Text containing placeholders.
 * @param variables Variable record.
 * @returns Substituted text.
 */
export const substituteVariables = (
  text: string,
  variables: Readonly<Record<string, string>>
): string => {
  return text.replace(
    /\$(\$?)\{([A-Za-z_][A-Za-z0-9_]*)\}/g,
    (_match: string, escape: string, name: string) => {
      if (escape) {
        return `\${${name}}`
      }

      return variables[name] ?? ''
    }
  )
}

/**
 * Replaces every occurrence of a secret value with a fixed mask.
 *
 * @param text Text that may contain secret values.
 * @param secretValues Values to hide.
 * @returns Masked text.
 */
export const maskSecrets = (text: string, secretValues: Iterable<string>): string => {
  const values = [...new Set(secretValues)]
    .filter((value) => value.length > 0)
    .sort((left, right) => right.length - left.length)

  let masked = text
  for (const value of values) {
    masked = masked.split(value).join(SECRET_MASK)
  }

  return masked
}
