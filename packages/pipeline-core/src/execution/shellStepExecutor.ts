import type {
  StepExecutionOutcome,
  StepExecutionRequest,
  StepExecutor,
} from '../contracts/executor.js'

import { settingsToEnvironment } from './pluginEnvironment.js'
import { spawnProcess } from './spawnProcess.js'

/**
 * Creates an executor running step commands on the host shell.
 *
 * The image reference is ignored. Steps without commands cannot run on the
 * host and resolve with an error outcome.
 *
 * @returns Step executor implementation.
 */
export const createShellStepExecutor = (): StepExecutor => {
  return {
    execute: async (request: StepExecutionRequest): Promise<StepExecutionOutcome> => {
      if (request.commands.length === 0) {
        return {
          exitCode: null,
          signal: null,
          stdout: '',
          stderr: '',
          timedOut: false,
          durationMs: 0,
          error: new Error(
            `Step "${request.stepName}" has no commands; plugin image ${request.image} needs the container executor`
          ),
        }
      }

      return await spawnProcess({
        command: buildCommandScript(request.commands),
        shell: true,
        cwd: request.cwd,
        env: {
          ...process.env,
          ...request.environment,
          ...settingsToEnvironment(request.settings),
        },
        timeoutMs: request.timeoutMs,
      })
    },
  }
}

/**
 * Builds a fail-fast shell script that echoes each command before running it.
 *
 * @param commands Step commands.
 * @returns Script text.
 */
export const buildCommandScript = (commands: readonly string[]): string => {
  const lines = ['set -e']

  for (const command of commands) {
    lines.push(`echo ${quoteShellArgument(`+ ${command}`)}`)
    lines.push(command)
  }

  return lines.join('\n')
}

/**
 * Quotes a value for POSIX shells.
 *
 * @param value Raw value.
 * @returns Single-quoted value.
 */
export const quoteShellArgument = (value: string): string => {
  return `'${value.replaceAll("'", `'\\''`)}'`
}
