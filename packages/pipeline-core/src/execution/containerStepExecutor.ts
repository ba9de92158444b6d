import type {
  StepExecutionOutcome,
  StepExecutionRequest,
  StepExecutor,
} from '../contracts/executor.js'

import { settingsToEnvironment } from './pluginEnvironment.js'
import { buildCommandScript } from './shellStepExecutor.js'
import { spawnProcess } from './spawnProcess.js'

/**
 * Workspace mount point inside step containers.
 */
export const CONTAINER_WORKSPACE = '/workspace'

/**
 * Options for the container executor.
 */
export interface ContainerStepExecutorOptions {
  /** Container runtime binary, for example `docker` or `podman`. */
  readonly runtime?: string
}

/**
 * Planned container runtime invocation.
 */
export interface ContainerInvocation {
  /** Runtime arguments. Environment values are passed by name only. */
  readonly args: readonly string[]
  /** Variables the runtime forwards into the container. */
  readonly environment: Readonly<Record<string, string>>
}

/**
 * Creates an executor running each step in its image through a container
 * runtime CLI. The workspace is mounted at `/workspace`.
 *
 * @param options Executor options.
 * @returns Step executor implementation.
 */
export const createContainerStepExecutor = (
  options: ContainerStepExecutorOptions = {}
): StepExecutor => {
  const runtime = options.runtime ?? 'docker'

  return {
    execute: async (request: StepExecutionRequest): Promise<StepExecutionOutcome> => {
      const invocation = buildContainerInvocation(request)

      return await spawnProcess({
        command: runtime,
        args: invocation.args,
        cwd: request.cwd,
        env: { ...process.env, ...invocation.environment },
        timeoutMs: request.timeoutMs,
      })
    },
  }
}

/**
 * Builds the `run` arguments for one step.
 *
 * Command steps run their commands as a `/bin/sh` script; plugin steps
 * keep the image entrypoint and receive their settings as `PLUGIN_*`
 * variables.
 *
 * @param request Step execution request.
 * @returns Runtime invocation.
 */
export const buildContainerInvocation = (request: StepExecutionRequest): ContainerInvocation => {
  const environment: Record<string, string> = {
    ...request.environment,
    ...settingsToEnvironment(request.settings),
    CI_WORKSPACE: CONTAINER_WORKSPACE,
  }

  const args: string[] = [
    'run',
    '--rm',
    '--volume',
    `${request.cwd}:${CONTAINER_WORKSPACE}`,
    '--workdir',
    CONTAINER_WORKSPACE,
  ]

  for (const key of Object.keys(environment).sort()) {
    args.push('--env', key)
  }

  if (request.commands.length > 0) {
    args.push('--entrypoint', '/bin/sh', request.image, '-c', buildCommandScript(request.commands))
  } else {
    args.push(request.image)
  }

  return { args, environment }
}
