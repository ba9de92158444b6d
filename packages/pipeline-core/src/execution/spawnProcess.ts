import { spawn, type ChildProcess } from 'node:child_process'

import type { StepExecutionOutcome } from '../contracts/executor.js'

/**
 * Process launch description.
 */
export interface SpawnProcessRequest {
  /** Executable, or a full command line when `shell` is true. */
  readonly command: string
  /** Arguments passed to the executable. */
  readonly args?: readonly string[]
  /** Runs `command` through the system shell when true. */
  readonly shell?: boolean
  /** Working directory. */
  readonly cwd: string
  /** Complete process environment. */
  readonly env: NodeJS.ProcessEnv
  /** Optional timeout in milliseconds. */
  readonly timeoutMs?: number
}

/**
 * Spawns a process and captures its output until it closes.
 *
 * The process leads its own process group, so a timeout terminates everything
 * it started. Spawn failures resolve with `error` set instead of rejecting.
 *
 * @param request Launch description.
 * @returns Execution outcome.
 */
export const spawnProcess = async (request: SpawnProcessRequest): Promise<StepExecutionOutcome> => {
  const startedAt = Date.now()

  return await new Promise<StepExecutionOutcome>((resolve) => {
    const child = spawn(request.command, [...(request.args ?? [])], {
      cwd: request.cwd,
      env: request.env,
      shell: request.shell ?? false,
      detached: true,
      stdio: ['ignore', 'pipe', 'pipe'],
    })

    let stdout = ''
    let stderr = ''
    let timedOut = false
    let error: unknown
    let closed = false

    const timeoutHandle =
      typeof request.timeoutMs === 'number' && request.timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true
            terminateProcessGroup(child)
          }, request.timeoutMs)
        : null

    child.stdout.on('data', (chunk: Buffer) => {
      stdout += chunk.toString('utf8')
    })

    child.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString('utf8')
    })

    child.on('error', (spawnError: Error) => {
      error = spawnError
    })

    // A descendant that ignores SIGTERM may still hold the pipes open.
    child.on('exit', () => {
      if (timedOut) {
        child.stdout.destroy()
        child.stderr.destroy()
      }
    })

    child.on('close', (exitCode: number | null, signal: NodeJS.Signals | null) => {
      if (closed) {
        return
      }

      closed = true
      if (timeoutHandle) {
        clearTimeout(timeoutHandle)
      }

      resolve({
        exitCode,
        signal,
        stdout,
        stderr,
        timedOut,
        durationMs: Date.now() - startedAt,
        error,
      })
    })
  })
}

const terminateProcessGroup = (child: ChildProcess): void => {
  if (child.pid === undefined) {
    return
  }

  try {
    process.kill(-child.pid, 'SIGTERM')
  } catch {
    // The group is gone; signal the direct child in case it is not.
    child.kill('SIGTERM')
  }
}
