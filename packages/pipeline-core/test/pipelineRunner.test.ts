import { readFile } from 'node:fs/promises'

import { describe, expect, it } from 'vitest'

import type {
  PipelineEvent,
  PipelineReporter,
  StepExecutionOutcome,
  StepExecutionRequest,
  StepExecutor,
} from '../src/index.js'
import {
  createPipelineEvent,
  createPipelineRunner,
  createStaticSecretProvider,
  loadPipeline,
} from '../src/index.js'

const RELEASE_PIPELINE = [
  'kind: pipeline',
  'name: release',
  'steps:',
  '  - name: A',
  '    image: alpine',
  '    commands: [echo a]',
  '    when:',
  '      event: push',
  '  - name: B',
  '    image: alpine',
  '    commands: [echo b]',
  '    when:',
  '      event: tag',
  '  - name: C',
  '    image: alpine',
  '    commands: [echo c]',
].join('\n')

const pushEvent = createPipelineEvent({
  eventKind: 'push',
  branch: 'master',
  repoSlug: 'acme/tools',
})

const tagEvent = createPipelineEvent({
  eventKind: 'tag',
  tag: 'v1.2.0',
  repoSlug: 'acme/tools',
})

const createOutcome = (overrides: Partial<StepExecutionOutcome> = {}): StepExecutionOutcome => {
  return {
    exitCode: 0,
    signal: null,
    stdout: '',
    stderr: '',
    timedOut: false,
    durationMs: 1,
    ...overrides,
  }
}

const createRecordingExecutor = (
  outcomes: Readonly<Record<string, Partial<StepExecutionOutcome>>> = {}
): { executor: StepExecutor; calls: StepExecutionRequest[] } => {
  const calls: StepExecutionRequest[] = []

  return {
    calls,
    executor: {
      execute: async (request: StepExecutionRequest): Promise<StepExecutionOutcome> => {
        calls.push(request)
        return createOutcome(outcomes[request.stepName])
      },
    },
  }
}

const createClock = (): (() => number) => {
  let timestamp = 0
  return (): number => {
    timestamp += 1
    return timestamp
  }
}

const statuses = (steps: ReadonlyArray<{ stepName: string; status: string }>): string[] => {
  return steps.map((step) => `${step.stepName}:${step.status}`)
}

describe('PipelineRunner', () => {
  it('runs push-gated and unconditional steps for a push event', async () => {
    const { executor, calls } = createRecordingExecutor()
    const runner = createPipelineRunner({
      executor,
      secrets: createStaticSecretProvider({}),
      now: createClock(),
    })

    const report = await runner.run(loadPipeline(RELEASE_PIPELINE), pushEvent)

    expect(statuses(report.steps)).toEqual(['A:succeeded', 'B:skipped', 'C:succeeded'])
    expect(report.steps[1]?.reason).toBe('condition_not_met')
    expect(report.status).toBe('succeeded')
    expect(report.exitCode).toBe(0)
    expect(calls.map((call) => call.stepName)).toEqual(['A', 'C'])
  })

  it('runs tag-gated and unconditional steps for a tag event', async () => {
    const { executor, calls } = createRecordingExecutor()
    const runner = createPipelineRunner({
      executor,
      secrets: createStaticSecretProvider({}),
      now: createClock(),
    })

    const report = await runner.run(loadPipeline(RELEASE_PIPELINE), tagEvent)

    expect(statuses(report.steps)).toEqual(['A:skipped', 'B:succeeded', 'C:succeeded'])
    expect(calls.map((call) => call.stepName)).toEqual(['B', 'C'])
  })

  it('stops after the first failure and skips the remaining steps', async () => {
    const { executor, calls } = createRecordingExecutor({ A: { exitCode: 2 } })
    const runner = createPipelineRunner({
      executor,
      secrets: createStaticSecretProvider({}),
      now: createClock(),
    })

    const report = await runner.run(loadPipeline(RELEASE_PIPELINE), pushEvent)

    expect(statuses(report.steps)).toEqual(['A:failed', 'B:skipped', 'C:skipped'])
    expect(report.steps[0]?.exitCode).toBe(2)
    expect(report.steps[0]?.reason).toBe('command_failed')
    expect(report.steps[2]?.reason).toBe('pipeline_halted')
    expect(report.status).toBe('failed')
    expect(report.exitCode).toBe(1)
    expect(report.summary).toEqual({
      total: 3,
      succeeded: 0,
      failed: 1,
      skipped: 2,
      durationMs: report.finishedAt - report.startedAt,
    })
    expect(calls.map((call) => call.stepName)).toEqual(['A'])
  })

  it('keeps running after a failure when continueOnError is set', async () => {
    const { executor, calls } = createRecordingExecutor({ A: { exitCode: 1 } })
    const runner = createPipelineRunner({
      executor,
      secrets: createStaticSecretProvider({}),
      continueOnError: true,
      now: createClock(),
    })

    const report = await runner.run(loadPipeline(RELEASE_PIPELINE), pushEvent)

    expect(statuses(report.steps)).toEqual(['A:failed', 'B:skipped', 'C:succeeded'])
    expect(report.status).toBe('failed')
    expect(calls.map((call) => call.stepName)).toEqual(['A', 'C'])
  })

  it('does not halt or fail the run for steps with failure: ignore', async () => {
    const pipeline = loadPipeline(
      [
        'kind: pipeline',
        'steps:',
        '  - name: notify',
        '    image: alpine',
        '    commands: [exit 1]',
        '    failure: ignore',
        '  - name: build',
        '    image: alpine',
        '    commands: [make]',
      ].join('\n')
    )
    const { executor } = createRecordingExecutor({ notify: { exitCode: 1 } })
    const runner = createPipelineRunner({
      executor,
      secrets: createStaticSecretProvider({}),
      now: createClock(),
    })

    const report = await runner.run(pipeline, pushEvent)

    expect(statuses(report.steps)).toEqual(['notify:failed', 'build:succeeded'])
    expect(report.steps[0]?.failureIgnored).toBe(true)
    expect(report.status).toBe('succeeded')
    expect(report.exitCode).toBe(0)
  })

  it('executes no steps when the trigger does not match', async () => {
    const pipeline = loadPipeline(
      [
        'kind: pipeline',
        'steps:',
        '  - name: build',
        '    image: alpine',
        '    commands: [make]',
        'trigger:',
        '  ref:',
        '    - refs/heads/master',
        '    - refs/tags/*',
      ].join('\n')
    )
    const { executor, calls } = createRecordingExecutor()
    const runner = createPipelineRunner({
      executor,
      secrets: createStaticSecretProvider({}),
      now: createClock(),
    })

    const report = await runner.run(
      pipeline,
      createPipelineEvent({ eventKind: 'push', branch: 'develop' })
    )

    expect(report.status).toBe('skipped')
    expect(report.triggered).toBe(false)
    expect(report.steps).toEqual([])
    expect(report.exitCode).toBe(0)
    expect(calls).toHaveLength(0)
  })

  it('preserves declaration order for every combination of conditions', async () => {
    const events: PipelineEvent[] = [
      pushEvent,
      tagEvent,
      createPipelineEvent({ eventKind: 'pull_request', branch: 'feature/x' }),
    ]
    const gates = ['push', 'tag', 'pull_request']

    for (const permutation of [
      [0, 1, 2],
      [2, 0, 1],
      [1, 2, 0],
    ]) {
      const pipeline = loadPipeline({
        kind: 'pipeline',
        steps: permutation.flatMap((gateIndex, position) => [
          {
            name: `gated-${position}`,
            image: 'alpine',
            commands: ['true'],
            when: { event: gates[gateIndex] ?? 'push' },
          },
          { name: `always-${position}`, image: 'alpine', commands: ['true'] },
        ]),
      })

      for (const event of events) {
        const { executor, calls } = createRecordingExecutor()
        const report = await createPipelineRunner({
          executor,
          secrets: createStaticSecretProvider({}),
          now: createClock(),
        }).run(pipeline, event)

        const declared = pipeline.steps.map((step) => step.name)
        const expectedCalls = report.steps
          .filter((result) => result.status === 'succeeded')
          .map((result) => result.stepName)

        expect(report.steps.map((result) => result.stepName)).toEqual(declared)
        expect(calls.map((call) => call.stepName)).toEqual(expectedCalls)
        expect(expectedCalls.filter((name) => name.startsWith('gated-'))).toHaveLength(1)
      }
    }
  })

  it('resolves secret references and masks secret values in captured output', async () => {
    const pipeline = loadPipeline(
      [
        'kind: pipeline',
        'steps:',
        '  - name: publish',
        '    image: plugins/pypi',
        '    settings:',
        '      username:',
        '        from_secret: pypi_username',
        '      distributions: [sdist, bdist_wheel]',
        '    environment:',
        '      API_TOKEN:',
        '        from_secret: api_token',
      ].join('\n')
    )
    const { executor, calls } = createRecordingExecutor({
      publish: { stdout: 'uploading as test-user with test-token\n' },
    })
    const runner = createPipelineRunner({
      executor,
      secrets: createStaticSecretProvider({
        pypi_username: 'test-user',
        api_token: 'test-token',
      }),
      now: createClock(),
    })

    const report = await runner.run(pipeline, tagEvent)

    expect(calls[0]?.settings).toEqual({
      username: 'test-user',
      distributions: ['sdist', 'bdist_wheel'],
    })
    expect(calls[0]?.environment.API_TOKEN).toBe('test-token')
    expect([...(calls[0]?.secrets.keys() ?? [])]).toEqual(['pypi_username', 'api_token'])
    expect(report.steps[0]?.output.stdout).toBe('uploading as ******** with ********\n')
  })

  it('fails a step with a missing secret before invoking its executor', async () => {
    const pipeline = loadPipeline(
      [
        'kind: pipeline',
        'steps:',
        '  - name: git-push',
        '    image: plugins/git-push',
        '    settings:',
        '      ssh_key:',
        '        from_secret: github_ssh_key',
        '  - name: build',
        '    image: alpine',
        '    commands: [make]',
      ].join('\n')
    )
    const { executor, calls } = createRecordingExecutor()
    const runner = createPipelineRunner({
      executor,
      secrets: createStaticSecretProvider({}),
      now: createClock(),
    })

    const report = await runner.run(pipeline, pushEvent)

    expect(calls).toHaveLength(0)
    expect(statuses(report.steps)).toEqual(['git-push:failed', 'build:skipped'])
    expect(report.steps[0]?.reason).toBe('secret_missing')
    expect(report.steps[0]?.error).toEqual({
      name: 'SecretResolutionError',
      message: 'Secret "github_ssh_key" required by step "git-push" could not be resolved',
    })
  })

  it('records executor invocation failures as executor errors', async () => {
    const executor: StepExecutor = {
      execute: async (): Promise<StepExecutionOutcome> => {
        throw new Error('spawn docker ENOENT')
      },
    }
    const runner = createPipelineRunner({
      executor,
      secrets: createStaticSecretProvider({}),
      now: createClock(),
    })

    const report = await runner.run(loadPipeline(RELEASE_PIPELINE), pushEvent)

    expect(statuses(report.steps)).toEqual(['A:failed', 'B:skipped', 'C:skipped'])
    expect(report.steps[0]?.reason).toBe('executor_error')
    expect(report.steps[0]?.error).toEqual({
      name: 'ExecutorError',
      message: 'spawn docker ENOENT',
    })
  })

  it('reports timeouts from the executor as command timeouts', async () => {
    const { executor, calls } = createRecordingExecutor({
      A: { exitCode: null, signal: 'SIGTERM', timedOut: true },
    })
    const runner = createPipelineRunner({
      executor,
      secrets: createStaticSecretProvider({}),
      stepTimeoutMs: 500,
      now: createClock(),
    })

    const report = await runner.run(loadPipeline(RELEASE_PIPELINE), pushEvent)

    expect(calls[0]?.timeoutMs).toBe(500)
    expect(report.steps[0]?.status).toBe('failed')
    expect(report.steps[0]?.reason).toBe('command_timeout')
    expect(report.steps[0]?.exitCode).toBeUndefined()
    expect(report.steps[0]?.error?.message).toBe('Step "A" timed out after 500ms')
  })

  it('substitutes run variables into settings and exposes them as environment', async () => {
    const pipeline = loadPipeline(
      [
        'kind: pipeline',
        'steps:',
        '  - name: github-release',
        '    image: plugins/github-release',
        '    settings:',
        '      title: "${CI_TAG}"',
        '      remote: ssh://git@github.com/${CI_REPO}.git',
        '      literal: $${CI_TAG}',
      ].join('\n')
    )
    const { executor, calls } = createRecordingExecutor()
    const runner = createPipelineRunner({
      executor,
      secrets: createStaticSecretProvider({}),
      cwd: '/tmp/workspace',
      env: { EXTRA: '1' },
      now: createClock(),
    })

    await runner.run(pipeline, tagEvent)

    expect(calls[0]?.settings).toEqual({
      title: 'v1.2.0',
      remote: 'ssh://git@github.com/acme/tools.git',
      literal: '${CI_TAG}',
    })
    expect(calls[0]?.cwd).toBe('/tmp/workspace')
    expect(calls[0]?.environment).toMatchObject({
      EXTRA: '1',
      CI_EVENT: 'tag',
      CI_TAG: 'v1.2.0',
      CI_REF: 'refs/tags/v1.2.0',
      CI_REPO_NAME: 'tools',
    })
  })

  describe('with an existing .drone.yml document', () => {
    const loadDroneDocument = async () => {
      const source = await readFile(new URL('./fixtures/drone.pipeline.yml', import.meta.url), 'utf8')
      return loadPipeline(source)
    }

    const secrets = createStaticSecretProvider({
      github_ssh_key: 'test-ssh-key',
      github_token: 'test-token',
      public_pypi_username: 'test-user',
      public_pypi_password: 'test-password',
    })

    it('pushes to the repository remote on master', async () => {
      const pipeline = await loadDroneDocument()
      const { executor, calls } = createRecordingExecutor()
      const runner = createPipelineRunner({ executor, secrets, now: createClock() })

      const report = await runner.run(
        pipeline,
        createPipelineEvent({ eventKind: 'push', branch: 'master', repoSlug: 'laur89/i3-tools' })
      )

      expect(report.status).toBe('succeeded')
      expect(calls.map((call) => call.stepName)).toEqual(['version-tag-changelog', 'git-push'])
      expect(calls[1]?.settings).toEqual({
        ssh_key: 'test-ssh-key',
        remote: 'ssh://git@github.com/laur89/i3-tools.git',
        force: false,
        followtags: true,
      })
    })

    it('titles the release after the tag', async () => {
      const pipeline = await loadDroneDocument()
      const { executor, calls } = createRecordingExecutor()
      const runner = createPipelineRunner({ executor, secrets, now: createClock() })

      await runner.run(
        pipeline,
        createPipelineEvent({ eventKind: 'tag', tag: 'v1.2.0', repoSlug: 'laur89/i3-tools' })
      )

      expect(calls.map((call) => call.stepName)).toEqual(['build', 'github-release', 'pypi-publish'])
      expect(calls[1]?.settings.title).toBe('v1.2.0')
      expect(calls[1]?.settings.api_key).toBe('test-token')
    })
  })

  it('emits reporter lifecycle hooks in execution order', async () => {
    const events: string[] = []

    const reporter: PipelineReporter = {
      onPipelineStart: (pipeline): void => {
        events.push(`pipeline:start:${pipeline.name}`)
      },
      onStepStart: (step, index): void => {
        events.push(`step:start:${step.name}:${index}`)
      },
      onStepComplete: (result): void => {
        events.push(`step:complete:${result.stepName}:${result.status}`)
      },
      onPipelineComplete: (report): void => {
        events.push(`pipeline:complete:${report.status}`)
      },
    }

    const { executor } = createRecordingExecutor()
    const runner = createPipelineRunner({
      executor,
      secrets: createStaticSecretProvider({}),
      reporters: [reporter],
      now: createClock(),
    })

    await runner.run(loadPipeline(RELEASE_PIPELINE), pushEvent)

    expect(events).toEqual([
      'pipeline:start:release',
      'step:start:A:0',
      'step:complete:A:succeeded',
      'step:complete:B:skipped',
      'step:start:C:2',
      'step:complete:C:succeeded',
      'pipeline:complete:succeeded',
    ])
  })
})
