import { tmpdir } from 'node:os'

import { describe, expect, it } from 'vitest'

import {
  buildCommandScript,
  buildContainerInvocation,
  createContainerStepExecutor,
  createPipelineEvent,
  createPipelineRunner,
  createShellStepExecutor,
  createStaticSecretProvider,
  encodeSettingValue,
  loadPipeline,
  settingsToEnvironment,
  type StepExecutionRequest,
} from '../src/index.js'

const createRequest = (overrides: Partial<StepExecutionRequest> = {}): StepExecutionRequest => {
  return {
    stepName: 'build',
    image: 'alpine:3',
    commands: [],
    settings: {},
    environment: {},
    secrets: new Map(),
    cwd: tmpdir(),
    ...overrides,
  }
}

describe('settingsToEnvironment', () => {
  it('maps settings to PLUGIN_ variables', () => {
    expect(
      settingsToEnvironment({
        api_key: 'test-secret',
        'skip-build': true,
        retries: 3,
        files: ['dist/*', 'README.md'],
        checksum: [['sha256']],
        target: { host: 'example.test' },
        unset: null,
      })
    ).toEqual({
      PLUGIN_API_KEY: 'test-secret',
      PLUGIN_SKIP_BUILD: 'true',
      PLUGIN_RETRIES: '3',
      PLUGIN_FILES: 'dist/*,README.md',
      PLUGIN_CHECKSUM: '[["sha256"]]',
      PLUGIN_TARGET: '{"host":"example.test"}',
    })
  })

  it('leaves null values unencoded', () => {
    expect(encodeSettingValue(null)).toBeUndefined()
    expect(encodeSettingValue(false)).toBe('false')
  })
})

describe('buildCommandScript', () => {
  it('echoes each command before running it under set -e', () => {
    expect(buildCommandScript(['pip install build', "echo 'done'"])).toBe(
      [
        'set -e',
        "echo '+ pip install build'",
        'pip install build',
        "echo '+ echo '\\''done'\\'''",
        "echo 'done'",
      ].join('\n')
    )
  })
})

describe('createShellStepExecutor', () => {
  it('runs commands with step environment and plugin settings', async () => {
    const executor = createShellStepExecutor()

    const outcome = await executor.execute(
      createRequest({
        commands: ['echo "$PLUGIN_GREETING $CI_BRANCH"'],
        settings: { greeting: 'hello' },
        environment: { CI_BRANCH: 'master' },
      })
    )

    expect(outcome.exitCode).toBe(0)
    expect(outcome.timedOut).toBe(false)
    expect(outcome.error).toBeUndefined()
    expect(outcome.stdout).toBe('+ echo "$PLUGIN_GREETING $CI_BRANCH"\nhello master\n')
  })

  it('stops at the first failing command', async () => {
    const executor = createShellStepExecutor()

    const outcome = await executor.execute(createRequest({ commands: ['exit 3', 'echo never'] }))

    expect(outcome.exitCode).toBe(3)
    expect(outcome.stdout).toBe('+ exit 3\n')
  })

  it('kills commands started by the step when the timeout expires', async () => {
    const executor = createShellStepExecutor()
    const startedAt = Date.now()

    const outcome = await executor.execute(
      createRequest({ commands: ['echo start', 'sleep 4', 'echo after'], timeoutMs: 200 })
    )

    expect(Date.now() - startedAt).toBeLessThan(1500)
    expect(outcome.timedOut).toBe(true)
    expect(outcome.exitCode).toBeNull()
    expect(outcome.stdout).toMatch(/^\+ echo start\nstart\n/)
    expect(outcome.stdout).not.toContain('after')
  })

  it('returns an error outcome for plugin steps without commands', async () => {
    const executor = createShellStepExecutor()

    const outcome = await executor.execute(
      createRequest({ stepName: 'publish', image: 'plugins/pypi' })
    )

    expect(outcome.exitCode).toBeNull()
    expect(outcome.error).toBeInstanceOf(Error)
    expect(outcome.error instanceof Error ? outcome.error.message : '').toBe(
      'Step "publish" has no commands; plugin image plugins/pypi needs the container executor'
    )
  })
})

describe('buildContainerInvocation', () => {
  it('runs command steps through /bin/sh with the workspace mounted', () => {
    const invocation = buildContainerInvocation(
      createRequest({
        cwd: '/srv/repo',
        commands: ['python -m build'],
        environment: { CI_TAG: 'v1.0.0' },
      })
    )

    expect(invocation.args).toEqual([
      'run',
      '--rm',
      '--volume',
      '/srv/repo:/workspace',
      '--workdir',
      '/workspace',
      '--env',
      'CI_TAG',
      '--env',
      'CI_WORKSPACE',
      '--entrypoint',
      '/bin/sh',
      'alpine:3',
      '-c',
      "set -e\necho '+ python -m build'\npython -m build",
    ])
    expect(invocation.environment).toEqual({ CI_TAG: 'v1.0.0', CI_WORKSPACE: '/workspace' })
  })

  it('keeps plugin entrypoints and passes secret values by name only', () => {
    const invocation = buildContainerInvocation(
      createRequest({
        cwd: '/srv/repo',
        image: 'plugins/github-release',
        settings: { api_key: 'test-secret' },
        secrets: new Map([['github_token', 'test-secret']]),
      })
    )

    expect(invocation.args).toEqual([
      'run',
      '--rm',
      '--volume',
      '/srv/repo:/workspace',
      '--workdir',
      '/workspace',
      '--env',
      'CI_WORKSPACE',
      '--env',
      'PLUGIN_API_KEY',
      'plugins/github-release',
    ])
    expect(invocation.args).not.toContain('test-secret')
    expect(invocation.environment.PLUGIN_API_KEY).toBe('test-secret')
  })
})

describe('createContainerStepExecutor', () => {
  it('fails the step with an executor error when the runtime binary is missing', async () => {
    const pipeline = loadPipeline(
      ['kind: pipeline', 'steps:', '  - name: build', '    image: alpine:3', '    commands: [echo hi]'].join(
        '\n'
      )
    )
    const runner = createPipelineRunner({
      executor: createContainerStepExecutor({ runtime: 'relayci-missing-runtime' }),
      secrets: createStaticSecretProvider({}),
      cwd: tmpdir(),
    })

    const report = await runner.run(
      pipeline,
      createPipelineEvent({ eventKind: 'push', branch: 'main', repoSlug: 'acme/tools' })
    )

    expect(report.status).toBe('failed')
    expect(report.exitCode).toBe(1)
    expect(report.steps).toHaveLength(1)
    expect(report.steps[0]?.status).toBe('failed')
    expect(report.steps[0]?.reason).toBe('executor_error')
    expect(report.steps[0]?.error?.name).toBe('ExecutorError')
    expect(report.steps[0]?.error?.message).toContain('ENOENT')
  })
})
