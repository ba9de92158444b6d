import type {
  Pipeline,
  PipelineEvent,
  PipelineReporter,
  PipelineStep,
  RunReport,
  StepResult,
} from '@relayci/pipeline-core'

/**
 * Options for the pretty console reporter.
 */
export interface PrettyReporterOptions {
  /** Emits stdout/stderr also for successful steps. */
  readonly verbose: boolean
}

/**
 * Compact console reporter with failure-focused detail output.
 */
export class PrettyReporter implements PipelineReporter {
  private readonly options: PrettyReporterOptions

  /**
   * Creates a pretty reporter.
   *
   * @param options Reporter options.
   */
  public constructor(options: PrettyReporterOptions) {
    this.options = options
  }

  /**
   * Handles pipeline start.
   *
   * @param pipeline Pipeline about to run.
   * @param event Run event.
   */
  public onPipelineStart(pipeline: Pipeline, event: PipelineEvent): void {
    process.stdout.write(
      colorize(
        `relayci: running pipeline ${pipeline.name} (${pipeline.steps.length} steps) for ${event.eventKind} ${event.ref}\n`,
        'blue'
      )
    )
  }

  /**
   * Handles step start.
   *
   * @param step Current step.
   */
  public onStepStart(step: PipelineStep): void {
    process.stdout.write(colorize(`-> ${step.name} (${step.executor.image})\n`, 'blue'))
  }

  /**
   * Handles step completion.
   *
   * @param result Step result.
   */
  public onStepComplete(result: StepResult): void {
    const duration = `${result.durationMs}ms`
    if (result.status === 'succeeded') {
      process.stdout.write(colorize(`✓ ${result.stepName} ${duration}\n`, 'green'))
      if (this.options.verbose) {
        this.printOutput(result)
      }
      return
    }

    if (result.status === 'skipped') {
      process.stdout.write(
        colorize(`ℹ ${result.stepName} skipped (${result.reason ?? 'no reason'})\n`, 'yellow')
      )
      return
    }

    const details = [result.reason ?? 'no reason', duration]
    if (result.exitCode !== undefined) {
      details.push(`exit code ${result.exitCode}`)
    }
    if (result.failureIgnored) {
      details.push('ignored')
    }

    process.stdout.write(
      colorize(
        `✗ ${result.stepName} failed (${details.join(', ')})\n`,
        result.failureIgnored ? 'yellow' : 'red'
      )
    )
    if (result.error) {
      process.stdout.write(`  ${result.error.name}: ${result.error.message}\n`)
    }
    this.printOutput(result)
  }

  /**
   * Handles pipeline completion.
   *
   * @param report Run report.
   */
  public onPipelineComplete(report: RunReport): void {
    const summary = report.summary
    process.stdout.write('\n')

    if (!report.triggered) {
      process.stdout.write(
        colorize(
          `Pipeline ${report.pipelineName} is not triggered by ${report.event.eventKind} ${report.event.ref}\n`,
          'yellow'
        )
      )
      process.stdout.write(colorize('Result: SKIPPED\n', 'yellow'))
      return
    }

    process.stdout.write(
      `Summary: total=${summary.total} succeeded=${summary.succeeded} skipped=${summary.skipped} failed=${summary.failed} duration=${summary.durationMs}ms\n`
    )

    if (report.exitCode === 0) {
      process.stdout.write(colorize('Result: ✅ PASS\n', 'green'))
      return
    }

    process.stdout.write(colorize('Result: FAIL\n', 'red'))
  }

  private printOutput(result: StepResult): void {
    const stdout = result.output.stdout.trim()
    const stderr = result.output.stderr.trim()

    if (stdout) {
      process.stdout.write(colorize('  stdout:\n', 'yellow'))
      process.stdout.write(indent(stdout))
      process.stdout.write('\n')
    }

    if (stderr) {
      process.stdout.write(colorize('  stderr:\n', 'yellow'))
      process.stdout.write(indent(stderr))
      process.stdout.write('\n')
    }
  }
}

const indent = (text: string): string => {
  return text
    .split('\n')
    .map((line) => `    ${line}`)
    .join('\n')
}

/**
 * Wraps text in an ANSI color sequence.
 *
 * @param text Text to color.
 * @param color Color name.
 * @returns Colored text.
 */
export const colorize = (text: string, color: 'red' | 'green' | 'yellow' | 'blue'): string => {
  const colors: Record<'red' | 'green' | 'yellow' | 'blue', string> = {
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
  }

  return `${colors[color]}${text}\x1b[0m`
}
