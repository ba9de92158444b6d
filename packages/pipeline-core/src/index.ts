export type {
  ConditionDocument,
  ConditionValues,
  PipelineDocument,
  PipelineStepDocument,
  SettingDocumentValue,
} from './contracts/document.js'
export type { PipelineEvent, PipelineEventInput, PipelineEventKind } from './contracts/event.js'
export { isPipelineEventKind, PIPELINE_EVENT_KINDS } from './contracts/event.js'
export type {
  StepExecutionOutcome,
  StepExecutionRequest,
  StepExecutor,
} from './contracts/executor.js'
export type { Pipeline } from './contracts/pipeline.js'
export type {
  AlwaysPredicate,
  AndPredicate,
  BranchInPredicate,
  EventEqualsPredicate,
  NotPredicate,
  Predicate,
  RefGlobPredicate,
  RepoGlobPredicate,
} from './contracts/predicate.js'
export type { PipelineReporter } from './contracts/reporter.js'
export type {
  PipelinePlan,
  PipelineRunnerOptions,
  PlannedStep,
  RunReport,
  RunStatus,
  RunSummary,
  StepErrorSummary,
  StepOutput,
  StepResult,
  StepResultReason,
  StepStatus,
} from './contracts/run.js'
export type { SecretProvider } from './contracts/secrets.js'
export type {
  ExecutorReference,
  PipelineStep,
  ResolvedSettingValue,
  SecretReference,
  SettingValue,
  StepFailurePolicy,
} from './contracts/step.js'
export { isSecretReference } from './contracts/step.js'

export {
  ConfigError,
  ExecutorError,
  PipelineError,
  PredicateError,
  SecretResolutionError,
  type PipelineErrorKind,
} from './errors/pipelineErrors.js'

export {
  buildContainerInvocation,
  CONTAINER_WORKSPACE,
  createContainerStepExecutor,
  type ContainerInvocation,
  type ContainerStepExecutorOptions,
} from './execution/containerStepExecutor.js'
export { encodeSettingValue, settingsToEnvironment } from './execution/pluginEnvironment.js'
export {
  buildCommandScript,
  createShellStepExecutor,
  quoteShellArgument,
} from './execution/shellStepExecutor.js'

export {
  loadPipeline,
  loadPipelines,
  parsePipelineDocument,
  parsePipelineDocuments,
  selectPipeline,
  type LoadPipelineOptions,
} from './loader/loadPipeline.js'

export { ALWAYS, describePredicate, evaluatePredicate } from './predicates/evaluatePredicate.js'
export { globToRegExp, matchesGlob } from './predicates/globPattern.js'
export { parsePredicate } from './predicates/parsePredicate.js'

export { formatPipelinePlanAsJson, formatRunReportAsJson } from './reporters/jsonFormatter.js'

export { createPipelineEvent } from './runner/pipelineEvent.js'
export { createPipelineRunner, PipelineRunner, runPipeline } from './runner/pipelineRunner.js'
export { planPipeline } from './runner/planPipeline.js'
export { buildRunVariables, maskSecrets, substituteVariables } from './runner/runVariables.js'

export {
  createChainedSecretProvider,
  createEnvSecretProvider,
  createStaticSecretProvider,
  DEFAULT_SECRET_ENV_PREFIX,
  toEnvironmentKey,
  type EnvSecretProviderOptions,
} from './secrets/secretProviders.js'
