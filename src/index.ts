export { loadConfig } from './config/index.js';
export type { HarnessConfig, ConfigOverrides, LoggingConfig } from './config/index.js';
export * from './core/errors.js';
export type * from './core/types.js';
export { EventBus } from './events/eventBus.js';
export { CredentialedSession, createCredential } from './http/session.js';
export type { ApiResponse, FetchLike, RequestOptions, SessionMode } from './http/session.js';
export { registry, metricsSummary } from './metrics/index.js';
export { getLogger, initLogger } from './utils/logging.js';
export { AssertionReporter } from './services/assertions.js';
export { FixtureProvisioner } from './services/fixtures.js';
export { ResourceLedger } from './services/ledger.js';
export { waitUntilReady } from './services/readiness.js';
export type { ReadinessOptions } from './services/readiness.js';
export { TeardownExecutor } from './services/teardown.js';
export { WorkflowOrchestrator, summarizeResult } from './services/workflow.js';
export type {
  StepFailure,
  StepResult,
  WorkflowEvents,
  WorkflowOptions,
  WorkflowResult,
} from './services/workflow.js';
