import { Counter, Histogram, Registry } from 'prom-client';

export const registry = new Registry();

export const workflowStepsTotal = new Counter({
  name: 'workflow_steps_total',
  help: 'Workflow steps executed, by state and result',
  labelNames: ['state', 'result'] as const, // result=passed|failed
  registers: [registry],
});

export const workflowStepLatencySeconds = new Histogram({
  name: 'workflow_step_latency_seconds',
  help: 'Wall-clock duration of a workflow step (seconds)',
  labelNames: ['state'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10, 30],
  registers: [registry],
});

export const httpRequestsTotal = new Counter({
  name: 'http_requests_total',
  help: 'Requests issued against the media API, by method and status',
  labelNames: ['method', 'status'] as const, // status='error' on transport failure
  registers: [registry],
});

export const readinessProbeAttemptsTotal = new Counter({
  name: 'readiness_probe_attempts_total',
  help: 'Readiness probe attempts',
  labelNames: ['result'] as const, // result=ready|not_ready|unreachable
  registers: [registry],
});

export const teardownDeletionsTotal = new Counter({
  name: 'teardown_deletions_total',
  help: 'Cleanup deletions attempted during teardown',
  labelNames: ['kind', 'outcome'] as const,
  registers: [registry],
});

export function metricsSummary() {
  return registry.metrics();
}
