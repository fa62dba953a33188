import type { WorkflowState } from './types.js';

export class HarnessError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

export class ConfigError extends HarnessError {}

export class ReadinessTimeoutError extends HarnessError {
  constructor(
    public baseUrl: string,
    public timeoutMs: number,
  ) {
    super(`Server at ${baseUrl} did not become ready within ${timeoutMs}ms`);
  }
}

export class AssertionFailure extends HarnessError {
  constructor(
    message: string,
    public state: WorkflowState,
  ) {
    super(message);
  }
}

export class TransportError extends HarnessError {
  constructor(
    public method: string,
    public url: string,
    cause: unknown,
  ) {
    super(`${method} ${url} failed: ${describeCause(cause)}`, cause);
  }
}

export class SessionInvalidatedError extends HarnessError {
  constructor(identity: string) {
    super(`Session for '${identity}' was invalidated; acquire a new session`);
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    // fetch wraps socket errors (ECONNREFUSED etc.) one level down
    const inner = cause.cause;
    if (inner instanceof Error && inner.message) return `${cause.message} (${inner.message})`;
    return cause.message;
  }
  return String(cause);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
