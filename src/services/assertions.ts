import { AssertionFailure } from '../core/errors.js';
import type { WorkflowState } from '../core/types.js';
import type { ApiResponse } from '../http/session.js';
import { getLogger } from '../utils/logging.js';

const BODY_EXCERPT_LIMIT = 200;

export function bodyExcerpt(res: ApiResponse): string {
  const text = res.text().trim();
  return text.length > BODY_EXCERPT_LIMIT ? `${text.slice(0, BODY_EXCERPT_LIMIT)}...` : text;
}

/**
 * Evaluates expectations for the current workflow state. A failed check throws
 * {@link AssertionFailure}; the orchestrator's step runner turns that into a
 * failed step result and moves on to teardown.
 */
export class AssertionReporter {
  private state: WorkflowState = 'INIT';

  enter(state: WorkflowState): void {
    this.state = state;
  }

  get currentState(): WorkflowState {
    return this.state;
  }

  check(condition: boolean, message: string): void {
    if (condition) return;
    getLogger().error({ state: this.state, reason: message }, 'assertion-failed');
    throw new AssertionFailure(`[${this.state}] ${message}`, this.state);
  }

  expectStatus(res: ApiResponse, expected: number, what: string): void {
    this.check(
      res.status === expected,
      `${what}: expected status ${expected}, got ${res.status} ${bodyExcerpt(res)}`.trimEnd(),
    );
  }

  expectHeader(res: ApiResponse, name: string, expected: string, what: string): void {
    const actual = res.headers.get(name);
    this.check(
      actual === expected,
      `${what}: expected ${name} '${expected}', got ${actual === null ? 'no header' : `'${actual}'`}`,
    );
  }

  expectBytes(actual: Buffer, expected: Buffer, what: string): void {
    this.check(
      actual.equals(expected),
      `${what}: content mismatch (expected ${expected.length} bytes, got ${actual.length} bytes)`,
    );
  }
}
