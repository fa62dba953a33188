import { attachmentDisposition, paths } from '../api/paths.js';
import {
  createdResourceSchema,
  userAccountSchema,
  type CreateDatabaseBody,
  type CreateUserBody,
  type UpdateUserBody,
} from '../api/schemas/mediaSchemas.js';
import type { HarnessConfig } from '../config/index.js';
import {
  AssertionFailure,
  ReadinessTimeoutError,
  errorMessage,
  TransportError,
} from '../core/errors.js';
import type {
  Fixture,
  TeardownReport,
  WellKnownResources,
  WorkflowState,
} from '../core/types.js';
import { EventBus } from '../events/eventBus.js';
import {
  CredentialedSession,
  createCredential,
  type ApiResponse,
  type FetchLike,
} from '../http/session.js';
import { workflowStepLatencySeconds, workflowStepsTotal } from '../metrics/index.js';
import { getLogger } from '../utils/logging.js';
import { AssertionReporter } from './assertions.js';
import { FixtureProvisioner } from './fixtures.js';
import { ResourceLedger } from './ledger.js';
import { waitUntilReady, type ReadinessOptions } from './readiness.js';
import {
  FIXTURE_SPECS,
  FORBIDDEN_PROBE_DATABASE,
  INITIAL_USER_PERMISSIONS,
  REVOKED_PERMISSIONS,
  wellKnownResources,
} from './scenario.js';
import { TeardownExecutor } from './teardown.js';

export type FailureKind = 'readiness' | 'assertion' | 'transport' | 'unexpected';
export type WorkflowOutcome = 'passed' | 'failed' | 'not-ready';

export interface StepFailure {
  state: WorkflowState;
  kind: FailureKind;
  message: string;
  error: unknown;
}

export type StepResult =
  | { ok: true; state: WorkflowState; durationMs: number }
  | { ok: false; state: WorkflowState; durationMs: number; failure: StepFailure };

export interface WorkflowResult {
  outcome: WorkflowOutcome;
  failure?: StepFailure;
  visited: WorkflowState[];
  steps: StepResult[];
  preCleanup: TeardownReport;
  teardown: TeardownReport;
}

export interface WorkflowEvents {
  [k: string]: unknown;
  stateEntered: { state: WorkflowState; from: WorkflowState | null };
  stepPassed: { state: WorkflowState; durationMs: number };
  stepFailed: StepFailure;
  teardownFinished: { phase: 'pre' | 'post'; report: TeardownReport };
}

export type ReadinessProbe = (baseUrl: string, opts: ReadinessOptions) => Promise<boolean>;

export interface WorkflowOptions {
  config: HarnessConfig;
  fetchImpl?: FetchLike;
  bus?: EventBus<WorkflowEvents>;
  ledger?: ResourceLedger;
  fixtures?: FixtureProvisioner;
  probe?: ReadinessProbe;
}

interface UploadedEntry {
  fixture: Fixture;
  database: string;
  id: string;
}

type Step = readonly [WorkflowState, () => Promise<void>];

function classifyFailure(state: WorkflowState, err: unknown): StepFailure {
  const message = errorMessage(err);
  let kind: FailureKind = 'unexpected';
  if (err instanceof AssertionFailure) kind = 'assertion';
  else if (err instanceof ReadinessTimeoutError) kind = 'readiness';
  else if (err instanceof TransportError) kind = 'transport';
  return { state, kind, message, error: err };
}

function isSuccess(res: ApiResponse): boolean {
  return res.status >= 200 && res.status < 300;
}

// Returns the created id if the body carries one; never throws
function readCreatedId(res: ApiResponse): string | undefined {
  let body: unknown;
  try {
    body = res.json();
  } catch {
    return undefined;
  }
  const parsed = createdResourceSchema.safeParse(body);
  return parsed.success ? parsed.data.id : undefined;
}

/** One-line, human-readable outcome of a run. */
export function summarizeResult(result: WorkflowResult): string {
  if (result.outcome === 'passed') return 'Workflow PASSED';
  const f = result.failure;
  const where = f ? `${f.state}: ${f.message}` : 'unknown step';
  if (result.outcome === 'not-ready') return `Workflow ABORTED (server not ready) at ${where}`;
  return `Workflow FAILED at ${where}`;
}

/**
 * Runs the fixed end-to-end scenario against the media API:
 *
 * INIT → PRECLEANUP → READY_CHECK → USER_ADMIN_OPS → DB_CREATE → ENTRY_UPLOAD →
 * ENTRY_VERIFY → ROLE_UPDATE → PERMISSION_RECHECK → USER_DELETE → DONE
 *
 * Any failed step moves to ABORT. DONE and ABORT both continue to TEARDOWN and
 * then EXIT, so cleanup runs on every path. Every step failure is turned into a
 * {@link StepResult} by a single runner; {@link run} itself never rejects.
 */
export class WorkflowOrchestrator {
  readonly bus: EventBus<WorkflowEvents>;
  readonly ledger: ResourceLedger;
  private readonly cfg: HarnessConfig;
  private readonly fetchImpl?: FetchLike;
  private readonly fixtures: FixtureProvisioner;
  private readonly probe: ReadinessProbe;
  private readonly reporter = new AssertionReporter();
  private readonly admin: CredentialedSession;
  private readonly teardownExecutor: TeardownExecutor;
  private readonly wellKnown: WellKnownResources;

  private current: WorkflowState | null = null;
  private visited: WorkflowState[] = [];
  private provisioned: Fixture[] = [];
  private userSession: CredentialedSession | null = null;
  private userId: string | null = null;
  private uploads: UploadedEntry[] = [];

  constructor(opts: WorkflowOptions) {
    this.cfg = opts.config;
    this.fetchImpl = opts.fetchImpl;
    this.bus = opts.bus ?? new EventBus<WorkflowEvents>();
    this.ledger = opts.ledger ?? new ResourceLedger();
    this.fixtures = opts.fixtures ?? new FixtureProvisioner(this.cfg.fixtures.dir);
    this.probe = opts.probe ?? waitUntilReady;
    this.admin = new CredentialedSession(
      createCredential(this.cfg.admin.username, this.cfg.admin.password),
      { baseUrl: this.cfg.api.baseUrl, mode: 'bare', ...this.sessionDefaults() },
    );
    this.teardownExecutor = new TeardownExecutor(this.admin, this.fixtures);
    this.wellKnown = wellKnownResources(this.cfg.testUser.username);
  }

  get state(): WorkflowState | null {
    return this.current;
  }

  async run(): Promise<WorkflowResult> {
    const log = getLogger();
    log.info({ baseUrl: this.cfg.api.baseUrl }, 'Starting backend workflow');
    await this.transition('INIT');

    // Pre-cleanup works from a throwaway ledger: nothing from this run exists yet
    let preCleanup: TeardownReport = { results: [], failures: 0 };
    const steps: StepResult[] = [];
    const prep = await this.runStep('PRECLEANUP', async () => {
      preCleanup = await this.teardownExecutor.run(new ResourceLedger(), this.wellKnown);
      await this.bus.emit('teardownFinished', { phase: 'pre', report: preCleanup });
      this.provisioned = this.fixtures.createAll();
    });
    steps.push(prep);

    const scenario: Step[] = [
      ['READY_CHECK', () => this.readyCheck()],
      ['USER_ADMIN_OPS', () => this.userAdminOps()],
      ['DB_CREATE', () => this.createDatabases()],
      ['ENTRY_UPLOAD', () => this.uploadEntries()],
      ['ENTRY_VERIFY', () => this.verifyEntries()],
      ['ROLE_UPDATE', () => this.updateRoles()],
      ['PERMISSION_RECHECK', () => this.recheckPermissions()],
      ['USER_DELETE', () => this.deleteUser()],
    ];
    let failure = prep.ok ? undefined : prep.failure;
    for (const [state, body] of scenario) {
      if (failure) break;
      const result = await this.runStep(state, body);
      steps.push(result);
      if (!result.ok) failure = result.failure;
    }

    await this.transition(failure ? 'ABORT' : 'DONE');
    if (failure) log.error({ state: failure.state, reason: failure.message }, 'Workflow FAILED');
    else log.info('Workflow completed successfully');

    await this.transition('TEARDOWN');
    const teardown = await this.teardown();
    await this.transition('EXIT');

    let outcome: WorkflowOutcome = 'passed';
    if (failure) outcome = failure.kind === 'readiness' ? 'not-ready' : 'failed';
    return { outcome, failure, visited: [...this.visited], steps, preCleanup, teardown };
  }

  private sessionDefaults() {
    return { timeoutMs: this.cfg.http.requestTimeoutMs, fetchImpl: this.fetchImpl };
  }

  private async transition(state: WorkflowState): Promise<void> {
    const from = this.current;
    this.current = state;
    this.visited.push(state);
    this.reporter.enter(state);
    getLogger().debug({ from, to: state }, 'workflow-transition');
    await this.bus.emit('stateEntered', { state, from });
  }

  private async runStep(state: WorkflowState, body: () => Promise<void>): Promise<StepResult> {
    await this.transition(state);
    const start = Date.now();
    const endTimer = workflowStepLatencySeconds.startTimer({ state });
    try {
      await body();
    } catch (err) {
      endTimer();
      const failure = classifyFailure(state, err);
      workflowStepsTotal.inc({ state, result: 'failed' });
      await this.bus.emit('stepFailed', failure);
      return { ok: false, state, durationMs: Date.now() - start, failure };
    }
    endTimer();
    const durationMs = Date.now() - start;
    workflowStepsTotal.inc({ state, result: 'passed' });
    await this.bus.emit('stepPassed', { state, durationMs });
    return { ok: true, state, durationMs };
  }

  private async teardown(): Promise<TeardownReport> {
    this.userSession?.invalidate();
    this.userSession = null;
    let report: TeardownReport;
    try {
      report = await this.teardownExecutor.run(this.ledger, this.wellKnown);
    } catch (err) {
      getLogger().error({ err }, 'Teardown aborted unexpectedly');
      const detail = errorMessage(err);
      report = {
        results: [{ kind: 'fixture', key: this.fixtures.dir, outcome: 'failed', detail }],
        failures: 1,
      };
    }
    await this.bus.emit('teardownFinished', { phase: 'post', report });
    return report;
  }

  /**
   * Session for the regular user. Opening a new one is the only supported way
   * to observe permission changes made after the previous session started.
   */
  private openUserSession(): CredentialedSession {
    this.userSession?.invalidate();
    this.userSession = new CredentialedSession(
      createCredential(this.cfg.testUser.username, this.cfg.testUser.password),
      { baseUrl: this.cfg.api.baseUrl, mode: 'persistent', ...this.sessionDefaults() },
    );
    return this.userSession;
  }

  private user(): CredentialedSession {
    return this.userSession ?? this.openUserSession();
  }

  private requireUserId(): string {
    if (this.userId === null) {
      const state = this.reporter.currentState;
      throw new AssertionFailure('No user id available from USER_ADMIN_OPS', state);
    }
    return this.userId;
  }

  private async readyCheck(): Promise<void> {
    const { timeoutMs, intervalMs, probeTimeoutMs } = this.cfg.readiness;
    const ready = await this.probe(this.cfg.api.baseUrl, {
      timeoutMs,
      intervalMs,
      probeTimeoutMs,
      fetchImpl: this.fetchImpl,
    });
    if (!ready) throw new ReadinessTimeoutError(this.cfg.api.baseUrl, timeoutMs);
  }

  private async userAdminOps(): Promise<void> {
    const log = getLogger();
    const listing = await this.admin.get(paths.users);
    this.reporter.expectStatus(listing, 200, 'Getting users');
    log.info('Users retrieved successfully');

    const { username, password } = this.cfg.testUser;
    const body: CreateUserBody = { username, password, ...INITIAL_USER_PERMISSIONS };
    const created = await this.admin.post(paths.user, { json: body });
    const id = isSuccess(created) ? readCreatedId(created) : undefined;
    if (id !== undefined) this.ledger.record('user', id, this.admin.identity);
    this.reporter.expectStatus(created, 201, `Creating user '${username}'`);
    this.reporter.check(id !== undefined, `Creating user '${username}': response carries no id`);
    this.userId = id ?? null;
    log.info({ userId: id }, `User '${username}' created`);
  }

  private async createDatabases(): Promise<void> {
    const session = this.openUserSession();
    for (const spec of FIXTURE_SPECS) {
      const body: CreateDatabaseBody = spec.database;
      const { name } = body;
      const res = await session.post(paths.database, { json: body });
      if (isSuccess(res)) this.ledger.record('database', name, session.identity);
      this.reporter.expectStatus(res, 201, `Creating database '${name}'`);
      getLogger().info({ database: name }, `Database '${name}' created`);
    }
  }

  private async uploadEntries(): Promise<void> {
    const session = this.user();
    for (const spec of FIXTURE_SPECS) {
      const fixture = this.provisioned.find((f) => f.contentType === spec.contentType);
      this.reporter.check(fixture !== undefined, `No ${spec.contentType} fixture was provisioned`);
      if (!fixture) return;
      const database = spec.database.name;
      const form = new FormData();
      form.append('metadata', JSON.stringify(fixture.metadata));
      form.append(
        'file',
        new Blob([this.fixtures.read(fixture)], { type: fixture.mediaType }),
        fixture.filename,
      );
      const res = await session.post(paths.entry, {
        query: { database_name: database },
        form,
        timeoutMs: this.cfg.http.transferTimeoutMs,
      });
      const id = isSuccess(res) ? readCreatedId(res) : undefined;
      if (id !== undefined) this.ledger.record('entry', id, session.identity, database);
      this.reporter.expectStatus(res, 201, `Uploading ${spec.contentType}`);
      this.reporter.check(
        id !== undefined,
        `Uploading ${spec.contentType}: response carries no id`,
      );
      if (id === undefined) return;
      this.uploads.push({ fixture, database, id });
      getLogger().info({ database, id }, `${spec.contentType} uploaded`);
    }
  }

  private async verifyEntries(): Promise<void> {
    const session = this.user();
    this.reporter.check(this.uploads.length > 0, 'No uploaded entries to verify');
    for (const { fixture, database, id } of this.uploads) {
      const what = `Downloading ${fixture.contentType} ${database}/${id}`;
      const res = await session.get(paths.entryFile, {
        query: { database_name: database, id },
        timeoutMs: this.cfg.http.transferTimeoutMs,
      });
      this.reporter.expectStatus(res, 200, what);
      this.reporter.expectHeader(res, 'content-type', fixture.mediaType, what);
      this.reporter.expectHeader(
        res,
        'content-disposition',
        attachmentDisposition(fixture.filename),
        what,
      );
      this.reporter.expectBytes(res.body, this.fixtures.read(fixture), what);
      getLogger().info({ database, id }, `${fixture.contentType} entry verified`);
    }
  }

  private async updateRoles(): Promise<void> {
    const id = this.requireUserId();
    const update: UpdateUserBody = REVOKED_PERMISSIONS;
    const res = await this.admin.patch(paths.user, { query: { id }, json: update });
    const what = `Updating roles for '${this.cfg.testUser.username}'`;
    this.reporter.expectStatus(res, 200, what);
    let body: unknown;
    try {
      body = res.json();
    } catch {
      body = undefined;
    }
    const parsed = userAccountSchema.safeParse(body);
    this.reporter.check(
      parsed.success && parsed.data.can_create === false,
      `${what}: response does not show can_create revoked`,
    );
    getLogger().info({ userId: id, ...REVOKED_PERMISSIONS }, 'User roles updated');
  }

  private async recheckPermissions(): Promise<void> {
    // A session opened before the role change may carry a cached grant
    const session = this.openUserSession();
    const body: CreateDatabaseBody = FORBIDDEN_PROBE_DATABASE;
    const { name } = body;
    const res = await session.post(paths.database, { json: body });
    if (isSuccess(res)) this.ledger.record('database', name, session.identity);
    this.reporter.check(
      res.status === 403,
      `User should not be able to create database '${name}', but got status code ${res.status}`,
    );
    getLogger().info('Verified that the user can no longer create a database');
  }

  private async deleteUser(): Promise<void> {
    const id = this.requireUserId();
    const res = await this.admin.delete(paths.user, { query: { id } });
    this.reporter.expectStatus(res, 200, `Deleting user '${this.cfg.testUser.username}'`);
    getLogger().info({ userId: id }, 'User deleted');
  }
}
