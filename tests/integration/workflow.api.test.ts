import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { loadConfig, type HarnessConfig } from '../../src/config/index.js';
import type { WorkflowState } from '../../src/core/types.js';
import { CredentialedSession, createCredential } from '../../src/http/session.js';
import { WorkflowOrchestrator, summarizeResult } from '../../src/services/workflow.js';
import {
  ADMIN,
  FAKE_BASE_URL,
  createFakeMediaServer,
  refusedFetch,
  type FakeMediaServer,
  type FakeServerOptions,
} from '../utils/fakeMediaServer.js';

const HAPPY_PATH: WorkflowState[] = [
  'INIT',
  'PRECLEANUP',
  'READY_CHECK',
  'USER_ADMIN_OPS',
  'DB_CREATE',
  'ENTRY_UPLOAD',
  'ENTRY_VERIFY',
  'ROLE_UPDATE',
  'PERMISSION_RECHECK',
  'USER_DELETE',
  'DONE',
  'TEARDOWN',
  'EXIT',
];

describe('WorkflowOrchestrator against the in-process media API', () => {
  let server: FakeMediaServer;
  let dir: string;
  let cfg: HarnessConfig;

  async function start(opts?: FakeServerOptions) {
    server = await createFakeMediaServer(opts);
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'harness-workflow-'));
    cfg = loadConfig('does-not-exist.json', {
      api: { baseUrl: FAKE_BASE_URL },
      admin: ADMIN,
      fixtures: { dir },
      readiness: { timeoutMs: 50, intervalMs: 1 },
    });
  });

  afterEach(async () => {
    await server.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('passes the full scenario and leaves the server clean', async () => {
    await start();
    const orchestrator = new WorkflowOrchestrator({ config: cfg, fetchImpl: server.fetch });
    const passed: WorkflowState[] = [];
    orchestrator.bus.on('stepPassed', ({ state }) => {
      passed.push(state);
    });

    const result = await orchestrator.run();

    expect(result.failure).toBeUndefined();
    expect(result.outcome).toBe('passed');
    expect(summarizeResult(result)).toBe('Workflow PASSED');
    expect(result.visited).toEqual(HAPPY_PATH);
    expect(passed).toEqual(HAPPY_PATH.slice(1, 10));
    expect(orchestrator.state).toBe('EXIT');
    expect(result.teardown.failures).toBe(0);
    expect(Array.from(server.state.users.keys())).toEqual([1]);
    expect(server.state.databases.size).toBe(0);
    expect(fs.readdirSync(dir)).toEqual([]);
  });

  it('uploads the fixture payloads byte for byte', async () => {
    await start();
    const orchestrator = new WorkflowOrchestrator({ config: cfg, fetchImpl: server.fetch });
    let stored: Buffer | undefined;
    orchestrator.bus.on('stateEntered', ({ state }) => {
      if (state === 'ROLE_UPDATE') stored = server.state.entries.get('test_file_db')?.get(3)?.bytes;
    });
    await orchestrator.run();
    expect(stored?.toString('utf8')).toBe('dummy file data');
  });

  it('records every resource it created in the ledger', async () => {
    await start();
    const orchestrator = new WorkflowOrchestrator({ config: cfg, fetchImpl: server.fetch });
    await orchestrator.run();
    expect(orchestrator.ledger.drain().map((r) => `${r.kind}:${r.key}:${r.owner}`)).toEqual([
      'entry:1:testuser',
      'entry:2:testuser',
      'entry:3:testuser',
      'database:test_image_db:testuser',
      'database:test_audio_db:testuser',
      'database:test_file_db:testuser',
      'user:2:admin',
    ]);
  });

  it('fails the permission recheck when the role change does not take effect', async () => {
    await start({ ignorePermissionUpdates: true });
    const result = await new WorkflowOrchestrator({ config: cfg, fetchImpl: server.fetch }).run();

    expect(result.outcome).toBe('failed');
    expect(result.failure?.state).toBe('PERMISSION_RECHECK');
    expect(result.failure?.kind).toBe('assertion');
    expect(result.failure?.message).toBe(
      "[PERMISSION_RECHECK] User should not be able to create database 'test_db_2', but got status code 201",
    );
    expect(result.visited.slice(-4)).toEqual(['PERMISSION_RECHECK', 'ABORT', 'TEARDOWN', 'EXIT']);
    // the wrongly created probe database and the never-deleted user are both cleaned up
    expect(result.teardown.results).toContainEqual({
      kind: 'database',
      key: 'test_db_2',
      outcome: 'deleted',
    });
    expect(server.state.databases.size).toBe(0);
    expect(Array.from(server.state.users.keys())).toEqual([1]);
  });

  it('fails verification on a wrong content type', async () => {
    await start({ downloadContentType: 'application/octet-stream' });
    const result = await new WorkflowOrchestrator({ config: cfg, fetchImpl: server.fetch }).run();

    expect(result.outcome).toBe('failed');
    expect(result.failure?.message).toBe(
      "[ENTRY_VERIFY] Downloading image test_image_db/1: expected content-type 'image/png', got 'application/octet-stream'",
    );
    expect(summarizeResult(result)).toBe(
      `Workflow FAILED at ENTRY_VERIFY: ${result.failure?.message}`,
    );
    expect(server.state.databases.size).toBe(0);
  });

  it('fails verification when the downloaded bytes differ', async () => {
    await start({ corruptDownloads: true });
    const result = await new WorkflowOrchestrator({ config: cfg, fetchImpl: server.fetch }).run();

    expect(result.failure?.state).toBe('ENTRY_VERIFY');
    expect(result.failure?.message).toMatch(
      /^\[ENTRY_VERIFY\] Downloading image test_image_db\/1: content mismatch \(expected \d+ bytes, got \d+ bytes\)$/,
    );
  });

  it('aborts as not-ready without touching the API, yet still tears down', async () => {
    await start({ notReadyFor: 1000 });
    const notReadyCfg = { ...cfg, readiness: { ...cfg.readiness, timeoutMs: 0 } };
    const result = await new WorkflowOrchestrator({
      config: notReadyCfg,
      fetchImpl: server.fetch,
    }).run();

    expect(result.outcome).toBe('not-ready');
    expect(result.failure?.kind).toBe('readiness');
    expect(result.failure?.message).toBe(
      'Server at http://media.test/api did not become ready within 0ms',
    );
    expect(summarizeResult(result)).toBe(
      'Workflow ABORTED (server not ready) at READY_CHECK: Server at http://media.test/api did not become ready within 0ms',
    );
    expect(result.visited).toEqual([
      'INIT',
      'PRECLEANUP',
      'READY_CHECK',
      'ABORT',
      'TEARDOWN',
      'EXIT',
    ]);
    expect(server.state.infoCalls).toBe(1);
    expect(server.state.log.filter((l) => l.startsWith('POST'))).toEqual([]);
    expect(result.teardown.results.filter((r) => r.kind === 'fixture').map((r) => r.outcome)).toEqual([
      'deleted',
      'deleted',
      'deleted',
    ]);
  });

  it('reports an unreachable server as a transport failure', async () => {
    await start();
    const result = await new WorkflowOrchestrator({
      config: cfg,
      fetchImpl: refusedFetch,
      probe: async () => true,
    }).run();

    expect(result.outcome).toBe('failed');
    expect(result.failure?.state).toBe('USER_ADMIN_OPS');
    expect(result.failure?.kind).toBe('transport');
    expect(result.failure?.message).toBe(
      'GET http://media.test/api/users failed: fetch failed (connect ECONNREFUSED http://media.test/api/users)',
    );
    expect(result.preCleanup.failures).toBeGreaterThan(0);
  });

  it.each([
    {
      createdStatus: { user: 200 },
      state: 'USER_ADMIN_OPS',
      message: "[USER_ADMIN_OPS] Creating user 'testuser': expected status 201, got 200 ",
      ledger: ['user:2:admin'],
    },
    {
      createdStatus: { database: 200 },
      state: 'DB_CREATE',
      message: "[DB_CREATE] Creating database 'test_image_db': expected status 201, got 200 ",
      ledger: ['database:test_image_db:testuser', 'user:2:admin'],
    },
    {
      createdStatus: { entry: 200 },
      state: 'ENTRY_UPLOAD',
      message: '[ENTRY_UPLOAD] Uploading image: expected status 201, got 200 ',
      ledger: [
        'entry:1:testuser',
        'database:test_image_db:testuser',
        'database:test_audio_db:testuser',
        'database:test_file_db:testuser',
        'user:2:admin',
      ],
    },
  ])(
    'records a resource created with a non-201 success at $state, then fails and removes it',
    async ({ createdStatus, state, message, ledger }) => {
      await start({ createdStatus });
      const orchestrator = new WorkflowOrchestrator({ config: cfg, fetchImpl: server.fetch });
      const result = await orchestrator.run();

      expect(result.outcome).toBe('failed');
      expect(result.failure?.state).toBe(state);
      expect(result.failure?.message.startsWith(message)).toBe(true);
      expect(orchestrator.ledger.drain().map((r) => `${r.kind}:${r.key}:${r.owner}`)).toEqual(
        ledger,
      );
      expect(result.teardown.failures).toBe(0);
      expect(server.state.databases.size).toBe(0);
      expect(Array.from(server.state.users.keys())).toEqual([1]);
    },
  );

  it('fails database creation when a leftover database could not be removed', async () => {
    await start({ failDatabaseDeletes: true });
    server.state.databases.set('test_image_db', {
      name: 'test_image_db',
      content_type: 'image',
      custom_fields: [],
    });
    server.state.entries.set('test_image_db', new Map());

    const orchestrator = new WorkflowOrchestrator({ config: cfg, fetchImpl: server.fetch });
    const result = await orchestrator.run();

    expect(result.preCleanup.failures).toBe(4);
    expect(result.failure?.state).toBe('DB_CREATE');
    expect(result.failure?.message).toBe(
      `[DB_CREATE] Creating database 'test_image_db': expected status 201, got 409 {"error":"Database already exists"}`,
    );
    // the conflicting database belongs to someone else and is not recorded
    expect(orchestrator.ledger.drain().map((r) => `${r.kind}:${r.key}`)).toEqual(['user:2']);
    expect(Array.from(server.state.users.keys())).toEqual([1]);
  });

  it('fails the role update when the response still grants create', async () => {
    await start({ ignorePermissionUpdates: true, echoStoredUser: true });
    const result = await new WorkflowOrchestrator({ config: cfg, fetchImpl: server.fetch }).run();

    expect(result.outcome).toBe('failed');
    expect(result.failure?.message).toBe(
      "[ROLE_UPDATE] Updating roles for 'testuser': response does not show can_create revoked",
    );
    expect(result.visited.slice(-4)).toEqual(['ROLE_UPDATE', 'ABORT', 'TEARDOWN', 'EXIT']);
    expect(server.state.databases.size).toBe(0);
    expect(Array.from(server.state.users.keys())).toEqual([1]);
  });

  it('removes leftovers from an earlier aborted run before starting', async () => {
    await start();
    server.state.databases.set('test_audio_db', {
      name: 'test_audio_db',
      content_type: 'audio',
      custom_fields: [],
    });
    server.state.entries.set('test_audio_db', new Map());
    server.state.users.set(77, {
      id: 77,
      username: 'testuser',
      password: 'testpassword',
      can_view: true,
      can_create: false,
      can_edit: true,
      can_delete: false,
      is_admin: false,
    });

    const orchestrator = new WorkflowOrchestrator({ config: cfg, fetchImpl: server.fetch });
    const phases: string[] = [];
    orchestrator.bus.on('teardownFinished', ({ phase }) => {
      phases.push(phase);
    });
    const result = await orchestrator.run();

    expect(phases).toEqual(['pre', 'post']);
    expect(result.preCleanup.results).toContainEqual({
      kind: 'database',
      key: 'test_audio_db',
      outcome: 'deleted',
    });
    expect(result.preCleanup.results).toContainEqual({ kind: 'user', key: '77', outcome: 'deleted' });
    expect(result.outcome).toBe('passed');
  });
});

describe('stale authorization on the fake media API', () => {
  it('keeps grants cached for an existing session until a new one is opened', async () => {
    const server = await createFakeMediaServer();
    try {
      const admin = new CredentialedSession(createCredential(ADMIN.username, ADMIN.password), {
        baseUrl: FAKE_BASE_URL,
        fetchImpl: server.fetch,
      });
      const created = await admin.post('/user', {
        json: {
          username: 'staleuser',
          password: 'test-secret',
          can_view: true,
          can_create: true,
          can_edit: true,
          can_delete: true,
          is_admin: false,
        },
      });
      expect(created.status).toBe(201);
      const opts = { baseUrl: FAKE_BASE_URL, mode: 'persistent' as const, fetchImpl: server.fetch };
      const db = (name: string) => ({ json: { name, content_type: 'file', custom_fields: [] } });

      const early = new CredentialedSession(createCredential('staleuser', 'test-secret'), opts);
      expect((await early.post('/database', db('first'))).status).toBe(201);

      const revoke = await admin.patch('/user', { query: { id: 2 }, json: { can_create: false } });
      expect(revoke.status).toBe(200);

      expect((await early.post('/database', db('second'))).status).toBe(201);
      const fresh = new CredentialedSession(createCredential('staleuser', 'test-secret'), opts);
      expect((await fresh.post('/database', db('third'))).status).toBe(403);
    } finally {
      await server.close();
    }
  });
});
