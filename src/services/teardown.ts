import { paths } from '../api/paths.js';
import { toUserAccount, userListSchema } from '../api/schemas/mediaSchemas.js';
import { errorMessage } from '../core/errors.js';
import type {
  DeletionResult,
  ResourceKind,
  TeardownReport,
  WellKnownResources,
} from '../core/types.js';
import type { ApiResponse, CredentialedSession, QueryParams } from '../http/session.js';
import { teardownDeletionsTotal } from '../metrics/index.js';
import { getLogger } from '../utils/logging.js';
import { bodyExcerpt } from './assertions.js';
import type { FixtureProvisioner } from './fixtures.js';
import type { ResourceLedger } from './ledger.js';

function classify(kind: ResourceKind, key: string, res: ApiResponse): DeletionResult {
  if (res.status === 200 || res.status === 204) return { kind, key, outcome: 'deleted' };
  if (res.status === 404) return { kind, key, outcome: 'absent' };
  const detail = `status ${res.status} ${bodyExcerpt(res)}`.trimEnd();
  return { kind, key, outcome: 'failed', detail };
}

/**
 * Best-effort cleanup. Every deletion goes through the administrator session,
 * since the account that created a resource may itself be gone by now. A
 * failed deletion is logged and counted; the remaining ones are still made.
 */
export class TeardownExecutor {
  constructor(
    private admin: CredentialedSession,
    private fixtures?: FixtureProvisioner,
  ) {}

  async run(ledger: ResourceLedger, wellKnown: WellKnownResources): Promise<TeardownReport> {
    const log = getLogger();
    const results: DeletionResult[] = [];
    const records = ledger.drain();

    for (const rec of records.filter((r) => r.kind === 'entry')) {
      if (!rec.database) {
        const detail = 'no database recorded';
        results.push({ kind: 'entry', key: rec.key, outcome: 'failed', detail });
        continue;
      }
      log.info({ database: rec.database, id: rec.key }, 'Deleting entry');
      results.push(
        await this.remove('entry', `${rec.database}/${rec.key}`, paths.entry, {
          database_name: rec.database,
          id: rec.key,
        }),
      );
    }

    const databases = new Set<string>([
      ...records.filter((r) => r.kind === 'database').map((r) => r.key),
      ...wellKnown.databases,
    ]);
    for (const name of databases) {
      log.info({ database: name }, 'Deleting database');
      results.push(await this.remove('database', name, paths.database, { name }));
    }

    const userIds = new Set(records.filter((r) => r.kind === 'user').map((r) => r.key));
    for (const id of userIds) {
      log.info({ userId: id }, 'Deleting user');
      results.push(await this.remove('user', id, paths.user, { id }));
    }
    results.push(...(await this.removeUsersByName(wellKnown.usernames, userIds)));

    if (this.fixtures) results.push(...this.fixtures.removeAll());

    const failures = results.filter((r) => r.outcome === 'failed').length;
    log.info({ attempted: results.length, failures }, 'Teardown finished');
    return { results, failures };
  }

  private async remove(
    kind: ResourceKind,
    key: string,
    path: string,
    query: QueryParams,
  ): Promise<DeletionResult> {
    let result: DeletionResult;
    try {
      result = classify(kind, key, await this.admin.delete(path, { query }));
    } catch (err) {
      result = { kind, key, outcome: 'failed', detail: errorMessage(err) };
    }
    teardownDeletionsTotal.inc({ kind, outcome: result.outcome });
    if (result.outcome === 'failed') {
      getLogger().warn({ kind, key, detail: result.detail }, 'Cleanup deletion failed');
    }
    return result;
  }

  // Catches accounts left behind by an aborted run whose id we never saw
  private async removeUsersByName(
    usernames: string[],
    alreadyDeleted: Set<string>,
  ): Promise<DeletionResult[]> {
    if (usernames.length === 0) return [];
    let listing: ApiResponse;
    try {
      listing = await this.admin.get(paths.users);
    } catch (err) {
      getLogger().warn({ err }, 'Could not list users for cleanup (server may be down)');
      return usernames.map((u) => this.fail(u, errorMessage(err)));
    }
    if (listing.status !== 200) {
      return usernames.map((u) => this.fail(u, `listing users returned ${listing.status}`));
    }
    let body: unknown;
    try {
      body = listing.json();
    } catch {
      return usernames.map((u) => this.fail(u, 'user listing is not JSON'));
    }
    const parsed = userListSchema.safeParse(body);
    if (!parsed.success) {
      return usernames.map((u) => this.fail(u, 'unexpected user listing shape'));
    }
    const accounts = parsed.data.map(toUserAccount);
    const results: DeletionResult[] = [];
    for (const username of usernames) {
      const match = accounts.find((u) => u.username === username);
      if (!match) {
        results.push({ kind: 'user', key: username, outcome: 'absent' });
        teardownDeletionsTotal.inc({ kind: 'user', outcome: 'absent' });
        continue;
      }
      if (alreadyDeleted.has(match.id)) continue;
      getLogger().info({ username, userId: match.id }, 'Deleting user by name');
      results.push(await this.remove('user', match.id, paths.user, { id: match.id }));
    }
    return results;
  }

  private fail(username: string, detail: string): DeletionResult {
    teardownDeletionsTotal.inc({ kind: 'user', outcome: 'failed' });
    return { kind: 'user', key: username, outcome: 'failed', detail };
  }
}
