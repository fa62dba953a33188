import type { LedgerRecord, ResourceKind } from '../core/types.js';
import { getLogger } from '../utils/logging.js';

// Entries go before their databases, databases before the users that own them
const TEARDOWN_ORDER: Record<ResourceKind, number> = { entry: 0, database: 1, user: 2 };

/**
 * Append-only record of every remote resource a run created. Teardown reads it
 * through {@link drain}, which never clears, so teardown can run repeatedly.
 * One ledger belongs to one run.
 */
export class ResourceLedger {
  private records: LedgerRecord[] = [];

  record(kind: ResourceKind, key: string, owner: string, database?: string): LedgerRecord {
    const existing = this.records.find(
      (r) => r.kind === kind && r.key === key && r.database === database,
    );
    if (existing) return existing;
    const rec: LedgerRecord =
      database === undefined ? { kind, key, owner } : { kind, key, owner, database };
    this.records.push(rec);
    getLogger().debug({ ledger: rec }, 'resource-recorded');
    return rec;
  }

  has(kind: ResourceKind, key: string): boolean {
    return this.records.some((r) => r.kind === kind && r.key === key);
  }

  get size(): number {
    return this.records.length;
  }

  drain(): LedgerRecord[] {
    // Array.prototype.sort is stable, so insertion order holds within a kind
    return this.records
      .map((r) => ({ ...r }))
      .sort((a, b) => TEARDOWN_ORDER[a.kind] - TEARDOWN_ORDER[b.kind]);
  }
}
