import { z } from 'zod';
import { Clock } from '../shared/clock';
import { AlreadyLockedError, LeaseError } from '../shared/errors';
import { EditLease, LeaseStatus } from '../shared/types';
import { CacheKeys, CacheStore, retryOnce } from '../store/cacheStore';

const leaseSchema = z.object({
  recordId: z.string(),
  holder: z.string(),
  acquiredAt: z.number(),
  expiresAt: z.number(),
});

export interface LeaseManagerDeps {
  store: CacheStore;
  keys: CacheKeys;
  clock: Clock;
  durationMs: number;
}

/** Lease id for one editable section of a record, e.g. `animal:42:general`. */
export function leaseKeyFor(recordType: string, recordId: string | number, section?: string): string {
  return section ? `${recordType}:${recordId}:${section}` : `${recordType}:${recordId}`;
}

interface StoredLease {
  raw: string;
  lease: EditLease;
}

/**
 * Advisory, time-bounded edit locks on CRM records.
 *
 * One lease per record id, enforced by the store's set-if-absent. The store
 * TTL is the only recovery path: a holder that disappears loses the lease
 * when it expires, no timers involved.
 */
export class LeaseManager {
  constructor(private readonly deps: LeaseManagerDeps) {}

  async acquire(recordId: string, principalId: string): Promise<EditLease> {
    const { store, keys, clock, durationMs } = this.deps;
    const key = keys.lease(recordId);

    const now = clock.now().getTime();
    const lease: EditLease = { recordId, holder: principalId, acquiredAt: now, expiresAt: now + durationMs };

    const existing = await retryOnce('setIfAbsentOrGet', key, () =>
      store.setIfAbsentOrGet(key, JSON.stringify(lease), durationMs)
    );
    if (existing === null) {
      return lease;
    }

    const current = this.parse(recordId, existing);
    // Re-acquiring your own lease is a no-op
    if (current.holder === principalId) {
      return current;
    }
    throw new AlreadyLockedError(recordId, current.holder, current.expiresAt);
  }

  async renew(recordId: string, principalId: string): Promise<EditLease> {
    const { store, keys, clock, durationMs } = this.deps;

    const current = await this.read(recordId);
    if (!current) {
      throw new LeaseError('LeaseExpired', `No active lease on ${recordId}`);
    }
    this.assertHolder(current.lease, principalId);

    const now = clock.now().getTime();
    const renewed: EditLease = { ...current.lease, expiresAt: now + durationMs };
    const swapped = await store.replaceIfEquals(keys.lease(recordId), current.raw, JSON.stringify(renewed), durationMs);
    if (!swapped) {
      // Expired or taken over between the read and the swap
      const latest = await this.read(recordId);
      if (latest) this.assertHolder(latest.lease, principalId);
      throw new LeaseError('LeaseExpired', `Lease on ${recordId} expired`);
    }
    return renewed;
  }

  /** Releasing a lease that already expired counts as released. */
  async release(recordId: string, principalId: string): Promise<void> {
    const current = await this.read(recordId);
    if (!current) return;
    this.assertHolder(current.lease, principalId);

    const key = this.deps.keys.lease(recordId);
    if (await this.deps.store.deleteIfEquals(key, current.raw)) return;

    // Renewed by the same holder in the meantime, or gone
    const latest = await this.read(recordId);
    if (!latest) return;
    this.assertHolder(latest.lease, principalId);
    await this.deps.store.deleteIfEquals(key, latest.raw);
  }

  async status(recordId: string): Promise<LeaseStatus> {
    const current = await this.read(recordId);
    if (!current) {
      return { state: 'free', recordId };
    }
    const { holder, acquiredAt, expiresAt } = current.lease;
    return { state: 'held', recordId, holder, acquiredAt, expiresAt };
  }

  private assertHolder(lease: EditLease, principalId: string): void {
    if (lease.holder !== principalId) {
      throw new LeaseError('NotHolder', `Lease on ${lease.recordId} is held by ${lease.holder}`);
    }
  }

  private async read(recordId: string): Promise<StoredLease | null> {
    const raw = await this.deps.store.get(this.deps.keys.lease(recordId));
    if (raw === null) return null;
    return { raw, lease: this.parse(recordId, raw) };
  }

  private parse(recordId: string, raw: string): EditLease {
    let row: unknown;
    try {
      row = JSON.parse(raw);
    } catch {
      row = null;
    }
    const parsed = leaseSchema.safeParse(row);
    if (!parsed.success) {
      throw new Error(`Corrupt lease row for ${recordId}`);
    }
    return parsed.data;
  }
}
