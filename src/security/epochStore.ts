import { CacheKeys, CacheStore } from '../store/cacheStore';

/**
 * Per-principal token epoch. Bumping it invalidates every token issued
 * before the bump, which is how password changes revoke refresh tokens
 * that cannot be enumerated.
 */
export interface EpochStore {
  currentEpoch(principalId: string): Promise<number>;
  bumpEpoch(principalId: string): Promise<number>;
}

export class CacheEpochStore implements EpochStore {
  constructor(
    private readonly store: CacheStore,
    private readonly keys: CacheKeys
  ) {}

  async currentEpoch(principalId: string): Promise<number> {
    const raw = await this.store.get(this.keys.epoch(principalId));
    if (raw === null) return 0;

    const epoch = parseInt(raw, 10);
    if (Number.isNaN(epoch)) {
      throw new Error(`Corrupt epoch counter for principal ${principalId}`);
    }
    return epoch;
  }

  async bumpEpoch(principalId: string): Promise<number> {
    return this.store.increment(this.keys.epoch(principalId));
  }
}
