import { AppConfig } from '../shared/config';
import { Clock, systemClock } from '../shared/clock';
import { LeaseManager } from '../locking/leaseManager';
import { DomainAuthenticator } from '../security/authenticator';
import { CacheEpochStore } from '../security/epochStore';
import { TokenCodec } from '../security/tokenCodec';
import { TokenLifecycle } from '../security/tokenLifecycle';
import { ConsoleMailer, TokenMailer } from '../security/tokenMailer';
import { CacheStore, cacheKeys, createCacheStore } from '../store/cacheStore';
import { IdentityStore, InMemoryIdentityStore, loadIdentitySeed } from '../store/identityStore';

export interface Services {
  store: CacheStore;
  identity: IdentityStore;
  lifecycle: TokenLifecycle;
  authenticator: DomainAuthenticator;
  leases: LeaseManager;
}

export interface ServiceOverrides {
  clock?: Clock;
  store?: CacheStore;
  identity?: IdentityStore;
  mailer?: TokenMailer;
}

/**
 * Wires the security core. Every piece of shared state goes through the
 * one cache store, so several instances built this way stay consistent.
 */
export function buildServices(appConfig: AppConfig, overrides: ServiceOverrides = {}): Services {
  const clock = overrides.clock ?? systemClock;
  const store = overrides.store ?? createCacheStore(appConfig, clock);
  const keys = cacheKeys(appConfig.keyPrefix);
  const epochs = new CacheEpochStore(store, keys);

  let identity = overrides.identity;
  if (!identity) {
    const seeded = new InMemoryIdentityStore(epochs);
    if (appConfig.identitySeedFile) {
      const principals = seeded.seed(loadIdentitySeed(appConfig.identitySeedFile));
      console.log(`[identity] loaded ${principals.length} identities from ${appConfig.identitySeedFile}`);
    }
    identity = seeded;
  }

  const lifecycle = new TokenLifecycle({
    codec: new TokenCodec(appConfig.signing),
    store,
    keys,
    epochs: identity,
    durations: appConfig.durations,
    clock,
  });

  return {
    store,
    identity,
    lifecycle,
    authenticator: new DomainAuthenticator({
      identity,
      lifecycle,
      mailer: overrides.mailer ?? new ConsoleMailer(),
    }),
    leases: new LeaseManager({ store, keys, clock, durationMs: appConfig.leaseDurationMs }),
  };
}
