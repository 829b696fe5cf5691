import { AppConfig, loadConfig } from '../shared/config';
import { Clock } from '../shared/clock';
import { TokenMailer } from '../security/tokenMailer';
import { CacheEpochStore } from '../security/epochStore';
import { TokenCodec } from '../security/tokenCodec';
import { TokenLifecycle } from '../security/tokenLifecycle';
import { LeaseManager } from '../locking/leaseManager';
import { DomainAuthenticator } from '../security/authenticator';
import { InMemoryCacheStore, cacheKeys } from '../store/cacheStore';
import { IdentitySeedFile, InMemoryIdentityStore } from '../store/identityStore';

export const MINUTE = 60 * 1000;
export const DAY = 24 * 60 * MINUTE;

export const BASE_TIME = new Date('2025-03-01T10:00:00.000Z');

export class ManualClock implements Clock {
  private current: number;

  constructor(start: Date = BASE_TIME) {
    this.current = start.getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export interface SentMail {
  type: 'invitation' | 'reset';
  email: string;
  token: string;
  domain: string;
  role?: string;
}

export class RecordingMailer implements TokenMailer {
  sent: SentMail[] = [];

  async sendInvitation(email: string, token: string, domain: string, role?: string): Promise<void> {
    this.sent.push({ type: 'invitation', email, token, domain, role });
  }

  async sendPasswordReset(email: string, token: string, domain: string): Promise<void> {
    this.sent.push({ type: 'reset', email, token, domain });
  }

  last(): SentMail {
    const mail = this.sent[this.sent.length - 1];
    if (!mail) throw new Error('No mail sent');
    return mail;
  }
}

export function testConfig(overrides: Record<string, string> = {}): AppConfig {
  return loadConfig({ NODE_ENV: 'test', ...overrides });
}

export const COORDINATOR_PERMISSIONS = ['crm:read', 'crm:write', 'users:invite'];
export const VOLUNTEER_PERMISSIONS = ['crm:read'];

// odesa is known to the system, but nobody below is a member of it
export const IDENTITY_SEED: IdentitySeedFile = {
  domains: ['odesa'],
  roles: [
    { domain: 'kyiv', name: 'coordinator', permissions: COORDINATOR_PERMISSIONS },
    { domain: 'kyiv', name: 'volunteer', permissions: VOLUNTEER_PERMISSIONS },
    { domain: 'lviv', name: 'coordinator', permissions: COORDINATOR_PERMISSIONS },
    { domain: 'lviv', name: 'volunteer', permissions: VOLUNTEER_PERMISSIONS },
  ],
  identities: [
    {
      id: 'u-anna',
      username: 'anna@example.org',
      password: 'anna-pass-1',
      memberships: [{ domain: 'kyiv', role: 'coordinator' }],
    },
    {
      id: 'u-bohdan',
      username: 'bohdan@example.org',
      password: 'bohdan-pass-1',
      memberships: [
        { domain: 'kyiv', role: 'volunteer' },
        { domain: 'lviv', role: 'coordinator' },
      ],
    },
  ],
};

/** The seed with bohdan's memberships replaced; everyone else unchanged. */
export function seedWithBohdan(memberships: { domain: string; role: string }[] | null): IdentitySeedFile {
  const others = IDENTITY_SEED.identities.filter(identity => identity.id !== 'u-bohdan');
  const bohdan = IDENTITY_SEED.identities.find(identity => identity.id === 'u-bohdan');
  if (!memberships || !bohdan) {
    return { ...IDENTITY_SEED, identities: others };
  }
  return { ...IDENTITY_SEED, identities: [...others, { ...bohdan, memberships }] };
}

export interface Harness {
  appConfig: AppConfig;
  clock: ManualClock;
  store: InMemoryCacheStore;
  keys: ReturnType<typeof cacheKeys>;
  identity: InMemoryIdentityStore;
  codec: TokenCodec;
  lifecycle: TokenLifecycle;
  authenticator: DomainAuthenticator;
  leases: LeaseManager;
  mailer: RecordingMailer;
}

export function createHarness(overrides: Record<string, string> = {}): Harness {
  const appConfig = testConfig(overrides);
  const clock = new ManualClock();
  const store = new InMemoryCacheStore(clock);
  const keys = cacheKeys(appConfig.keyPrefix);
  const identity = new InMemoryIdentityStore(new CacheEpochStore(store, keys));
  identity.seed(IDENTITY_SEED);

  const codec = new TokenCodec(appConfig.signing);
  const lifecycle = new TokenLifecycle({
    codec,
    store,
    keys,
    epochs: identity,
    durations: appConfig.durations,
    clock,
  });
  const mailer = new RecordingMailer();

  return {
    appConfig,
    clock,
    store,
    keys,
    identity,
    codec,
    lifecycle,
    authenticator: new DomainAuthenticator({ identity, lifecycle, mailer }),
    leases: new LeaseManager({ store, keys, clock, durationMs: appConfig.leaseDurationMs }),
    mailer,
  };
}

export function encodeSegment(value: unknown): string {
  return Buffer.from(JSON.stringify(value)).toString('base64url');
}
