import { v4 as uuidv4 } from 'uuid';
import { TokenDurations } from '../shared/config';
import { Clock, nowSeconds } from '../shared/clock';
import { TokenError } from '../shared/errors';
import {
  DenylistEntry,
  IssuedToken,
  SINGLE_USE_KINDS,
  TokenClaims,
  TokenKind,
  TokenPair,
} from '../shared/types';
import { CacheKeys, CacheStore, setIfAbsentWithRetry } from '../store/cacheStore';
import { EpochStore } from './epochStore';
import { TokenCodec } from './tokenCodec';

/** What a session is allowed: its tenant and its role there. */
export interface SessionGrant {
  domain?: string;
  role?: string;
  permissions?: string[];
}

export interface IssueOptions extends SessionGrant {
  /** Overrides the configured lifetime for this kind. */
  durationMs?: number;
  refreshNonce?: string;
}

/**
 * Re-derives the grant for a consumed refresh token, or throws to refuse the
 * rotation. Without one, the new pair copies the old grant.
 */
export type RefreshAuthorizer = (claims: TokenClaims) => Promise<SessionGrant>;

export interface TokenLifecycleDeps {
  codec: TokenCodec;
  store: CacheStore;
  keys: CacheKeys;
  epochs: EpochStore;
  durations: TokenDurations;
  clock: Clock;
}

function expiryFor(iat: number, durationMs: number): number {
  return iat + Math.ceil(durationMs / 1000);
}

/**
 * Issues, validates, rotates and revokes the four token kinds.
 *
 * Tokens are never stored. Revocation state is a denylist of nonces in the
 * cache store, each entry living exactly as long as the token it guards,
 * plus a per-principal epoch for mass revocation.
 */
export class TokenLifecycle {
  constructor(private readonly deps: TokenLifecycleDeps) {}

  async issue(principalId: string, kind: TokenKind, options: IssueOptions = {}): Promise<IssuedToken> {
    const { codec, epochs, durations, clock } = this.deps;
    const iat = nowSeconds(clock);

    const claims: TokenClaims = {
      sub: principalId,
      kind,
      epoch: await epochs.currentEpoch(principalId),
      iat,
      exp: expiryFor(iat, options.durationMs ?? durations[kind]),
      jti: uuidv4(),
    };
    if (options.domain) claims.domain = options.domain;
    if (options.role) claims.role = options.role;
    if (options.permissions) claims.permissions = [...options.permissions];
    if (options.refreshNonce) claims.rid = options.refreshNonce;

    return { token: await codec.encode(claims), claims };
  }

  /** Refresh first, so the access token can name the refresh nonce it belongs to. */
  async issuePair(principalId: string, grant: SessionGrant = {}): Promise<TokenPair> {
    const refresh = await this.issue(principalId, 'refresh', grant);
    const access = await this.issue(principalId, 'access', {
      ...grant,
      refreshNonce: refresh.claims.jti,
    });
    return { access, refresh };
  }

  async validate(token: string, expectedKind: TokenKind): Promise<TokenClaims> {
    return this.check(token, expectedKind, SINGLE_USE_KINDS.has(expectedKind));
  }

  /**
   * Rotation: the old refresh nonce is consumed atomically before the new
   * pair is minted, so two concurrent refreshes of one token cannot both win.
   * A refusal from `authorize` still leaves the old token consumed.
   */
  async refresh(refreshToken: string, authorize?: RefreshAuthorizer): Promise<TokenPair> {
    const claims = await this.check(refreshToken, 'refresh', true);
    const grant: SessionGrant = authorize
      ? await authorize(claims)
      : { domain: claims.domain, role: claims.role, permissions: claims.permissions };
    return this.issuePair(claims.sub, grant);
  }

  /**
   * Denylists a token whatever its kind. Only the signature is checked, so an
   * expired token revokes fine (and stores nothing). Revoking an access token
   * also drops the refresh token it was paired with.
   */
  async revoke(token: string): Promise<TokenClaims> {
    const claims = await this.deps.codec.decode(token);
    await this.denylist(claims.jti, claims.exp * 1000);

    if (claims.kind === 'access' && claims.rid) {
      await this.denylist(claims.rid, expiryFor(claims.iat, this.deps.durations.refresh) * 1000);
    }
    return claims;
  }

  /** Invalidates every token issued to the principal so far. */
  async revokeAll(principalId: string): Promise<number> {
    const epoch = await this.deps.epochs.bumpEpoch(principalId);
    console.log(`[tokens] epoch for ${principalId} advanced to ${epoch}`);
    return epoch;
  }

  private async check(token: string, expectedKind: TokenKind, consume: boolean): Promise<TokenClaims> {
    const { codec, store, keys, epochs, clock } = this.deps;
    const claims = await codec.decode(token);

    if (claims.kind !== expectedKind) {
      throw new TokenError('WrongKind', `Expected a ${expectedKind} token, got ${claims.kind}`);
    }

    const now = clock.now().getTime();
    const expiresAt = claims.exp * 1000;
    if (expiresAt <= now) {
      throw new TokenError('Expired', 'Token expired');
    }

    if (claims.epoch < (await epochs.currentEpoch(claims.sub))) {
      throw new TokenError('Revoked', 'Token predates the latest credential change');
    }

    const key = keys.denylist(claims.jti);
    if (consume) {
      const entry: DenylistEntry = { nonce: claims.jti, expiresAt };
      const firstUse = await setIfAbsentWithRetry(store, key, JSON.stringify(entry), expiresAt - now);
      if (!firstUse) {
        throw new TokenError('Revoked', 'Token already used');
      }
    } else if ((await store.get(key)) !== null) {
      throw new TokenError('Revoked', 'Token revoked');
    }

    return claims;
  }

  private async denylist(nonce: string, expiresAt: number): Promise<void> {
    const entry: DenylistEntry = { nonce, expiresAt };
    const ttlMs = Math.max(0, expiresAt - this.deps.clock.now().getTime());
    await this.deps.store.set(this.deps.keys.denylist(nonce), JSON.stringify(entry), ttlMs);
  }
}
