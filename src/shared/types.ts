export const TOKEN_KINDS = ['access', 'refresh', 'invitation', 'reset'] as const;
export type TokenKind = (typeof TOKEN_KINDS)[number];

// Kinds whose nonce is consumed by the first successful validation
export const SINGLE_USE_KINDS: ReadonlySet<TokenKind> = new Set<TokenKind>(['invitation', 'reset']);

export interface Principal {
  id: string;
  username: string;
}

/** A named role inside one domain; its permissions travel in the token claims. */
export interface Role {
  name: string;
  permissions: string[];
}

export interface TokenClaims {
  sub: string;
  kind: TokenKind;
  domain?: string;
  role?: string;
  permissions?: string[];
  rid?: string; // nonce of the refresh token paired with an access token
  epoch: number;
  iat: number; // seconds
  exp: number; // seconds
  jti: string; // nonce, the unit of revocation
}

export interface IssuedToken {
  token: string;
  claims: TokenClaims;
}

export interface TokenPair {
  access: IssuedToken;
  refresh: IssuedToken;
}

export interface DenylistEntry {
  nonce: string;
  expiresAt: number; // ms
}

export interface EditLease {
  recordId: string;
  holder: string;
  acquiredAt: number; // ms
  expiresAt: number; // ms
}

export type LeaseStatus =
  | { state: 'free'; recordId: string }
  | { state: 'held'; recordId: string; holder: string; acquiredAt: number; expiresAt: number };

export interface AuthContext {
  claims: TokenClaims;
  token: string;
}
