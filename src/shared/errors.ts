/**
 * Failure taxonomy shared by the token and lease subsystems.
 *
 * Every error carries a machine-readable `kind`; the gateway maps it to
 * a status code and never collapses two kinds into one response.
 */

export type TokenErrorKind =
  | 'Malformed'
  | 'InvalidSignature'
  | 'UnsupportedAlgorithm'
  | 'Expired'
  | 'Revoked'
  | 'WrongKind';

export type AuthenticationErrorKind = 'BadCredentials' | 'UnknownDomain' | 'DomainNotAuthorized';

export type InvitationErrorKind = 'AccountExists' | 'UnknownRole';

export type LeaseErrorKind = 'AlreadyLocked' | 'NotHolder' | 'LeaseExpired';

export type SecurityErrorKind =
  | TokenErrorKind
  | AuthenticationErrorKind
  | InvitationErrorKind
  | LeaseErrorKind
  | 'StoreUnavailable';

export abstract class SecurityError extends Error {
  abstract readonly kind: SecurityErrorKind;
  abstract readonly status: number;

  /** Only store outages are worth retrying; everything else is final. */
  get retryable(): boolean {
    return false;
  }

  details(): Record<string, unknown> {
    return {};
  }
}

const TOKEN_STATUS: Record<TokenErrorKind, number> = {
  Malformed: 422,
  InvalidSignature: 401,
  UnsupportedAlgorithm: 401,
  Expired: 401,
  Revoked: 401,
  WrongKind: 401,
};

export class TokenError extends SecurityError {
  readonly status: number;

  constructor(public readonly kind: TokenErrorKind, message: string) {
    super(message);
    this.name = 'TokenError';
    this.status = TOKEN_STATUS[kind];
  }
}

const AUTHENTICATION_STATUS: Record<AuthenticationErrorKind, number> = {
  BadCredentials: 401,
  UnknownDomain: 404,
  DomainNotAuthorized: 403,
};

export class AuthenticationError extends SecurityError {
  readonly status: number;

  constructor(public readonly kind: AuthenticationErrorKind, message: string) {
    super(message);
    this.name = 'AuthenticationError';
    this.status = AUTHENTICATION_STATUS[kind];
  }
}

export class InvitationError extends SecurityError {
  readonly status: number;

  constructor(public readonly kind: InvitationErrorKind, message: string) {
    super(message);
    this.name = 'InvitationError';
    this.status = kind === 'AccountExists' ? 409 : 404;
  }
}

export class LeaseError extends SecurityError {
  readonly status: number;

  constructor(public readonly kind: Exclude<LeaseErrorKind, 'AlreadyLocked'>, message: string) {
    super(message);
    this.name = 'LeaseError';
    this.status = kind === 'NotHolder' ? 403 : 410;
  }
}

export class AlreadyLockedError extends SecurityError {
  readonly kind = 'AlreadyLocked';
  readonly status = 409;

  constructor(
    public readonly recordId: string,
    public readonly holder: string,
    public readonly expiresAt: number
  ) {
    super(`Record ${recordId} is being edited by ${holder}`);
    this.name = 'AlreadyLockedError';
  }

  override details(): Record<string, unknown> {
    return { holder: this.holder, expiresAt: new Date(this.expiresAt).toISOString() };
  }
}

export class StoreUnavailableError extends SecurityError {
  readonly kind = 'StoreUnavailable';
  readonly status = 503;

  constructor(operation: string, cause?: unknown) {
    super(`Cache store unavailable during ${operation}`, { cause });
    this.name = 'StoreUnavailableError';
  }

  override get retryable(): boolean {
    return true;
  }
}
