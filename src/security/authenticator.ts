import { AuthenticationError, InvitationError, TokenError } from '../shared/errors';
import { IssuedToken, Principal, TokenClaims, TokenPair } from '../shared/types';
import { IdentityStore } from '../store/identityStore';
import { SessionGrant, TokenLifecycle } from './tokenLifecycle';
import { TokenMailer } from './tokenMailer';

export interface LoginRequest {
  username: string;
  password: string;
  domain?: string;
}

export interface LoginResult {
  accessToken: string;
  refreshToken: string;
  tokenType: 'bearer';
  expiresIn: number; // seconds
  domain?: string;
  role?: string;
  permissions?: string[];
}

export interface InvitationDetails {
  email: string;
  domain: string;
  role: string;
}

export interface AuthenticatorDeps {
  identity: IdentityStore;
  lifecycle: TokenLifecycle;
  mailer: TokenMailer;
}

function toLoginResult(pair: TokenPair): LoginResult {
  const { access, refresh } = pair;
  return {
    accessToken: access.token,
    refreshToken: refresh.token,
    tokenType: 'bearer',
    expiresIn: access.claims.exp - access.claims.iat,
    domain: access.claims.domain,
    role: access.claims.role,
    permissions: access.claims.permissions,
  };
}

/**
 * Password-grant login scoped to a tenant domain, plus the flows that hang
 * off the same identity: refresh, logout, invitations and password resets.
 */
export class DomainAuthenticator {
  constructor(private readonly deps: AuthenticatorDeps) {}

  async authenticate(request: LoginRequest): Promise<LoginResult> {
    const { identity, lifecycle } = this.deps;

    const principal = await identity.verifyCredentials(request.username, request.password);
    if (!principal) {
      throw new AuthenticationError('BadCredentials', 'Invalid username or password');
    }

    const domain = await this.resolveDomain(principal, request.domain);
    const pair = await lifecycle.issuePair(principal.id, await this.grantFor(principal, domain));

    console.log(`[auth] ${principal.username} logged in to ${domain}`);
    return toLoginResult(pair);
  }

  /**
   * Rotates the pair only while the account still exists, is still a member
   * of the bound domain and still holds the role the token was issued for.
   */
  async refresh(refreshToken: string): Promise<LoginResult> {
    const pair = await this.deps.lifecycle.refresh(refreshToken, claims => this.reauthorize(claims));
    return toLoginResult(pair);
  }

  async logout(accessToken: string): Promise<void> {
    const claims = await this.deps.lifecycle.revoke(accessToken);
    console.log(`[auth] ${claims.sub} logged out`);
  }

  async changePassword(principalId: string, newPassword: string): Promise<void> {
    await this.deps.identity.changePassword(principalId, newPassword);
    await this.deps.lifecycle.revokeAll(principalId);
  }

  /**
   * Unknown users and foreign domains produce no token and no error, so the
   * endpoint cannot be used to enumerate accounts.
   */
  async requestPasswordReset(username: string, domain: string): Promise<void> {
    const { identity, lifecycle, mailer } = this.deps;

    const principal = await identity.findByUsername(username);
    if (!principal || !(await identity.authorizedDomains(principal)).has(domain)) {
      console.log(`[auth] password reset requested for unknown account in ${domain}`);
      return;
    }

    const { token } = await lifecycle.issue(principal.id, 'reset', { domain });
    await mailer.sendPasswordReset(principal.username, token, domain);
  }

  async confirmPasswordReset(token: string, newPassword: string): Promise<void> {
    const claims = await this.deps.lifecycle.validate(token, 'reset');
    await this.changePassword(claims.sub, newPassword);
  }

  async invite(inviter: TokenClaims, email: string, roleName: string): Promise<IssuedToken> {
    const { identity, lifecycle, mailer } = this.deps;
    const { domain } = inviter;
    if (!domain) {
      throw new AuthenticationError('DomainNotAuthorized', 'Invitations require a domain-bound session');
    }

    const username = email.toLowerCase();
    if (await identity.findInDomain(username, domain)) {
      throw new InvitationError('AccountExists', `User '${username}' already exists in ${domain}`);
    }
    const role = await identity.findRole(domain, roleName);
    if (!role) {
      throw new InvitationError('UnknownRole', `Role '${roleName}' does not exist in ${domain}`);
    }

    const invitation = await lifecycle.issue(username, 'invitation', { domain, role: role.name });
    await mailer.sendInvitation(username, invitation.token, domain, role.name);
    return invitation;
  }

  async acceptInvitation(token: string): Promise<InvitationDetails> {
    const claims = await this.deps.lifecycle.validate(token, 'invitation');
    if (!claims.domain || !claims.role) {
      throw new TokenError('Malformed', 'Invitation is not bound to a domain and role');
    }
    return { email: claims.sub, domain: claims.domain, role: claims.role };
  }

  private async grantFor(principal: Principal, domain: string): Promise<SessionGrant> {
    const role = await this.deps.identity.roleIn(principal, domain);
    return role ? { domain, role: role.name, permissions: role.permissions } : { domain };
  }

  private async reauthorize(claims: TokenClaims): Promise<SessionGrant> {
    const { identity } = this.deps;

    const principal = await identity.findById(claims.sub);
    if (!principal) {
      throw new AuthenticationError('BadCredentials', `User '${claims.sub}' not found`);
    }
    if (!claims.domain) {
      return {};
    }
    if (!(await identity.authorizedDomains(principal)).has(claims.domain)) {
      throw new AuthenticationError('DomainNotAuthorized', `Not authorized for domain: ${claims.domain}`);
    }

    const grant = await this.grantFor(principal, claims.domain);
    if (grant.role !== claims.role) {
      throw new TokenError('Revoked', 'Role changed since the token was issued');
    }
    return grant;
  }

  private async resolveDomain(principal: Principal, requested: string | undefined): Promise<string> {
    const { identity } = this.deps;
    const authorized = await identity.authorizedDomains(principal);

    if (requested === undefined) {
      if (authorized.size === 1) {
        const [only] = authorized;
        return only;
      }
      throw new AuthenticationError('DomainNotAuthorized', 'A domain must be selected');
    }

    if (!(await identity.domainExists(requested))) {
      throw new AuthenticationError('UnknownDomain', `Unknown domain: ${requested}`);
    }
    if (!authorized.has(requested)) {
      throw new AuthenticationError('DomainNotAuthorized', `Not authorized for domain: ${requested}`);
    }
    return requested;
  }
}
