import { timingSafeEqual } from 'crypto';
import { readFileSync } from 'fs';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { Principal, Role } from '../shared/types';
import { EpochStore } from '../security/epochStore';

/**
 * User-management collaborator as seen by the security core. Password
 * hashing and persistence live behind this interface.
 */
export interface IdentityStore extends EpochStore {
  verifyCredentials(username: string, password: string): Promise<Principal | null>;
  findById(principalId: string): Promise<Principal | null>;
  findByUsername(username: string): Promise<Principal | null>;
  /** The account only if it is a member of the domain. */
  findInDomain(username: string, domain: string): Promise<Principal | null>;
  authorizedDomains(principal: Principal): Promise<Set<string>>;
  roleIn(principal: Principal, domain: string): Promise<Role | null>;
  findRole(domain: string, roleName: string): Promise<Role | null>;
  domainExists(domain: string): Promise<boolean>;
  changePassword(principalId: string, newPassword: string): Promise<void>;
}

const roleSeedSchema = z.object({
  domain: z.string().min(1),
  name: z.string().min(1),
  permissions: z.array(z.string().min(1)).default([]),
});

const identitySeedSchema = z.object({
  id: z.string().min(1).optional(),
  username: z.string().min(1),
  password: z.string().min(1),
  memberships: z.array(z.object({ domain: z.string().min(1), role: z.string().min(1) })),
});

const seedFileSchema = z.object({
  domains: z.array(z.string().min(1)).default([]),
  roles: z.array(roleSeedSchema),
  identities: z.array(identitySeedSchema),
});

export type IdentitySeedFile = z.input<typeof seedFileSchema>;

export function loadIdentitySeed(path: string): IdentitySeedFile {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  return seedFileSchema.parse(raw);
}

interface StoredIdentity {
  principal: Principal;
  password: Buffer;
  // domain -> role name
  memberships: Map<string, string>;
}

/**
 * Seeded identity store for tests and single-process dev runs. Epochs are
 * delegated so they stay in the shared cache like every other piece of
 * security state.
 */
export class InMemoryIdentityStore implements IdentityStore {
  private identities: Map<string, StoredIdentity> = new Map();
  private roles: Map<string, Map<string, Role>> = new Map();
  private knownDomains: Set<string> = new Set();

  constructor(private readonly epochs: EpochStore) {}

  /** Replaces every identity and role. Epochs are untouched. */
  seed(input: IdentitySeedFile): Principal[] {
    const { domains, roles, identities } = seedFileSchema.parse(input);

    this.identities.clear();
    this.roles.clear();
    this.knownDomains = new Set(domains);

    for (const role of roles) {
      const inDomain = this.roles.get(role.domain) ?? new Map<string, Role>();
      inDomain.set(role.name, { name: role.name, permissions: role.permissions });
      this.roles.set(role.domain, inDomain);
      this.knownDomains.add(role.domain);
    }

    return identities.map(seed => {
      const principal: Principal = { id: seed.id ?? uuidv4(), username: seed.username.toLowerCase() };

      const memberships = new Map<string, string>();
      for (const { domain, role } of seed.memberships) {
        if (!this.roles.get(domain)?.has(role)) {
          throw new Error(`Unknown role ${role} in ${domain} for ${principal.username}`);
        }
        memberships.set(domain, role);
      }

      this.identities.set(principal.username, {
        principal,
        password: Buffer.from(seed.password),
        memberships,
      });
      return principal;
    });
  }

  async verifyCredentials(username: string, password: string): Promise<Principal | null> {
    const stored = this.identities.get(username.toLowerCase());
    if (!stored) return null;

    const candidate = Buffer.from(password);
    if (candidate.length !== stored.password.length || !timingSafeEqual(candidate, stored.password)) {
      return null;
    }
    return stored.principal;
  }

  async findById(principalId: string): Promise<Principal | null> {
    return this.byId(principalId)?.principal ?? null;
  }

  async findByUsername(username: string): Promise<Principal | null> {
    return this.identities.get(username.toLowerCase())?.principal ?? null;
  }

  async findInDomain(username: string, domain: string): Promise<Principal | null> {
    const stored = this.identities.get(username.toLowerCase());
    return stored?.memberships.has(domain) ? stored.principal : null;
  }

  async authorizedDomains(principal: Principal): Promise<Set<string>> {
    const stored = this.byId(principal.id);
    return new Set<string>(stored?.memberships.keys() ?? []);
  }

  async roleIn(principal: Principal, domain: string): Promise<Role | null> {
    const roleName = this.byId(principal.id)?.memberships.get(domain);
    return roleName ? this.findRole(domain, roleName) : null;
  }

  async findRole(domain: string, roleName: string): Promise<Role | null> {
    const role = this.roles.get(domain)?.get(roleName);
    return role ? { name: role.name, permissions: [...role.permissions] } : null;
  }

  async domainExists(domain: string): Promise<boolean> {
    return this.knownDomains.has(domain);
  }

  async changePassword(principalId: string, newPassword: string): Promise<void> {
    const stored = this.byId(principalId);
    if (!stored) {
      throw new Error(`Unknown principal ${principalId}`);
    }
    stored.password = Buffer.from(newPassword);
  }

  currentEpoch(principalId: string): Promise<number> {
    return this.epochs.currentEpoch(principalId);
  }

  bumpEpoch(principalId: string): Promise<number> {
    return this.epochs.bumpEpoch(principalId);
  }

  private byId(principalId: string): StoredIdentity | undefined {
    for (const stored of this.identities.values()) {
      if (stored.principal.id === principalId) return stored;
    }
    return undefined;
  }
}
