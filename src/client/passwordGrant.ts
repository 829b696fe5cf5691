import { z } from 'zod';

/**
 * Helpers for browser-side API consoles that speak the OAuth2 password
 * grant. The server accepts a `domain` field next to the standard ones;
 * stock password-grant forms do not send it.
 */

export function withDomain(body: URLSearchParams | Record<string, string>, domain: string): URLSearchParams {
  const params = new URLSearchParams(body);
  if (domain) {
    params.set('domain', domain);
  }
  return params;
}

const sessionSchema = z.object({
  authorized: z.record(
    z.object({
      token: z.object({ access_token: z.string().min(1) }).partial().optional(),
    })
  ),
});

/** Reads the access token stored by the console after a successful login. */
export function readBearerToken(session: unknown, scheme = 'OAuth2PasswordBearer'): string | null {
  const parsed = sessionSchema.safeParse(session);
  if (!parsed.success) return null;

  return parsed.data.authorized[scheme]?.token?.access_token ?? null;
}

export function bearerHeader(session: unknown, scheme?: string): Record<string, string> {
  const token = readBearerToken(session, scheme);
  return token ? { Authorization: `Bearer ${token}` } : {};
}
