import * as jose from 'jose';
import { z } from 'zod';
import { SigningConfig } from '../shared/config';
import { TokenError } from '../shared/errors';
import { TOKEN_KINDS, TokenClaims } from '../shared/types';

const claimsSchema = z.object({
  sub: z.string().min(1),
  kind: z.enum(TOKEN_KINDS),
  domain: z.string().min(1).optional(),
  role: z.string().min(1).optional(),
  permissions: z.array(z.string()).optional(),
  rid: z.string().min(1).optional(),
  epoch: z.number().int().nonnegative(),
  iat: z.number().int(),
  exp: z.number().int(),
  jti: z.string().min(1),
  iss: z.string(),
  aud: z.string(),
});

/**
 * Signs and verifies compact JWTs carrying a {@link TokenClaims} set.
 *
 * The codec only answers "was this signed by us, with our algorithm, and
 * is it well formed". Expiry, kind and revocation belong to the lifecycle.
 */
export class TokenCodec {
  private readonly key: Uint8Array;

  constructor(private readonly signing: SigningConfig) {
    this.key = new TextEncoder().encode(signing.secret);
  }

  async encode(claims: TokenClaims): Promise<string> {
    const { sub, jti, iat, exp, ...custom } = claims;

    return new jose.SignJWT({ ...custom })
      .setProtectedHeader({ alg: this.signing.algorithm, typ: 'JWT' })
      .setSubject(sub)
      .setJti(jti)
      .setIssuedAt(iat)
      .setExpirationTime(exp)
      .setIssuer(this.signing.issuer)
      .setAudience(this.signing.audience)
      .sign(this.key);
  }

  async decode(token: string): Promise<TokenClaims> {
    if (token.split('.').length !== 3) {
      throw new TokenError('Malformed', 'Invalid token format');
    }

    let header: jose.ProtectedHeaderParameters;
    try {
      header = jose.decodeProtectedHeader(token);
    } catch {
      throw new TokenError('Malformed', 'Invalid token header');
    }

    // Covers alg=none in every spelling as well as algorithm confusion
    if (header.alg !== this.signing.algorithm) {
      throw new TokenError('UnsupportedAlgorithm', `Unexpected algorithm: ${String(header.alg)}`);
    }

    let payload: Uint8Array;
    try {
      ({ payload } = await jose.compactVerify(token, this.key, {
        algorithms: [this.signing.algorithm],
      }));
    } catch (error) {
      if (error instanceof jose.errors.JWSSignatureVerificationFailed) {
        throw new TokenError('InvalidSignature', 'Invalid signature');
      }
      throw new TokenError('Malformed', 'Invalid token');
    }

    let raw: unknown;
    try {
      raw = JSON.parse(new TextDecoder().decode(payload));
    } catch {
      throw new TokenError('Malformed', 'Invalid token payload');
    }

    const parsed = claimsSchema.safeParse(raw);
    if (!parsed.success) {
      throw new TokenError('Malformed', 'Missing or invalid claims');
    }

    const { iss, aud, ...claims } = parsed.data;
    if (iss !== this.signing.issuer || aud !== this.signing.audience) {
      throw new TokenError('Malformed', 'Invalid token issuer or audience');
    }

    return claims;
  }
}
