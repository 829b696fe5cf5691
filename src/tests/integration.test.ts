import request from 'supertest';
import { Express } from 'express';
import { createApp } from '../gateway/index';
import { buildServices } from '../gateway/services';
import { config } from '../shared/config';
import { setTestNow, systemClock } from '../shared/clock';
import { CacheEpochStore } from '../security/epochStore';
import { InMemoryCacheStore, cacheKeys } from '../store/cacheStore';
import { InMemoryIdentityStore } from '../store/identityStore';
import { BASE_TIME, IDENTITY_SEED, MINUTE, RecordingMailer, seedWithBohdan } from './helpers';

// The app reads time through the test clock, so X-Test-Now moves tokens and leases together
const store = new InMemoryCacheStore(systemClock);
const identity = new InMemoryIdentityStore(new CacheEpochStore(store, cacheKeys(config.keyPrefix)));
const mailer = new RecordingMailer();
const app: Express = createApp(buildServices(config, { store, identity, mailer }), config);

const LOCK = '/crm/animals/42/general/lock';

beforeEach(async () => {
  await store.disconnect();
  identity.seed(IDENTITY_SEED);
  mailer.sent = [];
  setTestNow(BASE_TIME);
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterEach(() => {
  setTestNow(null);
  jest.restoreAllMocks();
});

async function login(username: string, password: string, domain?: string) {
  const res = await request(app).post('/auth/login').send({ username, password, domain });
  expect(res.status).toBe(200);
  return { accessToken: String(res.body.accessToken), refreshToken: String(res.body.refreshToken) };
}

const loginAnna = () => login('anna@example.org', 'anna-pass-1');
const loginBohdan = (domain = 'kyiv') => login('bohdan@example.org', 'bohdan-pass-1', domain);

function bearer(token: string): [string, string] {
  return ['Authorization', `Bearer ${token}`];
}

// ==========================================
// A) Public routes
// ==========================================

describe('A) Public routes', () => {
  test('1. GET /health returns 200 without Authorization', async () => {
    const res = await request(app).get('/health');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'ok', service: 'security-core' });
  });
});

// ==========================================
// B) Login
// ==========================================

describe('B) Login', () => {
  test('2. JSON login returns a bearer pair bound to the domain', async () => {
    const res = await request(app)
      .post('/auth/login')
      .send({ username: 'bohdan@example.org', password: 'bohdan-pass-1', domain: 'lviv' });

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      tokenType: 'bearer',
      expiresIn: 30 * 60,
      domain: 'lviv',
      role: 'coordinator',
      permissions: ['crm:read', 'crm:write', 'users:invite'],
    });
    expect(typeof res.body.accessToken).toBe('string');
    expect(typeof res.body.refreshToken).toBe('string');
  });

  test('3. Form-encoded password grant with an empty domain auto-selects', async () => {
    const res = await request(app)
      .post('/auth/login')
      .type('form')
      .send({ username: 'anna@example.org', password: 'anna-pass-1', domain: '' });

    expect(res.status).toBe(200);
    expect(res.body.domain).toBe('kyiv');
  });

  test('4. Wrong password returns 401 BadCredentials', async () => {
    const res = await request(app)
      .post('/auth/login')
      .send({ username: 'anna@example.org', password: 'wrong-pass', domain: 'kyiv' });
    expect(res.status).toBe(401);
    expect(res.body.error).toBe('BadCredentials');
  });

  test('5. Domain outside the principal’s set returns 403', async () => {
    const res = await request(app)
      .post('/auth/login')
      .send({ username: 'anna@example.org', password: 'anna-pass-1', domain: 'lviv' });
    expect(res.status).toBe(403);
    expect(res.body.error).toBe('DomainNotAuthorized');
  });

  test('6. Unknown domain returns 404', async () => {
    const res = await request(app)
      .post('/auth/login')
      .send({ username: 'anna@example.org', password: 'anna-pass-1', domain: 'atlantis' });
    expect(res.status).toBe(404);
    expect(res.body.error).toBe('UnknownDomain');
  });

  test('7. Missing fields return 400', async () => {
    const res = await request(app).post('/auth/login').send({ username: 'anna@example.org' });
    expect(res.status).toBe(400);
    expect(res.body.error).toBe('InvalidRequest');
  });

  test('8. Unparseable JSON returns 400', async () => {
    const res = await request(app)
      .post('/auth/login')
      .set('Content-Type', 'application/json')
      .send('{"username":');
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'InvalidRequest', message: 'Malformed request body' });
  });
});

// ==========================================
// C) Bearer authentication
// ==========================================

describe('C) Bearer authentication', () => {
  test('9. Missing token returns 401 MissingToken', async () => {
    const res = await request(app).get(LOCK);
    expect(res.status).toBe(401);
    expect(res.body.error).toBe('MissingToken');
  });

  test('10. Malformed Authorization header returns 401', async () => {
    const res = await request(app).get(LOCK).set('Authorization', 'NotBearer token');
    expect(res.status).toBe(401);
    expect(res.body.error).toBe('MissingToken');
  });

  test('11. Garbage bearer returns 422 Malformed', async () => {
    const res = await request(app).get(LOCK).set(...bearer('not-a-token'));
    expect(res.status).toBe(422);
    expect(res.body.error).toBe('Malformed');
  });

  test('12. Refresh token used as bearer returns 401 WrongKind', async () => {
    const { refreshToken } = await loginAnna();
    const res = await request(app).get(LOCK).set(...bearer(refreshToken));
    expect(res.status).toBe(401);
    expect(res.body.error).toBe('WrongKind');
  });

  test('13. Access token expires after its lifetime', async () => {
    const { accessToken } = await loginAnna();

    const fresh = await request(app).get(LOCK).set(...bearer(accessToken));
    expect(fresh.status).toBe(200);

    const later = new Date(BASE_TIME.getTime() + 31 * MINUTE).toISOString();
    const res = await request(app).get(LOCK).set(...bearer(accessToken)).set('X-Test-Now', later);
    expect(res.status).toBe(401);
    expect(res.body.error).toBe('Expired');
  });
});

// ==========================================
// D) Refresh and logout
// ==========================================

describe('D) Refresh and logout', () => {
  test('14. Refresh rotates; the old refresh token is rejected', async () => {
    const { refreshToken } = await loginBohdan('lviv');

    const first = await request(app).post('/auth/refresh').send({ refreshToken });
    expect(first.status).toBe(200);
    expect(first.body.domain).toBe('lviv');

    const replay = await request(app).post('/auth/refresh').send({ refreshToken });
    expect(replay.status).toBe(401);
    expect(replay.body.error).toBe('Revoked');
  });

  test('15. Logout revokes the access token and its refresh token', async () => {
    const { accessToken, refreshToken } = await loginAnna();

    const res = await request(app).post('/auth/logout').set(...bearer(accessToken));
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ success: true, message: 'Logged out' });

    const reuse = await request(app).get(LOCK).set(...bearer(accessToken));
    expect(reuse.status).toBe(401);
    expect(reuse.body.error).toBe('Revoked');

    const refresh = await request(app).post('/auth/refresh').send({ refreshToken });
    expect(refresh.status).toBe(401);
    expect(refresh.body.error).toBe('Revoked');
  });
});

// ==========================================
// E) Record leases
// ==========================================

describe('E) Record leases', () => {
  test('16. Lock, conflict, status, release, re-acquire', async () => {
    const anna = await loginAnna();
    const bohdan = await loginBohdan('kyiv');

    const acquired = await request(app).post(LOCK).set(...bearer(anna.accessToken));
    expect(acquired.status).toBe(201);
    expect(acquired.body).toEqual({
      recordId: 'kyiv/animals:42:general',
      holder: 'u-anna',
      acquiredAt: '2025-03-01T10:00:00.000Z',
      expiresAt: '2025-03-01T10:15:00.000Z',
    });

    const conflict = await request(app).post(LOCK).set(...bearer(bohdan.accessToken));
    expect(conflict.status).toBe(409);
    expect(conflict.body).toMatchObject({
      error: 'AlreadyLocked',
      holder: 'u-anna',
      expiresAt: '2025-03-01T10:15:00.000Z',
    });

    const status = await request(app).get(LOCK).set(...bearer(bohdan.accessToken));
    expect(status.status).toBe(200);
    expect(status.body).toMatchObject({ state: 'held', holder: 'u-anna' });

    const notHolder = await request(app).delete(LOCK).set(...bearer(bohdan.accessToken));
    expect(notHolder.status).toBe(403);
    expect(notHolder.body.error).toBe('NotHolder');

    const released = await request(app).delete(LOCK).set(...bearer(anna.accessToken));
    expect(released.status).toBe(204);

    const retaken = await request(app).post(LOCK).set(...bearer(bohdan.accessToken));
    expect(retaken.status).toBe(201);
    expect(retaken.body.holder).toBe('u-bohdan');
  });

  test('17. Renew extends the lease; an expired lease cannot be renewed', async () => {
    const { accessToken } = await loginAnna();
    await request(app).post(LOCK).set(...bearer(accessToken));

    const renewAt = new Date(BASE_TIME.getTime() + 10 * MINUTE).toISOString();
    const renewed = await request(app).put(LOCK).set(...bearer(accessToken)).set('X-Test-Now', renewAt);
    expect(renewed.status).toBe(200);
    expect(renewed.body.expiresAt).toBe('2025-03-01T10:25:00.000Z');

    const tooLate = new Date(BASE_TIME.getTime() + 26 * MINUTE).toISOString();
    const expired = await request(app).put(LOCK).set(...bearer(accessToken)).set('X-Test-Now', tooLate);
    expect(expired.status).toBe(410);
    expect(expired.body.error).toBe('LeaseExpired');
  });

  test('18. Leases are scoped to the session’s domain', async () => {
    const anna = await loginAnna();
    const bohdan = await loginBohdan('lviv');

    await request(app).post(LOCK).set(...bearer(anna.accessToken)).expect(201);
    const other = await request(app).post(LOCK).set(...bearer(bohdan.accessToken));
    expect(other.status).toBe(201);
    expect(other.body.recordId).toBe('lviv/animals:42:general');
  });

  test('19. A free record reports its state', async () => {
    const { accessToken } = await loginAnna();
    const res = await request(app).get('/crm/adoptions/7/lock').set(...bearer(accessToken));
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ state: 'free', recordId: 'kyiv/adoptions:7' });
  });
});

// ==========================================
// F) Passwords and invitations
// ==========================================

describe('F) Passwords and invitations', () => {
  test('20. Changing the password ends existing sessions', async () => {
    const { accessToken } = await loginAnna();

    const res = await request(app)
      .post('/auth/password/change')
      .set(...bearer(accessToken))
      .send({ password: 'anna-pass-2' });
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ message: 'Password changed successfully' });

    const reuse = await request(app).get(LOCK).set(...bearer(accessToken));
    expect(reuse.body.error).toBe('Revoked');
    await login('anna@example.org', 'anna-pass-2');
  });

  test('21. Forgot-password for an unknown account still answers 202 and sends nothing', async () => {
    const res = await request(app)
      .post('/auth/password/forgot')
      .send({ username: 'ghost@example.org', domain: 'kyiv' });
    expect(res.status).toBe(202);
    expect(res.body).toEqual({ message: 'Reset password email sent' });
    expect(mailer.sent).toEqual([]);
  });

  test('22. A reset link works once', async () => {
    await request(app)
      .post('/auth/password/forgot')
      .send({ username: 'anna@example.org', domain: 'kyiv' })
      .expect(202);
    const { token } = mailer.last();

    const reset = await request(app).post('/auth/password/reset').send({ token, password: 'fresh-pass-1' });
    expect(reset.status).toBe(200);

    const again = await request(app).post('/auth/password/reset').send({ token, password: 'fresh-pass-2' });
    expect(again.status).toBe(401);
    expect(again.body.error).toBe('Revoked');
    await login('anna@example.org', 'fresh-pass-1');
  });

  test('23. Invitation is bound to the inviter’s domain and accepted once', async () => {
    const { accessToken } = await loginBohdan('lviv');

    const invited = await request(app)
      .post('/auth/invitations')
      .set(...bearer(accessToken))
      .send({ email: 'New@Example.org', role: 'volunteer' });
    expect(invited.status).toBe(202);

    const { token } = mailer.last();
    const accepted = await request(app).post('/auth/invitations/accept').send({ token });
    expect(accepted.status).toBe(200);
    expect(accepted.body).toEqual({ email: 'new@example.org', domain: 'lviv', role: 'volunteer' });

    const replay = await request(app).post('/auth/invitations/accept').send({ token });
    expect(replay.status).toBe(401);
    expect(replay.body.error).toBe('Revoked');
  });

  test('24. Inviting an existing member returns 409', async () => {
    const { accessToken } = await loginBohdan('kyiv');
    const res = await request(app)
      .post('/auth/invitations')
      .set(...bearer(accessToken))
      .send({ email: 'anna@example.org', role: 'volunteer' });
    expect(res.status).toBe(409);
    expect(res.body.error).toBe('AccountExists');
    expect(mailer.sent).toEqual([]);
  });

  test('25. Inviting with a role the domain lacks returns 404', async () => {
    const { accessToken } = await loginAnna();
    const res = await request(app)
      .post('/auth/invitations')
      .set(...bearer(accessToken))
      .send({ email: 'new@example.org', role: 'director' });
    expect(res.status).toBe(404);
    expect(res.body.error).toBe('UnknownRole');
  });

  test('26. An invitation without a role is rejected', async () => {
    const { accessToken } = await loginAnna();
    const res = await request(app)
      .post('/auth/invitations')
      .set(...bearer(accessToken))
      .send({ email: 'new@example.org' });
    expect(res.status).toBe(400);
    expect(res.body.error).toBe('InvalidRequest');
  });

  test('27. Refresh is refused once the membership is withdrawn', async () => {
    const { refreshToken } = await loginBohdan('lviv');
    identity.seed(seedWithBohdan([{ domain: 'kyiv', role: 'volunteer' }]));

    const res = await request(app).post('/auth/refresh').send({ refreshToken });
    expect(res.status).toBe(403);
    expect(res.body.error).toBe('DomainNotAuthorized');
  });

  test('28. Short passwords are rejected', async () => {
    const { accessToken } = await loginAnna();
    const res = await request(app)
      .post('/auth/password/change')
      .set(...bearer(accessToken))
      .send({ password: 'short' });
    expect(res.status).toBe(400);
    expect(res.body.error).toBe('InvalidRequest');
  });
});

// ==========================================
// G) CORS
// ==========================================

describe('G) CORS', () => {
  test('29. Preflight from an allowed origin', async () => {
    const res = await request(app).options('/auth/login').set('Origin', 'http://localhost:3000');
    expect(res.status).toBe(204);
    expect(res.headers['access-control-allow-origin']).toBe('http://localhost:3000');
    expect(res.headers['access-control-allow-credentials']).toBe('true');
    expect(res.headers['access-control-allow-methods']).toBe('GET, POST, PUT, DELETE, OPTIONS');
  });

  test('30. Preflight from another origin is refused', async () => {
    const res = await request(app).options('/auth/login').set('Origin', 'https://evil.example.com');
    expect(res.status).toBe(403);
    expect(res.body.error).toBe('OriginNotAllowed');
  });

  test('31. Null origin is refused', async () => {
    const res = await request(app).get('/health').set('Origin', 'null');
    expect(res.status).toBe(403);
  });

  test('32. Simple request from another origin gets no CORS headers', async () => {
    const res = await request(app).get('/health').set('Origin', 'https://evil.example.com');
    expect(res.status).toBe(200);
    expect(res.headers['access-control-allow-origin']).toBeUndefined();
  });
});
