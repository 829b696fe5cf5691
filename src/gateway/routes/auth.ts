import { RequestHandler, Router } from 'express';
import { z } from 'zod';
import { DomainAuthenticator } from '../../security/authenticator';
import { asyncRoute } from '../middleware/errors';
import { requireAuthContext } from '../middleware/auth';

// HTML forms send an empty string for an untouched domain field
const optionalDomain = z.preprocess(
  value => (value === '' ? undefined : value),
  z.string().min(1).optional()
);

const loginBody = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
  domain: optionalDomain,
});

const refreshBody = z.object({ refreshToken: z.string().min(1) });
const tokenBody = z.object({ token: z.string().min(1) });
const passwordBody = z.object({ password: z.string().min(8) });
const resetBody = tokenBody.merge(passwordBody);
const forgotBody = z.object({ username: z.string().min(1), domain: z.string().min(1) });
const inviteBody = z.object({ email: z.string().email(), role: z.string().min(1) });

export function createAuthRoutes(authenticator: DomainAuthenticator, authenticate: RequestHandler): Router {
  const router = Router();

  // POST /auth/login - password grant with a tenant domain selector
  router.post('/login', asyncRoute(async (req, res) => {
    const result = await authenticator.authenticate(loginBody.parse(req.body));
    res.json(result);
  }));

  // POST /auth/refresh - rotates the refresh token
  router.post('/refresh', asyncRoute(async (req, res) => {
    const { refreshToken } = refreshBody.parse(req.body);
    res.json(await authenticator.refresh(refreshToken));
  }));

  // POST /auth/logout - revokes the access token and its refresh token
  router.post('/logout', authenticate, asyncRoute(async (req, res) => {
    await authenticator.logout(requireAuthContext(req).token);
    res.json({ success: true, message: 'Logged out' });
  }));

  router.post('/invitations', authenticate, asyncRoute(async (req, res) => {
    const { email, role } = inviteBody.parse(req.body);
    await authenticator.invite(requireAuthContext(req).claims, email, role);
    res.status(202).json({ message: 'Invitation email sent' });
  }));

  router.post('/invitations/accept', asyncRoute(async (req, res) => {
    const { token } = tokenBody.parse(req.body);
    res.json(await authenticator.acceptInvitation(token));
  }));

  // Always 202, whether or not the account exists
  router.post('/password/forgot', asyncRoute(async (req, res) => {
    const { username, domain } = forgotBody.parse(req.body);
    await authenticator.requestPasswordReset(username, domain);
    res.status(202).json({ message: 'Reset password email sent' });
  }));

  router.post('/password/reset', asyncRoute(async (req, res) => {
    const { token, password } = resetBody.parse(req.body);
    await authenticator.confirmPasswordReset(token, password);
    res.json({ message: 'Password changed successfully' });
  }));

  router.post('/password/change', authenticate, asyncRoute(async (req, res) => {
    const { password } = passwordBody.parse(req.body);
    await authenticator.changePassword(requireAuthContext(req).claims.sub, password);
    res.json({ message: 'Password changed successfully' });
  }));

  return router;
}
