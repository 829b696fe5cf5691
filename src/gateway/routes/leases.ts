import { Request, RequestHandler, Router } from 'express';
import { LeaseManager, leaseKeyFor } from '../../locking/leaseManager';
import { EditLease, LeaseStatus } from '../../shared/types';
import { asyncRoute } from '../middleware/errors';
import { requireAuthContext } from '../middleware/auth';

const LOCK_PATHS = ['/:recordType/:recordId/lock', '/:recordType/:recordId/:section/lock'];

function serializeLease(lease: EditLease) {
  return {
    recordId: lease.recordId,
    holder: lease.holder,
    acquiredAt: new Date(lease.acquiredAt).toISOString(),
    expiresAt: new Date(lease.expiresAt).toISOString(),
  };
}

function serializeStatus(status: LeaseStatus) {
  if (status.state === 'free') {
    return status;
  }
  return { state: status.state, ...serializeLease(status) };
}

/** Leases are tenant scoped: the same record id in two domains never collides. */
function leaseTarget(req: Request): { recordId: string; principalId: string } {
  const { claims } = requireAuthContext(req);
  const { recordType, recordId, section } = req.params;
  const key = leaseKeyFor(recordType, recordId, section);

  return {
    recordId: claims.domain ? `${claims.domain}/${key}` : key,
    principalId: claims.sub,
  };
}

export function createLeaseRoutes(leases: LeaseManager, authenticate: RequestHandler): Router {
  const router = Router();
  router.use(authenticate);

  // GET - who is editing, without trying to acquire
  router.get(LOCK_PATHS, asyncRoute(async (req, res) => {
    const { recordId } = leaseTarget(req);
    res.json(serializeStatus(await leases.status(recordId)));
  }));

  // POST - begin editing
  router.post(LOCK_PATHS, asyncRoute(async (req, res) => {
    const { recordId, principalId } = leaseTarget(req);
    res.status(201).json(serializeLease(await leases.acquire(recordId, principalId)));
  }));

  // PUT - still editing
  router.put(LOCK_PATHS, asyncRoute(async (req, res) => {
    const { recordId, principalId } = leaseTarget(req);
    res.json(serializeLease(await leases.renew(recordId, principalId)));
  }));

  // DELETE - saved or cancelled
  router.delete(LOCK_PATHS, asyncRoute(async (req, res) => {
    const { recordId, principalId } = leaseTarget(req);
    await leases.release(recordId, principalId);
    res.status(204).end();
  }));

  return router;
}
