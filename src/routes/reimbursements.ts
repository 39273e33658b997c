import { Router } from 'express';
import { asyncHandler } from '../middleware/asyncHandler';
import { AuthRequest, authRequired, getActor } from '../middleware/auth';
import type { Services } from '../services';

export default function reimbursementsRouter({ reimbursements }: Services) {
  const router = Router();
  router.use(authRequired);

  router.get('/', asyncHandler(async (req: AuthRequest, res) => {
    res.json(await reimbursements.listOwn(getActor(req)));
  }));

  router.get('/open', asyncHandler(async (req: AuthRequest, res) => {
    res.json(await reimbursements.listOpen(getActor(req)));
  }));

  router.get('/:id', asyncHandler(async (req: AuthRequest, res) => {
    res.json(await reimbursements.get(getActor(req), req.params.id));
  }));

  router.post('/', asyncHandler(async (req: AuthRequest, res) => {
    res.status(201).json(await reimbursements.create(getActor(req), req.body));
  }));

  // { decision: 'approve' | 'reject' | 'pay' }
  router.post('/:id/decision', asyncHandler(async (req: AuthRequest, res) => {
    res.json(await reimbursements.decide(getActor(req), req.params.id, req.body));
  }));

  return router;
}
