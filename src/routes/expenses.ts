import { Router } from 'express';
import { asyncHandler } from '../middleware/asyncHandler';
import { AuthRequest, authRequired, getActor } from '../middleware/auth';
import type { Services } from '../services';

export default function expensesRouter({ expenses }: Services) {
  const router = Router();
  router.use(authRequired);

  router.get('/', asyncHandler(async (req: AuthRequest, res) => {
    res.json(await expenses.listOwn(getActor(req)));
  }));

  // approval queue
  router.get('/submitted', asyncHandler(async (req: AuthRequest, res) => {
    res.json(await expenses.listSubmitted(getActor(req)));
  }));

  router.get('/:id', asyncHandler(async (req: AuthRequest, res) => {
    res.json(await expenses.get(getActor(req), req.params.id));
  }));

  router.post('/', asyncHandler(async (req: AuthRequest, res) => {
    res.status(201).json(await expenses.create(getActor(req), req.body));
  }));

  router.put('/:id', asyncHandler(async (req: AuthRequest, res) => {
    res.json(await expenses.update(getActor(req), req.params.id, req.body));
  }));

  router.post('/:id/submit', asyncHandler(async (req: AuthRequest, res) => {
    res.json(await expenses.submit(getActor(req), req.params.id));
  }));

  router.post('/:id/decision', asyncHandler(async (req: AuthRequest, res) => {
    res.json(await expenses.decide(getActor(req), req.params.id, req.body));
  }));

  return router;
}
