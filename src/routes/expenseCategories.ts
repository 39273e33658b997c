import { Router } from 'express';
import { asyncHandler } from '../middleware/asyncHandler';
import { AuthRequest, authRequired, getActor } from '../middleware/auth';
import type { Services } from '../services';

export default function expenseCategoriesRouter({ expenses }: Services) {
  const router = Router();
  router.use(authRequired);

  router.get('/', asyncHandler(async (req, res) => {
    res.json(await expenses.listCategories(req.query.all === 'true'));
  }));

  router.post('/', asyncHandler(async (req: AuthRequest, res) => {
    res.status(201).json(await expenses.createCategory(getActor(req), req.body));
  }));

  router.delete('/:id', asyncHandler(async (req: AuthRequest, res) => {
    res.json(await expenses.deactivateCategory(getActor(req), req.params.id));
  }));

  return router;
}
