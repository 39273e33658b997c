import { Router } from 'express';
import { asyncHandler } from '../middleware/asyncHandler';
import { AuthRequest, authRequired, getActor } from '../middleware/auth';
import type { Services } from '../services';
import { thresholdsSchema } from '../validation/attendance';
import { parseInput } from '../validation/common';

export default function attendanceConfigRouter({ thresholds }: Services) {
  const router = Router();
  router.use(authRequired);

  router.get('/', asyncHandler(async (_req, res) => {
    res.json(await thresholds.getActive());
  }));

  router.get('/versions', asyncHandler(async (_req, res) => {
    res.json(await thresholds.listVersions());
  }));

  router.post('/', asyncHandler(async (req: AuthRequest, res) => {
    const input = parseInput(thresholdsSchema, req.body);
    res.status(201).json(await thresholds.create(getActor(req), input));
  }));

  router.post('/:id/activate', asyncHandler(async (req: AuthRequest, res) => {
    res.json(await thresholds.activate(getActor(req), req.params.id));
  }));

  return router;
}
