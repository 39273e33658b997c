import { Router } from 'express';
import { asyncHandler } from '../middleware/asyncHandler';
import { AuthRequest, authRequired, getActor } from '../middleware/auth';
import type { Services } from '../services';
import { runSucceeded } from '../services/attendanceScheduler';
import { todayKey } from '../utils/dates';
import {
  auditQuerySchema,
  calculateSchema,
  recordQuerySchema,
  reportQuerySchema,
  summaryQuerySchema,
} from '../validation/attendance';
import { parseInput } from '../validation/common';

export default function attendanceRouter({ attendance, overrides, scheduler, permissions }: Services) {
  const router = Router();
  router.use(authRequired);

  // ?employeeId defaults to the caller
  router.get('/', asyncHandler(async (req: AuthRequest, res) => {
    const actor = getActor(req);
    const query = parseInput(recordQuerySchema, { employeeId: actor.id, ...req.query });
    res.json(await attendance.findRecords(actor, query));
  }));

  router.get('/summary', asyncHandler(async (req: AuthRequest, res) => {
    const actor = getActor(req);
    const { employeeId, from, to } = parseInput(summaryQuerySchema, { employeeId: actor.id, ...req.query });
    res.json(await attendance.summary(actor, employeeId, from, to));
  }));

  router.get('/report', asyncHandler(async (req: AuthRequest, res) => {
    const query = parseInput(reportQuerySchema, req.query);
    res.json(await attendance.report(getActor(req), query));
  }));

  router.get('/audit', asyncHandler(async (req: AuthRequest, res) => {
    const query = parseInput(auditQuerySchema, req.query);
    res.json(await attendance.auditTrail(getActor(req), query));
  }));

  router.get('/:id/audit', asyncHandler(async (req: AuthRequest, res) => {
    res.json(await attendance.recordAudit(getActor(req), req.params.id));
  }));

  router.post('/calculate', asyncHandler(async (req: AuthRequest, res) => {
    const body = parseInput(calculateSchema, req.body ?? {});
    await permissions.authorize(getActor(req), 'attendance.calculate');
    if (body.from && body.to) {
      const run = await scheduler.runForRange(body.from, body.to);
      return res.status(run.ok ? 200 : 207).json(run);
    }
    const summary = await scheduler.runForDate(body.date ?? todayKey());
    res.status(runSucceeded(summary) ? 200 : 207).json(summary);
  }));

  router.post('/override', asyncHandler(async (req: AuthRequest, res) => {
    const change = await overrides.override(getActor(req), req.body);
    res.json(change);
  }));

  router.post('/:id/reset', asyncHandler(async (req: AuthRequest, res) => {
    const change = await overrides.reset(getActor(req), req.params.id, req.body);
    res.json(change);
  }));

  return router;
}
