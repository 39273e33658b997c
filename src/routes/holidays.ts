import { Router } from 'express';
import { asyncHandler } from '../middleware/asyncHandler';
import { AuthRequest, authRequired, getActor } from '../middleware/auth';
import type { Services } from '../services';
import { todayKey } from '../utils/dates';
import { parseInput } from '../validation/common';
import { holidayRangeSchema, holidaySchema } from '../validation/holidays';

export default function holidaysRouter({ calendar }: Services) {
  const router = Router();
  router.use(authRequired);

  // defaults to the current calendar year
  router.get('/', asyncHandler(async (req, res) => {
    const year = todayKey().slice(0, 4);
    const { from, to } = parseInput(holidayRangeSchema, { from: `${year}-01-01`, to: `${year}-12-31`, ...req.query });
    res.json(await calendar.listHolidays(from, to));
  }));

  router.get('/working-day/:date', asyncHandler(async (req, res) => {
    const { date } = parseInput(holidaySchema.pick({ date: true }), req.params);
    res.json({ date, workingDay: await calendar.isWorkingDay(date) });
  }));

  router.post('/', asyncHandler(async (req: AuthRequest, res) => {
    const { date, name } = parseInput(holidaySchema, req.body);
    res.status(201).json(await calendar.addHoliday(getActor(req), date, name));
  }));

  router.delete('/:id', asyncHandler(async (req: AuthRequest, res) => {
    await calendar.removeHoliday(getActor(req), req.params.id);
    res.status(204).end();
  }));

  return router;
}
