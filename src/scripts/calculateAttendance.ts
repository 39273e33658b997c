import 'reflect-metadata';
import { parseArgs } from 'node:util';
import { z } from 'zod';
import { createLogger } from '../logger';
import AppDataSource from '../ormconfig';
import { createServices, Services } from '../services';
import { RangeRunSummary } from '../services/attendanceScheduler';
import type { Clock } from '../types';
import { addDays, todayKey } from '../utils/dates';
import { MAX_CALCULATION_DAYS, calculationLimitError, withinCalculationLimit } from '../validation/attendance';
import { dateKeySchema, parseInput } from '../validation/common';

const log = createLogger('calculate-attendance');

const USAGE = 'Usage: calculate-attendance [--date YYYY-MM-DD | --from YYYY-MM-DD --to YYYY-MM-DD | --days-back N]';

const argsSchema = z
  .object({
    date: dateKeySchema.optional(),
    from: dateKeySchema.optional(),
    to: dateKeySchema.optional(),
    'days-back': z.coerce.number().int().min(1).max(MAX_CALCULATION_DAYS).optional(),
  })
  .refine((a) => [a.date, a.from ?? a.to, a['days-back']].filter((v) => v !== undefined).length <= 1, {
    message: 'Use only one of --date, --from/--to or --days-back',
  })
  .refine((a) => (a.from === undefined) === (a.to === undefined), { message: '--from and --to go together' })
  .refine((a) => !a.from || !a.to || a.from <= a.to, { message: '--from must not be after --to' })
  .refine(withinCalculationLimit, calculationLimitError);

export type CalculateRange = { from: string; to: string };

/** Resolves CLI flags to an inclusive date range; no flags means today. */
export function resolveRange(argv: string[], now: Clock = () => new Date()): CalculateRange {
  const { values } = parseArgs({
    args: argv,
    options: {
      date: { type: 'string' },
      from: { type: 'string' },
      to: { type: 'string' },
      'days-back': { type: 'string' },
    },
    strict: true,
  });
  const args = parseInput(argsSchema, values);
  const today = todayKey(now());
  if (args.date) return { from: args.date, to: args.date };
  if (args.from && args.to) return { from: args.from, to: args.to };
  // --days-back 3: the three days before today
  if (args['days-back']) return { from: addDays(today, -args['days-back']), to: addDays(today, -1) };
  return { from: today, to: today };
}

/** Exit status 0 when every date (and every employee in it) succeeded. */
export async function calculateAttendance(services: Services, range: CalculateRange): Promise<RangeRunSummary> {
  const run = await services.scheduler.runForRange(range.from, range.to);
  for (const day of run.results) {
    if (!day.workingDay) {
      log.info(`${day.date}: skipped, not a working day`);
    } else if (day.error) {
      log.error(`${day.date}: FAILED ${day.error}`);
    } else {
      log.info(
        `${day.date}: created ${day.created}, updated ${day.updated}, unchanged ${day.unchanged}, ` +
          `manual ${day.skippedManual}, failed ${day.failed.length}`,
      );
      day.failed.forEach((f) => log.error(`${day.date}: ${f.employeeId} failed: ${f.error}`));
    }
  }
  return run;
}

async function main(): Promise<number> {
  let range: CalculateRange;
  try {
    range = resolveRange(process.argv.slice(2));
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    console.error(USAGE);
    return 2;
  }

  await AppDataSource.initialize();
  try {
    const run = await calculateAttendance(createServices(AppDataSource), range);
    console.log(JSON.stringify(run, null, 2));
    return run.ok ? 0 : 1;
  } finally {
    await AppDataSource.destroy();
  }
}

if (require.main === module) {
  main()
    .then((code) => process.exit(code))
    .catch((err) => {
      log.error('Attendance calculation failed', err);
      process.exit(1);
    });
}
