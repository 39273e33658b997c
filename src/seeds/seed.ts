import 'reflect-metadata';
import bcrypt from 'bcrypt';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { bootstrap } from '../bootstrap';
import { Employee } from '../entities/Employee';
import { ExpenseCategory } from '../entities/ExpenseCategory';
import { Holiday } from '../entities/Holiday';
import { createLogger } from '../logger';
import AppDataSource from '../ormconfig';
import { createServices } from '../services';
import { resolvePermissionCodes } from '../services/permissionService';
import { SYSTEM_ACTOR } from '../types';
import { dateKeySchema, parseInput } from '../validation/common';
import { employeeCreateSchema } from '../validation/employees';
import { categorySchema } from '../validation/expenses';
import { holidaySchema } from '../validation/holidays';
import seedData from './data.json';

const log = createLogger('seed');

const seedSchema = z.object({
  employees: z.array(employeeCreateSchema.required({ id: true })).default([]),
  permissions: z
    .array(z.object({ employeeId: z.string(), permissions: z.array(z.string()).default([]), groups: z.array(z.string()).default([]) }))
    .default([]),
  expenseCategories: z.array(categorySchema).default([]),
  holidays: z.array(holidaySchema).default([]),
  callLogs: z.array(z.object({ employeeId: z.string(), date: dateKeySchema }).passthrough()).default([]),
});


async function runSeed() {
  await AppDataSource.initialize();
  log.info('DataSource initialized for seeding');

  const seed = parseInput(seedSchema, seedData);
  const services = createServices(AppDataSource);
  await bootstrap(AppDataSource, services);

  // Employees: insert if not exists
  const empRepo = AppDataSource.getRepository(Employee);
  let empInserted = 0;
  for (const { password, ...e } of seed.employees) {
    if (await empRepo.existsBy({ id: e.id })) continue;
    await empRepo.insert({
      ...e,
      email: e.email ?? null,
      department: e.department ?? null,
      jobPosition: e.jobPosition ?? null,
      isActive: true,
      passwordHash: password ? await bcrypt.hash(password, 10) : null,
    });
    empInserted++;
  }

  for (const p of seed.permissions) {
    await services.permissions.assign(SYSTEM_ACTOR, p.employeeId, resolvePermissionCodes(p.permissions, p.groups));
  }

  const categoryRepo = AppDataSource.getRepository(ExpenseCategory);
  for (const c of seed.expenseCategories) {
    if (!(await categoryRepo.existsBy({ name: c.name }))) {
      await categoryRepo.insert({ id: uuidv4(), ...c, isActive: true });
    }
  }

  const holidayRepo = AppDataSource.getRepository(Holiday);
  for (const h of seed.holidays) {
    if (!(await holidayRepo.existsBy({ date: h.date }))) await holidayRepo.insert({ id: uuidv4(), ...h });
  }

  const calls = await services.callLogs.ingest(SYSTEM_ACTOR, seed.callLogs);

  log.info(
    `Seeding complete. Employees inserted: ${empInserted}, call logs created: ${calls.created}, ` +
      `updated: ${calls.updated}, failed: ${calls.failed}`,
  );
  await AppDataSource.destroy();
}

if (require.main === module) {
  runSeed().catch((err) => {
    log.error('Seed failed', err);
    process.exit(1);
  });
}
