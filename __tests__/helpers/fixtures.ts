import { DataSource } from 'typeorm';
import { Employee } from '../../src/entities/Employee';
import { createServices, Services } from '../../src/services';
import type { Actor } from '../../src/types';
import { createTestDataSource } from './testDataSource';

// Sunday 2026-10-18, midday local time; 2026-10-12..16 are Monday..Friday
export const NOW = new Date(2026, 9, 18, 12, 0, 0);
export const clock = () => NOW;

export const ADMIN: Actor = { id: 'ADMIN', role: 'admin', username: 'admin' };

export type TestContext = {
  dataSource: DataSource;
  services: Services;
};

export async function createTestContext(): Promise<TestContext> {
  const dataSource = await createTestDataSource();
  const services = createServices(dataSource, { now: clock, weeklyOffDays: [0] });
  await services.thresholds.ensureActive({ fullDayMinutes: 171, halfDayMinutes: 121 });
  return { dataSource, services };
}

export async function addEmployee(
  dataSource: DataSource,
  id: string,
  overrides: Partial<Omit<Employee, 'id'>> = {},
): Promise<Actor> {
  const repo = dataSource.getRepository(Employee);
  await repo.insert({
    id,
    name: `Employee ${id}`,
    email: null,
    department: 'Collections',
    jobPosition: 'Tele Caller',
    appRole: 'employee',
    isActive: true,
    passwordHash: null,
    ...overrides,
  });
  return { id, role: overrides.appRole ?? 'employee', username: `Employee ${id}` };
}
