import { EntityManager, In } from 'typeorm';
import { Employee } from '../entities/Employee';
import { NotFoundError } from '../errors';

export async function findActiveEmployee(manager: EntityManager, id: string): Promise<Employee | null> {
  return manager.getRepository(Employee).findOneBy({ id, isActive: true });
}

export async function requireActiveEmployee(manager: EntityManager, id: string): Promise<Employee> {
  const employee = await findActiveEmployee(manager, id);
  if (!employee) throw new NotFoundError(`Employee ${id} not found`);
  return employee;
}

/** Ids from `ids` that belong to active employees. */
export async function activeEmployeeIds(manager: EntityManager, ids: string[]): Promise<Set<string>> {
  if (ids.length === 0) return new Set();
  const rows = await manager.getRepository(Employee).find({
    select: { id: true },
    where: { id: In([...new Set(ids)]), isActive: true },
  });
  return new Set(rows.map((r) => r.id));
}
