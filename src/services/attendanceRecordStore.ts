import { EntityManager, FindOneOptions } from 'typeorm';
import { AttendanceRecord } from '../entities/AttendanceRecord';
import type { DateKey } from '../utils/dates';

// sqlite (tests) has no row locks; its single writer already serializes transactions
function forUpdate(manager: EntityManager): Pick<FindOneOptions<AttendanceRecord>, 'lock'> {
  return manager.connection.options.type === 'postgres' ? { lock: { mode: 'pessimistic_write' } } : {};
}

export async function lockRecord(manager: EntityManager, employeeId: string, date: DateKey): Promise<AttendanceRecord | null> {
  return manager.getRepository(AttendanceRecord).findOne({ where: { employeeId, date }, ...forUpdate(manager) });
}

export async function lockRecordById(manager: EntityManager, id: string): Promise<AttendanceRecord | null> {
  return manager.getRepository(AttendanceRecord).findOne({ where: { id }, ...forUpdate(manager) });
}
