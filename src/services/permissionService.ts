import { DataSource, In } from 'typeorm';
import { v4 as uuidv4 } from 'uuid';
import { EmployeePermission } from '../entities/EmployeePermission';
import { AppError, AuthorizationError, ErrorCode, ValidationError, errorMessage } from '../errors';
import { createLogger } from '../logger';
import type { Actor } from '../types';
import { findActiveEmployee, requireActiveEmployee } from './employeeDirectory';

const log = createLogger('permissions');

export const PERMISSIONS = {
  'attendance.override': 'Manually override call attendance and reset overrides',
  'attendance.configure': 'Change call attendance thresholds',
  'attendance.calculate': 'Trigger the daily attendance calculation',
  'attendance.ingest': 'Upload or post call logs',
  'attendance.view_all': 'View attendance of every employee',
  'attendance.view_audit': 'View the attendance audit trail',
  'calendar.manage': 'Maintain the holiday calendar',
  'expenses.manage': 'View every submitted expense',
  'expenses.approve': 'Approve or reject expenses',
  'expenses.manage_categories': 'Maintain expense categories',
  'reimbursements.approve': 'Approve, reject and pay reimbursement requests',
  'permissions.assign': 'Grant and revoke employee permissions',
} as const;

export type PermissionCode = keyof typeof PERMISSIONS;

export const PERMISSION_GROUPS: Record<string, PermissionCode[]> = {
  'expense-managers': ['expenses.manage', 'expenses.approve', 'expenses.manage_categories', 'reimbursements.approve'],
  'expense-approvers': ['expenses.manage', 'expenses.approve', 'reimbursements.approve'],
  'attendance-supervisors': [
    'attendance.override',
    'attendance.view_all',
    'attendance.view_audit',
    'attendance.ingest',
  ],
};

// team leads and managers may override attendance without an explicit grant
const SUPERVISOR_POSITION = /\b(team lead(er)?|tl|manager)\b/i;

export type Capability =
  | { allowed: true; via: 'admin' | 'job-position' | 'grant' }
  | { allowed: false; reason: string };

export type EmployeeGrantResult =
  | { employeeId: string; ok: true; permissions: string[] }
  | { employeeId: string; ok: false; kind: ErrorCode | 'INTERNAL'; message: string };

export type BulkGrantSummary = {
  succeeded: number;
  failed: number;
  results: EmployeeGrantResult[];
};

export function isPermissionCode(value: string): value is PermissionCode {
  return Object.prototype.hasOwnProperty.call(PERMISSIONS, value);
}

/** Flatten codenames plus named groups into a deduplicated, validated list. */
export function resolvePermissionCodes(codenames: string[], groups: string[] = []): PermissionCode[] {
  const unknownGroups = groups.filter((g) => !(g in PERMISSION_GROUPS));
  const unknownCodes = codenames.filter((c) => !isPermissionCode(c));
  if (unknownGroups.length > 0 || unknownCodes.length > 0) {
    throw new ValidationError('Unknown permissions or groups', { permissions: unknownCodes, groups: unknownGroups });
  }
  const resolved = new Set<PermissionCode>(codenames.filter(isPermissionCode));
  for (const g of groups) PERMISSION_GROUPS[g].forEach((c) => resolved.add(c));
  return [...resolved].sort();
}

export class PermissionService {
  constructor(private readonly dataSource: DataSource) {}

  private get grants() {
    return this.dataSource.getRepository(EmployeePermission);
  }

  async check(actor: Actor, codename: PermissionCode): Promise<Capability> {
    if (actor.role === 'admin') return { allowed: true, via: 'admin' };

    const employee = await findActiveEmployee(this.dataSource.manager, actor.id);
    if (!employee) return { allowed: false, reason: `Employee ${actor.id} is unknown or inactive` };

    if (codename === 'attendance.override' && employee.jobPosition && SUPERVISOR_POSITION.test(employee.jobPosition)) {
      return { allowed: true, via: 'job-position' };
    }

    const grant = await this.grants.findOneBy({ employeeId: actor.id, codename });
    if (grant) return { allowed: true, via: 'grant' };

    return { allowed: false, reason: `Missing permission ${codename}` };
  }

  async can(actor: Actor, codename: PermissionCode): Promise<boolean> {
    return (await this.check(actor, codename)).allowed;
  }

  async authorize(actor: Actor, codename: PermissionCode): Promise<void> {
    const capability = await this.check(actor, codename);
    if (!capability.allowed) {
      log.warn(`Denied ${codename} for ${actor.id}: ${capability.reason}`);
      throw new AuthorizationError(capability.reason);
    }
  }

  async listForEmployee(employeeId: string): Promise<string[]> {
    const rows = await this.grants.find({ where: { employeeId }, order: { codename: 'ASC' } });
    return rows.map((r) => r.codename);
  }

  async assign(actor: Actor, employeeId: string, codes: PermissionCode[], opts: { replace?: boolean } = {}): Promise<string[]> {
    await this.authorize(actor, 'permissions.assign');

    await this.dataSource.transaction(async (manager) => {
      await requireActiveEmployee(manager, employeeId);
      const repo = manager.getRepository(EmployeePermission);
      if (opts.replace) await repo.delete({ employeeId });

      const existing = new Set((await repo.findBy({ employeeId })).map((r) => r.codename));
      const missing = codes.filter((c) => !existing.has(c));
      if (missing.length > 0) {
        await repo.insert(missing.map((codename) => ({ id: uuidv4(), employeeId, codename, grantedBy: actor.id })));
      }
    });

    log.info(`${actor.id} ${opts.replace ? 'replaced' : 'granted'} [${codes.join(', ')}] for ${employeeId}`);
    return this.listForEmployee(employeeId);
  }

  async revoke(actor: Actor, employeeId: string, codes: PermissionCode[]): Promise<string[]> {
    await this.authorize(actor, 'permissions.assign');
    await requireActiveEmployee(this.dataSource.manager, employeeId);
    if (codes.length > 0) await this.grants.delete({ employeeId, codename: In(codes) });
    log.info(`${actor.id} revoked [${codes.join(', ')}] for ${employeeId}`);
    return this.listForEmployee(employeeId);
  }

  /** Applies the same grant to each employee; one unknown or inactive employee does not stop the rest. */
  async assignBulk(
    actor: Actor,
    employeeIds: string[],
    codes: PermissionCode[],
    opts: { replace?: boolean } = {},
  ): Promise<BulkGrantSummary> {
    await this.authorize(actor, 'permissions.assign');
    return this.forEachEmployee(employeeIds, (id) => this.assign(actor, id, codes, opts));
  }

  async revokeBulk(actor: Actor, employeeIds: string[], codes: PermissionCode[]): Promise<BulkGrantSummary> {
    await this.authorize(actor, 'permissions.assign');
    return this.forEachEmployee(employeeIds, (id) => this.revoke(actor, id, codes));
  }

  private async forEachEmployee(
    employeeIds: string[],
    apply: (employeeId: string) => Promise<string[]>,
  ): Promise<BulkGrantSummary> {
    const summary: BulkGrantSummary = { succeeded: 0, failed: 0, results: [] };
    for (const employeeId of new Set(employeeIds)) {
      try {
        summary.results.push({ employeeId, ok: true, permissions: await apply(employeeId) });
        summary.succeeded += 1;
      } catch (err) {
        summary.failed += 1;
        if (err instanceof AppError) {
          summary.results.push({ employeeId, ok: false, kind: err.code, message: err.message });
        } else {
          log.error(`Permission change for ${employeeId} failed`, err);
          summary.results.push({ employeeId, ok: false, kind: 'INTERNAL', message: errorMessage(err) });
        }
      }
    }
    return summary;
  }
}
