import { DataSource, In } from 'typeorm';
import { v4 as uuidv4 } from 'uuid';
import { Expense } from '../entities/Expense';
import { ReimbursementRequest, ReimbursementStatus } from '../entities/ReimbursementRequest';
import { ConflictError, NotFoundError, ValidationError } from '../errors';
import { createLogger } from '../logger';
import type { Actor, Clock } from '../types';
import { parseInput } from '../validation/common';
import { ReimbursementDecision, reimbursementCreateSchema, reimbursementDecisionSchema } from '../validation/expenses';
import type { PermissionService } from './permissionService';

const log = createLogger('reimbursements');

// decision -> [required current status, resulting status]
const TRANSITIONS: Record<ReimbursementDecision, [ReimbursementStatus, ReimbursementStatus]> = {
  approve: ['pending', 'approved'],
  reject: ['pending', 'rejected'],
  pay: ['approved', 'paid'],
};

export type ReimbursementWithExpenses = ReimbursementRequest & { expenses: Expense[] };

export class ReimbursementService {
  constructor(
    private readonly dataSource: DataSource,
    private readonly permissions: PermissionService,
    private readonly now: Clock = () => new Date(),
  ) {}

  private get requests() {
    return this.dataSource.getRepository(ReimbursementRequest);
  }

  /** Bundles the actor's approved, not yet claimed expenses into one request. */
  async create(actor: Actor, raw: unknown): Promise<ReimbursementWithExpenses> {
    const input = parseInput(reimbursementCreateSchema, raw);
    const ids = [...new Set(input.expenseIds)];

    return this.dataSource.transaction(async (manager) => {
      const expenseRepo = manager.getRepository(Expense);
      const expenses = await expenseRepo.findBy({ id: In(ids) });
      if (expenses.length !== ids.length) throw new NotFoundError('One or more expenses were not found');
      if (expenses.some((e) => e.employeeId !== actor.id)) {
        throw new ValidationError('You can only request reimbursement for your own expenses');
      }
      const unavailable = expenses.filter((e) => e.status !== 'approved' || e.reimbursementId !== null);
      if (unavailable.length > 0) {
        throw new ConflictError(`Expenses not available for reimbursement: ${unavailable.map((e) => e.id).join(', ')}`);
      }

      const request = manager.getRepository(ReimbursementRequest).create({
        id: uuidv4(),
        employeeId: actor.id,
        totalCents: expenses.reduce((sum, e) => sum + e.amountCents, 0),
        status: 'pending',
        notes: input.notes,
        approvedBy: null,
      });
      const saved = await manager.getRepository(ReimbursementRequest).save(request);
      await expenseRepo.update({ id: In(ids) }, { reimbursementId: saved.id });
      for (const e of expenses) e.reimbursementId = saved.id;

      log.info(`${actor.id} requested reimbursement ${saved.id} for ${expenses.length} expenses (${saved.totalCents} cents)`);
      return { ...saved, expenses };
    });
  }

  async listOwn(actor: Actor): Promise<ReimbursementRequest[]> {
    return this.requests.find({ where: { employeeId: actor.id }, order: { createdAt: 'DESC' } });
  }

  /** Requests still waiting for approval or payment. */
  async listOpen(actor: Actor): Promise<ReimbursementRequest[]> {
    await this.permissions.authorize(actor, 'reimbursements.approve');
    return this.requests.find({ where: { status: In(['pending', 'approved']) }, order: { createdAt: 'ASC' } });
  }

  async get(actor: Actor, id: string): Promise<ReimbursementWithExpenses> {
    const request = await this.requests.findOneBy({ id });
    if (!request) throw new NotFoundError(`Reimbursement ${id} not found`);
    if (request.employeeId !== actor.id) await this.permissions.authorize(actor, 'reimbursements.approve');
    const expenses = await this.dataSource.getRepository(Expense).find({ where: { reimbursementId: id }, order: { expenseDate: 'ASC' } });
    return { ...request, expenses };
  }

  async decide(actor: Actor, id: string, raw: unknown): Promise<ReimbursementRequest> {
    const { decision } = parseInput(reimbursementDecisionSchema, raw);
    await this.permissions.authorize(actor, 'reimbursements.approve');
    const [from, to] = TRANSITIONS[decision];

    return this.dataSource.transaction(async (manager) => {
      const repo = manager.getRepository(ReimbursementRequest);
      const request = await repo.findOneBy({ id });
      if (!request) throw new NotFoundError(`Reimbursement ${id} not found`);
      if (request.status !== from) throw new ConflictError(`Cannot ${decision} a reimbursement that is ${request.status}`);

      request.status = to;
      if (decision === 'approve') {
        request.approvedBy = actor.id;
        request.approvedAt = this.now();
      }
      const saved = await repo.save(request);

      const expenses = manager.getRepository(Expense);
      if (decision === 'reject') await expenses.update({ reimbursementId: id }, { reimbursementId: null });
      if (decision === 'pay') await expenses.update({ reimbursementId: id }, { status: 'reimbursed' });

      log.info(`${actor.id} marked reimbursement ${id} ${to}`);
      return saved;
    });
  }
}
