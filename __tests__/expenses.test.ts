import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { Expense } from '../src/entities/Expense';
import { AuthorizationError, ConflictError, NotFoundError, ValidationError } from '../src/errors';
import type { Actor } from '../src/types';
import { ADMIN, TestContext, addEmployee, createTestContext } from './helpers/fixtures';

describe('expenses and reimbursements', () => {
  let ctx: TestContext;
  let owner: Actor;
  let approver: Actor;
  let categoryId: string;

  const draft = (title: string, amount: number | string) =>
    ctx.services.expenses.create(owner, { categoryId, title, amount, expenseDate: '2026-10-12' });

  const approved = async (title: string, amount: number | string) => {
    const e = await draft(title, amount);
    await ctx.services.expenses.submit(owner, e.id);
    return ctx.services.expenses.decide(approver, e.id, { decision: 'approve' });
  };

  beforeEach(async () => {
    ctx = await createTestContext();
    owner = await addEmployee(ctx.dataSource, 'E1');
    approver = await addEmployee(ctx.dataSource, 'FIN1', { department: 'Finance', jobPosition: 'Accountant' });
    await ctx.services.permissions.assign(ADMIN, 'FIN1', ['expenses.approve', 'expenses.manage', 'reimbursements.approve']);
    categoryId = (await ctx.services.expenses.createCategory(ADMIN, { name: 'Travel' })).id;
  });

  afterEach(async () => {
    await ctx.dataSource.destroy();
  });

  describe('expenses', () => {
    it('stores amounts in cents as a draft owned by the caller', async () => {
      const e = await draft('Cab to client', '12.50');
      expect(e).toMatchObject({ employeeId: 'E1', amountCents: 1250, status: 'draft', description: '', receiptUrl: null });
    });

    it('accepts numeric amounts with up to two decimals', async () => {
      expect((await draft('Lunch', 19.99)).amountCents).toBe(1999);
      await expect(draft('Lunch', 12.345)).rejects.toThrow('Amount must have at most two decimals');
      await expect(draft('Lunch', '12.345')).rejects.toThrow('Amount must have at most two decimals');
    });

    it('rejects zero amounts and inactive categories', async () => {
      await expect(draft('Nothing', 0)).rejects.toThrow('Amount must be greater than zero');
      await ctx.services.expenses.deactivateCategory(ADMIN, categoryId);
      await expect(draft('Cab', 10)).rejects.toThrow(ValidationError);
    });

    it('edits drafts only', async () => {
      const e = await draft('Cab', 10);
      const edited = await ctx.services.expenses.update(owner, e.id, { title: 'Cab to branch', amount: 11 });
      expect(edited).toMatchObject({ title: 'Cab to branch', amountCents: 1100 });

      await ctx.services.expenses.submit(owner, e.id);
      await expect(ctx.services.expenses.update(owner, e.id, { amount: 99 })).rejects.toThrow(ConflictError);
    });

    it('hides other people’s expenses', async () => {
      const e = await draft('Cab', 10);
      const stranger = await addEmployee(ctx.dataSource, 'E9');
      await expect(ctx.services.expenses.get(stranger, e.id)).rejects.toThrow(AuthorizationError);
      await expect(ctx.services.expenses.submit(stranger, e.id)).rejects.toThrow(NotFoundError);
      expect((await ctx.services.expenses.get(approver, e.id)).id).toBe(e.id);
    });

    it('queues submitted expenses for approvers', async () => {
      const e = await draft('Lunch with client', 25);
      await ctx.services.expenses.submit(owner, e.id);

      expect((await ctx.services.expenses.listSubmitted(approver)).map((x) => x.id)).toEqual([e.id]);
      await expect(ctx.services.expenses.listSubmitted(owner)).rejects.toThrow(AuthorizationError);
    });

    it('approves or rejects submitted expenses', async () => {
      const ok = await approved('Train ticket', 40);
      expect(ok).toMatchObject({ status: 'approved', approvedBy: 'FIN1' });

      const e = await draft('Personal dinner', 60);
      await ctx.services.expenses.submit(owner, e.id);
      await expect(ctx.services.expenses.decide(approver, e.id, { decision: 'reject' })).rejects.toThrow(ValidationError);
      const rejected = await ctx.services.expenses.decide(approver, e.id, { decision: 'reject', reason: 'Not business related' });
      expect(rejected).toMatchObject({ status: 'rejected', rejectionReason: 'Not business related' });
    });

    it('refuses to decide a draft', async () => {
      const e = await draft('Cab', 10);
      await expect(ctx.services.expenses.decide(approver, e.id, { decision: 'approve' })).rejects.toThrow(
        'Cannot approve an expense that is draft',
      );
    });
  });

  describe('reimbursements', () => {
    it('bundles approved expenses and totals them', async () => {
      const a = await approved('Train ticket', 40);
      const b = await approved('Hotel', '120.75');

      const request = await ctx.services.reimbursements.create(owner, { expenseIds: [a.id, b.id], notes: 'October trip' });

      expect(request).toMatchObject({ employeeId: 'E1', totalCents: 16075, status: 'pending', notes: 'October trip' });
      expect(request.expenses.map((e) => e.reimbursementId)).toEqual([request.id, request.id]);
    });

    it('refuses expenses that are not approved or already claimed', async () => {
      const a = await approved('Train ticket', 40);
      const pending = await draft('Cab', 10);
      await ctx.services.reimbursements.create(owner, { expenseIds: [a.id] });

      await expect(ctx.services.reimbursements.create(owner, { expenseIds: [a.id] })).rejects.toThrow(ConflictError);
      await expect(ctx.services.reimbursements.create(owner, { expenseIds: [pending.id] })).rejects.toThrow(ConflictError);
    });

    it('refuses someone else’s expenses', async () => {
      const a = await approved('Train ticket', 40);
      const other = await addEmployee(ctx.dataSource, 'E2');
      await expect(ctx.services.reimbursements.create(other, { expenseIds: [a.id] })).rejects.toThrow(
        'You can only request reimbursement for your own expenses',
      );
    });

    it('walks pending, approved, paid and marks expenses reimbursed', async () => {
      const a = await approved('Train ticket', 40);
      const request = await ctx.services.reimbursements.create(owner, { expenseIds: [a.id] });

      await expect(ctx.services.reimbursements.decide(approver, request.id, { decision: 'pay' })).rejects.toThrow(
        'Cannot pay a reimbursement that is pending',
      );
      const approvedRequest = await ctx.services.reimbursements.decide(approver, request.id, { decision: 'approve' });
      expect(approvedRequest).toMatchObject({ status: 'approved', approvedBy: 'FIN1' });
      expect((await ctx.services.reimbursements.listOpen(approver)).map((r) => r.id)).toEqual([request.id]);

      const paid = await ctx.services.reimbursements.decide(approver, request.id, { decision: 'pay' });
      expect(paid.status).toBe('paid');
      expect((await ctx.dataSource.getRepository(Expense).findOneByOrFail({ id: a.id })).status).toBe('reimbursed');
      expect(await ctx.services.reimbursements.listOpen(approver)).toEqual([]);
    });

    it('releases expenses when a request is rejected', async () => {
      const a = await approved('Train ticket', 40);
      const request = await ctx.services.reimbursements.create(owner, { expenseIds: [a.id] });

      await ctx.services.reimbursements.decide(approver, request.id, { decision: 'reject' });

      const released = await ctx.dataSource.getRepository(Expense).findOneByOrFail({ id: a.id });
      expect(released).toMatchObject({ status: 'approved', reimbursementId: null });
      await expect(ctx.services.reimbursements.create(owner, { expenseIds: [a.id] })).resolves.toMatchObject({ totalCents: 4000 });
    });

    it('lets owners read their request with its expenses', async () => {
      const a = await approved('Train ticket', 40);
      const request = await ctx.services.reimbursements.create(owner, { expenseIds: [a.id] });

      const fetched = await ctx.services.reimbursements.get(owner, request.id);
      expect(fetched.expenses.map((e) => e.id)).toEqual([a.id]);
      expect((await ctx.services.reimbursements.listOwn(owner)).map((r) => r.id)).toEqual([request.id]);
    });
  });
});
