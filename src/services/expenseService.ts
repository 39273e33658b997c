import { DataSource } from 'typeorm';
import { v4 as uuidv4 } from 'uuid';
import { Expense } from '../entities/Expense';
import { ExpenseCategory } from '../entities/ExpenseCategory';
import { ConflictError, NotFoundError, ValidationError, isUniqueViolation } from '../errors';
import { createLogger } from '../logger';
import type { Actor, Clock } from '../types';
import { parseInput } from '../validation/common';
import {
  categorySchema,
  expenseCreateSchema,
  expenseDecisionSchema,
  expenseUpdateSchema,
} from '../validation/expenses';
import type { PermissionService } from './permissionService';

const log = createLogger('expenses');

export class ExpenseService {
  constructor(
    private readonly dataSource: DataSource,
    private readonly permissions: PermissionService,
    private readonly now: Clock = () => new Date(),
  ) {}

  private get expenses() {
    return this.dataSource.getRepository(Expense);
  }

  private get categories() {
    return this.dataSource.getRepository(ExpenseCategory);
  }

  // ---- categories ----

  async listCategories(includeInactive = false): Promise<ExpenseCategory[]> {
    return this.categories.find({ where: includeInactive ? {} : { isActive: true }, order: { name: 'ASC' } });
  }

  async createCategory(actor: Actor, raw: unknown): Promise<ExpenseCategory> {
    const input = parseInput(categorySchema, raw);
    await this.permissions.authorize(actor, 'expenses.manage_categories');
    const category = this.categories.create({ id: uuidv4(), ...input, isActive: true });
    try {
      await this.categories.insert(category);
    } catch (err) {
      if (isUniqueViolation(err)) throw new ConflictError(`Category ${input.name} already exists`);
      throw err;
    }
    return category;
  }

  async deactivateCategory(actor: Actor, id: string): Promise<ExpenseCategory> {
    await this.permissions.authorize(actor, 'expenses.manage_categories');
    const category = await this.categories.findOneBy({ id });
    if (!category) throw new NotFoundError(`Category ${id} not found`);
    category.isActive = false;
    return this.categories.save(category);
  }

  // ---- expenses ----

  async create(actor: Actor, raw: unknown): Promise<Expense> {
    const input = parseInput(expenseCreateSchema, raw);
    await this.requireActiveCategory(input.categoryId);
    const expense = this.expenses.create({
      id: uuidv4(),
      employeeId: actor.id,
      categoryId: input.categoryId,
      title: input.title,
      description: input.description,
      amountCents: input.amount,
      expenseDate: input.expenseDate,
      receiptUrl: input.receiptUrl ?? null,
      status: 'draft',
      approvedBy: null,
      rejectionReason: null,
      reimbursementId: null,
    });
    return this.expenses.save(expense);
  }

  async update(actor: Actor, id: string, raw: unknown): Promise<Expense> {
    const input = parseInput(expenseUpdateSchema, raw);
    const expense = await this.requireOwned(actor, id);
    if (expense.status !== 'draft') throw new ConflictError('Only draft expenses can be edited');
    if (input.categoryId !== undefined) {
      await this.requireActiveCategory(input.categoryId);
      expense.categoryId = input.categoryId;
    }
    if (input.title !== undefined) expense.title = input.title;
    if (input.description !== undefined) expense.description = input.description;
    if (input.amount !== undefined) expense.amountCents = input.amount;
    if (input.expenseDate !== undefined) expense.expenseDate = input.expenseDate;
    if (input.receiptUrl !== undefined) expense.receiptUrl = input.receiptUrl;
    return this.expenses.save(expense);
  }

  async submit(actor: Actor, id: string): Promise<Expense> {
    const expense = await this.requireOwned(actor, id);
    if (expense.status !== 'draft') throw new ConflictError(`Cannot submit an expense that is ${expense.status}`);
    expense.status = 'submitted';
    return this.expenses.save(expense);
  }

  async listOwn(actor: Actor): Promise<Expense[]> {
    return this.expenses.find({ where: { employeeId: actor.id }, order: { expenseDate: 'DESC', createdAt: 'DESC' } });
  }

  async listSubmitted(actor: Actor): Promise<Expense[]> {
    await this.permissions.authorize(actor, 'expenses.manage');
    return this.expenses.find({ where: { status: 'submitted' }, order: { createdAt: 'ASC' } });
  }

  async get(actor: Actor, id: string): Promise<Expense> {
    const expense = await this.expenses.findOneBy({ id });
    if (!expense) throw new NotFoundError(`Expense ${id} not found`);
    if (expense.employeeId !== actor.id) await this.permissions.authorize(actor, 'expenses.manage');
    return expense;
  }

  async decide(actor: Actor, id: string, raw: unknown): Promise<Expense> {
    const decision = parseInput(expenseDecisionSchema, raw);
    await this.permissions.authorize(actor, 'expenses.approve');
    const expense = await this.expenses.findOneBy({ id });
    if (!expense) throw new NotFoundError(`Expense ${id} not found`);
    if (expense.status !== 'submitted') throw new ConflictError(`Cannot ${decision.decision} an expense that is ${expense.status}`);

    if (decision.decision === 'approve') {
      expense.status = 'approved';
      expense.approvedBy = actor.id;
      expense.approvedAt = this.now();
    } else {
      expense.status = 'rejected';
      expense.rejectionReason = decision.reason;
    }
    const saved = await this.expenses.save(expense);
    log.info(`${actor.id} ${saved.status} expense ${id} of ${saved.employeeId}`);
    return saved;
  }

  private async requireOwned(actor: Actor, id: string): Promise<Expense> {
    const expense = await this.expenses.findOneBy({ id, employeeId: actor.id });
    if (!expense) throw new NotFoundError(`Expense ${id} not found`);
    return expense;
  }

  private async requireActiveCategory(id: string): Promise<ExpenseCategory> {
    const category = await this.categories.findOneBy({ id, isActive: true });
    if (!category) throw new ValidationError(`Expense category ${id} does not exist or is inactive`);
    return category;
  }
}
