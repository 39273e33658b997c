import bcrypt from 'bcrypt';
import { Router } from 'express';
import { DataSource } from 'typeorm';
import { v4 as uuidv4 } from 'uuid';
import { Employee } from '../entities/Employee';
import { ConflictError, NotFoundError, isUniqueViolation } from '../errors';
import { asyncHandler } from '../middleware/asyncHandler';
import { AuthRequest, authRequired, getActor, requireRole } from '../middleware/auth';
import { parseInput } from '../validation/common';
import { employeeCreateSchema, employeeUpdateSchema, selfUpdateSchema } from '../validation/employees';

const BCRYPT_ROUNDS = 10;

export default function employeesRouter(dataSource: DataSource) {
  const router = Router();
  const repo = dataSource.getRepository(Employee);

  router.use(authRequired);

  router.get('/', requireRole('admin'), asyncHandler(async (req, res) => {
    const list = await repo.find({ order: { name: 'ASC' } });
    res.json(list);
  }));

  router.get('/:id', asyncHandler(async (req: AuthRequest, res) => {
    const actor = getActor(req);
    if (actor.role !== 'admin' && actor.id !== req.params.id) throw new NotFoundError(`Employee ${req.params.id} not found`);
    const row = await repo.findOneBy({ id: req.params.id });
    if (!row) throw new NotFoundError(`Employee ${req.params.id} not found`);
    res.json(row);
  }));

  router.post('/', requireRole('admin'), asyncHandler(async (req, res) => {
    const { password, ...input } = parseInput(employeeCreateSchema, req.body);
    const id = input.id ?? `EMP${uuidv4().slice(0, 8).toUpperCase()}`;
    const employee = repo.create({
      ...input,
      id,
      email: input.email ?? null,
      department: input.department ?? null,
      jobPosition: input.jobPosition ?? null,
      isActive: true,
      passwordHash: password ? await bcrypt.hash(password, BCRYPT_ROUNDS) : null,
    });
    try {
      await repo.insert(employee);
    } catch (err) {
      if (isUniqueViolation(err)) throw new ConflictError(`Employee ${id} already exists`);
      throw err;
    }
    const created = await repo.findOneByOrFail({ id });
    res.status(201).json(created);
  }));

  router.put('/:id', asyncHandler(async (req: AuthRequest, res) => {
    const actor = getActor(req);
    const id = req.params.id;
    if (actor.role !== 'admin' && actor.id !== id) throw new NotFoundError(`Employee ${id} not found`);

    const { password, ...changes } =
      actor.role === 'admin' ? parseInput(employeeUpdateSchema, req.body) : parseInput(selfUpdateSchema, req.body);
    const existing = await repo.findOneBy({ id });
    if (!existing) throw new NotFoundError(`Employee ${id} not found`);

    repo.merge(existing, changes);
    if (password) existing.passwordHash = await bcrypt.hash(password, BCRYPT_ROUNDS);
    await repo.save(existing);
    res.json(await repo.findOneByOrFail({ id }));
  }));

  router.delete('/:id', requireRole('admin'), asyncHandler(async (req, res) => {
    const id = req.params.id;
    const result = await repo.update({ id }, { isActive: false });
    if (!result.affected) throw new NotFoundError(`Employee ${id} not found`);
    await repo.softDelete({ id });
    res.json({ ok: true, softDeleted: true });
  }));

  return router;
}
