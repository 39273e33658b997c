import bcrypt from 'bcrypt';
import { Router } from 'express';
import { DataSource } from 'typeorm';
import { config } from '../config';
import { Employee } from '../entities/Employee';
import { AuthenticationError } from '../errors';
import { createLogger } from '../logger';
import { asyncHandler } from '../middleware/asyncHandler';
import { AuthRequest, authRequired, getActor, signToken } from '../middleware/auth';
import { PermissionService } from '../services/permissionService';
import { ADMIN_EMPLOYEE_ID, Actor } from '../types';
import { parseInput } from '../validation/common';
import { loginSchema } from '../validation/employees';

const log = createLogger('auth');

export default function authRouter(dataSource: DataSource, permissions: PermissionService) {
  const router = Router();
  const repo = dataSource.getRepository(Employee);

  router.post('/login', asyncHandler(async (req, res) => {
    const { username, password } = parseInput(loginSchema, req.body);

    // the built-in admin only exists when ADMIN_PASSWORD is configured
    if (username === 'admin' && config.auth.adminPassword && password === config.auth.adminPassword) {
      const user: Actor = { id: ADMIN_EMPLOYEE_ID, username: 'admin', role: 'admin' };
      return res.json({ ok: true, token: signToken(user), user });
    }

    const emp = await repo
      .createQueryBuilder('e')
      .addSelect('e.passwordHash')
      .where('e.id = :id', { id: username })
      .andWhere('e.isActive = :active', { active: true })
      .getOne();
    if (!emp?.passwordHash || !(await bcrypt.compare(password, emp.passwordHash))) {
      log.warn(`Failed login for ${username}`);
      throw new AuthenticationError('Invalid credentials');
    }

    const user: Actor = { id: emp.id, username: emp.name, role: emp.appRole };
    res.json({ ok: true, token: signToken(user), user });
  }));

  router.get('/me', authRequired, asyncHandler(async (req: AuthRequest, res) => {
    const actor = getActor(req);
    const employee = await repo.findOneBy({ id: actor.id });
    const grants = await permissions.listForEmployee(actor.id);
    res.json({ user: actor, employee, permissions: grants });
  }));

  return router;
}
