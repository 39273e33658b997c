import { Router } from 'express';
import { asyncHandler } from '../middleware/asyncHandler';
import { AuthRequest, authRequired, getActor } from '../middleware/auth';
import type { Services } from '../services';
import { PERMISSIONS, PERMISSION_GROUPS, resolvePermissionCodes } from '../services/permissionService';
import { parseInput } from '../validation/common';
import { bulkPermissionAssignmentSchema, permissionAssignmentSchema, permissionRevokeSchema } from '../validation/permissions';

export default function permissionsRouter({ permissions }: Services) {
  const router = Router();
  router.use(authRequired);

  router.get('/', (_req, res) => {
    res.json({
      permissions: Object.entries(PERMISSIONS).map(([codename, description]) => ({ codename, description })),
      groups: PERMISSION_GROUPS,
    });
  });

  // per-employee outcome; 207 when some employees could not be updated
  router.post('/bulk', asyncHandler(async (req: AuthRequest, res) => {
    const body = parseInput(bulkPermissionAssignmentSchema, req.body);
    const codes = resolvePermissionCodes(body.permissions, body.groups);
    const summary = await permissions.assignBulk(getActor(req), body.employeeIds, codes, { replace: body.replace });
    res.status(summary.failed > 0 ? 207 : 200).json(summary);
  }));

  router.get('/employees/:employeeId', asyncHandler(async (req: AuthRequest, res) => {
    const actor = getActor(req);
    if (actor.id !== req.params.employeeId) await permissions.authorize(actor, 'permissions.assign');
    res.json({ employeeId: req.params.employeeId, permissions: await permissions.listForEmployee(req.params.employeeId) });
  }));

  router.post('/employees/:employeeId', asyncHandler(async (req: AuthRequest, res) => {
    const body = parseInput(permissionAssignmentSchema, req.body);
    const codes = resolvePermissionCodes(body.permissions, body.groups);
    const granted = await permissions.assign(getActor(req), req.params.employeeId, codes, { replace: body.replace });
    res.json({ employeeId: req.params.employeeId, permissions: granted });
  }));

  router.delete('/employees/:employeeId', asyncHandler(async (req: AuthRequest, res) => {
    const body = parseInput(permissionRevokeSchema, req.body);
    const codes = resolvePermissionCodes(body.permissions);
    const remaining = await permissions.revoke(getActor(req), req.params.employeeId, codes);
    res.json({ employeeId: req.params.employeeId, permissions: remaining });
  }));

  return router;
}
