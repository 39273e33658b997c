import { z } from 'zod';

const grantFields = {
  permissions: z.array(z.string().trim().min(1)).default([]),
  groups: z.array(z.string().trim().min(1)).default([]),
  replace: z.boolean().default(false),
};

const namesSomething = (b: { permissions: string[]; groups: string[]; replace: boolean }) =>
  b.replace || b.permissions.length > 0 || b.groups.length > 0;
const nothingNamed = { message: 'Name at least one permission or group', path: ['permissions'] };

export const permissionAssignmentSchema = z.object(grantFields).refine(namesSomething, nothingNamed);

export const bulkPermissionAssignmentSchema = z
  .object({
    employeeIds: z.array(z.string().trim().min(1)).min(1, { message: 'Name at least one employee' }).max(500),
    ...grantFields,
  })
  .refine(namesSomething, nothingNamed);

export const permissionRevokeSchema = z.object({
  permissions: z.array(z.string().trim().min(1)).min(1),
});
