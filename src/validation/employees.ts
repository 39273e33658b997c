import { z } from 'zod';
import { idSchema } from './common';

const nullableText = z.string().trim().max(200).nullable().optional();

export const employeeCreateSchema = z.object({
  id: idSchema.regex(/^[A-Za-z0-9_-]+$/, { message: 'Employee id may only contain letters, digits, _ and -' }).optional(),
  name: z.string().trim().min(1).max(200),
  email: z.string().trim().email().nullable().optional(),
  department: nullableText,
  jobPosition: nullableText,
  appRole: z.enum(['employee', 'admin']).default('employee'),
  password: z.string().min(8).max(200).optional(),
});

export const employeeUpdateSchema = employeeCreateSchema.omit({ id: true }).partial().extend({
  isActive: z.boolean().optional(),
});

// fields an employee may change on their own profile
export const selfUpdateSchema = employeeUpdateSchema.pick({ name: true, email: true, password: true });

export const loginSchema = z.object({
  username: z.string().trim().min(1),
  password: z.string().min(1),
});
