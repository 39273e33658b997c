import { z } from 'zod';
import { dateKeySchema, idSchema } from './common';

const TWO_DECIMALS = { message: 'Amount must have at most two decimals' };

// amounts arrive as decimal currency ("12.50") or number and are kept in cents
const amountSchema = z
  .union([
    z.number().refine((v) => Math.abs(v * 100 - Math.round(v * 100)) < 1e-6, TWO_DECIMALS),
    z.string().trim().regex(/^\d+(\.\d{1,2})?$/, TWO_DECIMALS),
  ])
  .transform((v) => Math.round(Number(v) * 100))
  .refine((cents) => Number.isSafeInteger(cents) && cents > 0, { message: 'Amount must be greater than zero' });

export const categorySchema = z.object({
  name: z.string().trim().min(1).max(100),
  description: z.string().trim().max(2000).default(''),
});

export const expenseCreateSchema = z.object({
  categoryId: idSchema,
  title: z.string().trim().min(1).max(200),
  description: z.string().trim().max(5000).default(''),
  amount: amountSchema,
  expenseDate: dateKeySchema,
  receiptUrl: z.string().trim().url().max(500).nullable().optional(),
});

export const expenseUpdateSchema = expenseCreateSchema.partial();

export const expenseDecisionSchema = z.discriminatedUnion('decision', [
  z.object({ decision: z.literal('approve') }),
  z.object({
    decision: z.literal('reject'),
    reason: z.string().trim().min(1, { message: 'A rejection reason is required' }).max(2000),
  }),
]);

export const reimbursementCreateSchema = z.object({
  expenseIds: z.array(idSchema).min(1, { message: 'Select at least one approved expense' }).max(200),
  notes: z.string().trim().max(2000).default(''),
});

export const reimbursementDecisionSchema = z.object({
  decision: z.enum(['approve', 'reject', 'pay']),
});

export type ReimbursementDecision = z.infer<typeof reimbursementDecisionSchema>['decision'];
