import { z } from 'zod';

export const BalanceOperationSchema = z.enum(['increase', 'decrease']);

export const BalanceUpdateBodySchema = z.object({
  user_id: z.number().int().positive(),
  operation: BalanceOperationSchema,
  city: z.string().min(1),
});
