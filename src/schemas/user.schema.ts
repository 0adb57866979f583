import { z } from 'zod';

export const UserRowSchema = z.object({
  id: z.number().int(),
  username: z.string(),
  balance: z.number(),
});

export const UsernameSchema = z.string().trim().min(1).max(50);

export const BalanceSchema = z.number().finite().nonnegative();

export const CreateUserSchema = z.object({
  username: UsernameSchema,
  balance: BalanceSchema.default(0),
});

// Allow-listed mutable fields; unknown keys are stripped
export const UpdateUserSchema = z.object({
  username: UsernameSchema.optional(),
  balance: BalanceSchema.optional(),
});
