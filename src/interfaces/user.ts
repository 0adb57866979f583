import { z } from 'zod';
import { UserRowSchema, CreateUserSchema, UpdateUserSchema } from '../schemas/user.schema';

export type User = z.infer<typeof UserRowSchema>;
export type NewUser = z.infer<typeof CreateUserSchema>;
export type UserChanges = z.infer<typeof UpdateUserSchema>;
