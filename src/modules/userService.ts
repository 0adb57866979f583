import { z } from 'zod';
import { User } from '../interfaces/user';
import { describeError, fail, Outcome, succeed } from '../interfaces/outcome';
import { CreateUserSchema, UpdateUserSchema } from '../schemas/user.schema';
import { logger } from '../logger';
import { USER_NOT_FOUND } from './balanceLedger';
import { UserStore } from './userStore';

function validationMessage(error: z.ZodError): string {
  const details = error.issues
    .map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`)
    .join('; ');
  return `Invalid request body: ${details}`;
}

/** CRUD over users; every storage error comes back as a `persistence` failure. */
export class UserService {
  constructor(private readonly store: UserStore) {}

  async create(body: unknown): Promise<Outcome<User>> {
    const parsed = CreateUserSchema.safeParse(body);
    if (!parsed.success) return fail('validation', validationMessage(parsed.error));

    try {
      const user = this.store.create(parsed.data);
      logger.info({ userId: user.id }, 'User created');
      return succeed(user);
    } catch (err) {
      logger.error({ err }, 'User creation failed');
      return fail('persistence', describeError(err));
    }
  }

  async get(id: number): Promise<Outcome<User>> {
    try {
      const user = this.store.findById(id);
      return user ? succeed(user) : fail('not_found', USER_NOT_FOUND);
    } catch (err) {
      logger.error({ err, userId: id }, 'User lookup failed');
      return fail('persistence', describeError(err));
    }
  }

  async list(): Promise<Outcome<User[]>> {
    try {
      return succeed(this.store.list());
    } catch (err) {
      logger.error({ err }, 'User listing failed');
      return fail('persistence', describeError(err));
    }
  }

  async update(id: number, body: unknown): Promise<Outcome<User>> {
    const parsed = UpdateUserSchema.safeParse(body);
    if (!parsed.success) return fail('validation', validationMessage(parsed.error));

    try {
      const user = this.store.update(id, parsed.data);
      if (!user) return fail('not_found', USER_NOT_FOUND);

      logger.info({ userId: id, fields: Object.keys(parsed.data) }, 'User updated');
      return succeed(user);
    } catch (err) {
      logger.error({ err, userId: id }, 'User update failed');
      return fail('persistence', describeError(err));
    }
  }

  async remove(id: number): Promise<Outcome<{ id: number }>> {
    try {
      if (!this.store.delete(id)) return fail('not_found', USER_NOT_FOUND);

      logger.info({ userId: id }, 'User deleted');
      return succeed({ id });
    } catch (err) {
      logger.error({ err, userId: id }, 'User deletion failed');
      return fail('persistence', describeError(err));
    }
  }
}
