import { Router } from 'express';
import { User } from '../interfaces/user';
import { asyncRoute } from '../middleware/errorHandler';
import { UserService } from '../modules/userService';
import { sendOutcome } from './respond';

function toJson(user: User) {
  return { id: user.id, username: user.username, balance: user.balance };
}

export function createUserRouter(users: UserService): Router {
  const router = Router();

  router.post(
    '/users/',
    asyncRoute(async (req, res) => {
      sendOutcome(res, await users.create(req.body), {
        status: 201,
        failures: { validation: 400, persistence: 500 },
        body: toJson,
      });
    })
  );

  router.get(
    '/users/:id(\\d+)',
    asyncRoute(async (req, res) => {
      sendOutcome(res, await users.get(Number(req.params.id)), {
        status: 200,
        failures: { not_found: 404, persistence: 500 },
        body: toJson,
      });
    })
  );

  router.put(
    '/users/:id(\\d+)',
    asyncRoute(async (req, res) => {
      sendOutcome(res, await users.update(Number(req.params.id), req.body), {
        status: 200,
        // Storage errors on update answer 404 like a missing user
        failures: { validation: 400, not_found: 404, persistence: 404 },
        body: (user) => ({ message: 'User updated successfully', id: user.id }),
      });
    })
  );

  router.delete(
    '/users/:id(\\d+)',
    asyncRoute(async (req, res) => {
      sendOutcome(res, await users.remove(Number(req.params.id)), {
        status: 200,
        failures: { not_found: 404, persistence: 500 },
        body: () => ({ message: 'User deleted successfully' }),
      });
    })
  );

  router.get(
    '/users',
    asyncRoute(async (_req, res) => {
      sendOutcome(res, await users.list(), {
        status: 200,
        failures: { persistence: 500 },
        body: (list) => list.map(toJson),
      });
    })
  );

  return router;
}
