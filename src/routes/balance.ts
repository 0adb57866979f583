import { Router } from 'express';
import { BalanceUpdate } from '../interfaces/balance';
import { asyncRoute } from '../middleware/errorHandler';
import { BalanceUpdateService } from '../modules/balanceUpdate';
import { sendOutcome, StatusMap } from './respond';

const PATH_FAILURES: StatusMap = {
  not_found: 404,
  upstream_unavailable: 400,
  persistence: 500,
};

// Every failure on the body variant is a 400, unknown users included
const BODY_FAILURES: StatusMap = {
  not_found: 400,
  upstream_unavailable: 400,
  validation: 400,
  persistence: 400,
};

const toMessage = (update: BalanceUpdate) => ({ message: update.message });

export function createBalanceRouter(balances: BalanceUpdateService): Router {
  const router = Router();

  router.get(
    '/update-balance/:operation/:userId(\\d+)/:city',
    asyncRoute(async (req, res) => {
      const outcome = await balances.updateFromPath({
        operation: req.params.operation,
        userId: Number(req.params.userId),
        city: req.params.city,
      });

      sendOutcome(res, outcome, { status: 200, failures: PATH_FAILURES, body: toMessage });
    })
  );

  router.post(
    '/update-balance',
    asyncRoute(async (req, res) => {
      const outcome = await balances.updateFromBody(req.body);
      sendOutcome(res, outcome, { status: 200, failures: BODY_FAILURES, body: toMessage });
    })
  );

  return router;
}
