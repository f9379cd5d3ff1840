import { Router, type Router as RouterType } from 'express';
import type { AppServices } from '../app.js';
import { asyncHandler } from '../middleware/errorHandler.js';
import { toMoneyNumber } from '../services/money.js';
import { assertMonthKey } from '../services/records.js';
import { bodyFields, requireNumeric } from './requests.js';
import { serializeIncome } from './serializers.js';

export default function incomeRoutes({ records }: AppServices): RouterType {
  const router: RouterType = Router();

  // GET /api/income - Income per month, oldest first
  router.get(
    '/',
    asyncHandler(async (_req, res) => {
      res.json(serializeIncome(records.listIncome()));
    })
  );

  // PUT /api/income/:month - Set (or replace) the income for a month
  router.put(
    '/:month',
    asyncHandler(async (req, res) => {
      const month = assertMonthKey(req.params.month);
      const amount = requireNumeric(bodyFields(req.body), 'amount');
      await records.setIncome(month, amount);
      const stored = records.getIncome(month);
      res.json({ month, amount: stored ? toMoneyNumber(stored) : 0 });
    })
  );

  return router;
}
