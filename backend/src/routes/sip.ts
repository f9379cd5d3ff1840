import { Router, type Router as RouterType } from 'express';
import type { AppServices } from '../app.js';
import { asyncHandler } from '../middleware/errorHandler.js';
import { planSip, sipFutureValue, sipRequiredInvestment } from '../services/sip.js';
import { bodyFields, optionalNumeric, requireNumeric } from './requests.js';

export default function sipRoutes({ preferences }: AppServices): RouterType {
  const router: RouterType = Router();

  // POST /api/sip/future-value - Corpus after n monthly contributions
  router.post(
    '/future-value',
    asyncHandler(async (req, res) => {
      const fields = bodyFields(req.body);
      res.json(
        sipFutureValue({
          monthlyInvestment: requireNumeric(fields, 'monthlyInvestment'),
          annualRate: requireNumeric(fields, 'annualRate'),
          months: requireNumeric(fields, 'months'),
        })
      );
    })
  );

  // POST /api/sip/required-investment - Monthly amount needed to reach a target
  router.post(
    '/required-investment',
    asyncHandler(async (req, res) => {
      const fields = bodyFields(req.body);
      res.json(
        sipRequiredInvestment({
          targetValue: requireNumeric(fields, 'targetValue'),
          annualRate: requireNumeric(fields, 'annualRate'),
          months: requireNumeric(fields, 'months'),
        })
      );
    })
  );

  // POST /api/sip/plan - Projection plus optional goal, with display lines
  router.post(
    '/plan',
    asyncHandler(async (req, res) => {
      const fields = bodyFields(req.body);
      const { currencySymbol } = await preferences.get();
      res.json(
        planSip({
          monthlyInvestment: requireNumeric(fields, 'monthlyInvestment'),
          annualRate: requireNumeric(fields, 'annualRate'),
          years: optionalNumeric(fields.get('years')),
          months: optionalNumeric(fields.get('months')),
          goal: optionalNumeric(fields.get('goal')),
          currencySymbol,
        })
      );
    })
  );

  return router;
}
