import { Router, type Router as RouterType } from 'express';
import type { AppServices } from '../app.js';
import { CURRENCY_OPTIONS, DEFAULT_CURRENCY_SYMBOL } from '../constants/currencies.js';
import { asyncHandler } from '../middleware/errorHandler.js';
import { bodyFields, optionalNumeric, optionalString } from './requests.js';
import { serializePreferences } from './serializers.js';

export default function preferencesRoutes({ preferences }: AppServices): RouterType {
  const router: RouterType = Router();

  // GET /api/preferences
  router.get(
    '/',
    asyncHandler(async (_req, res) => {
      res.json(serializePreferences(await preferences.get()));
    })
  );

  // GET /api/preferences/currencies - Symbols offered in pickers
  router.get('/currencies', (_req, res) => {
    res.json({ options: CURRENCY_OPTIONS, default: DEFAULT_CURRENCY_SYMBOL });
  });

  // PUT /api/preferences - Update currency symbol and/or default budget
  router.put(
    '/',
    asyncHandler(async (req, res) => {
      const fields = bodyFields(req.body);
      const updated = await preferences.set({
        currencySymbol: optionalString(fields.get('currencySymbol')),
        defaultMonthlyBudget: optionalNumeric(fields.get('defaultMonthlyBudget')),
      });
      res.json(serializePreferences(updated));
    })
  );

  return router;
}
