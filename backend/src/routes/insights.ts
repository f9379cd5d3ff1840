import { Router, type Router as RouterType } from 'express';
import type { AppServices } from '../app.js';
import { asyncHandler } from '../middleware/errorHandler.js';
import { aggregate, aggregateAll, allTimeCategoryTotals } from '../services/aggregation.js';
import { assertMonthKey } from '../services/records.js';
import { buildChartData } from '../services/report.js';
import { suggest } from '../services/suggestions.js';
import { serializeAggregate, serializeSuggestions } from './serializers.js';

export default function insightsRoutes({ records, preferences, topCategories }: AppServices): RouterType {
  const router: RouterType = Router();

  // GET /api/insights/months - One summary per month with expenses or income
  router.get(
    '/months',
    asyncHandler(async (_req, res) => {
      const aggregates = aggregateAll(records.listExpenses(), records.listIncome(), topCategories);
      res.json(aggregates.map(serializeAggregate));
    })
  );

  // GET /api/insights/charts - Datasets for the overview charts
  router.get(
    '/charts',
    asyncHandler(async (_req, res) => {
      const expenses = records.listExpenses();
      const aggregates = aggregateAll(expenses, records.listIncome(), topCategories);
      res.json(buildChartData(aggregates, allTimeCategoryTotals(expenses)));
    })
  );

  // GET /api/insights/:month - Monthly summary with savings tips
  router.get(
    '/:month',
    asyncHandler(async (req, res) => {
      const month = assertMonthKey(req.params.month);
      const summary = aggregate(records.listExpenses(month), records.getIncome(month), month, topCategories);
      res.json(serializeSuggestions(suggest(summary, await preferences.get())));
    })
  );

  return router;
}
