import { Router, type Router as RouterType } from 'express';
import type { AppServices } from '../app.js';
import { asyncHandler } from '../middleware/errorHandler.js';
import { assertMonthKey } from '../services/records.js';
import { assembleMonthReport } from '../services/report.js';
import { bodyFields, optionalString } from './requests.js';

export default function reportsRoutes({ records, preferences, reports, topCategories }: AppServices): RouterType {
  const router: RouterType = Router();

  // GET /api/reports/jobs - All report jobs of this session
  router.get('/jobs', (_req, res) => {
    res.json(reports.list());
  });

  // GET /api/reports/jobs/:id - Poll a report job
  router.get(
    '/jobs/:id',
    asyncHandler(async (req, res) => {
      res.json(reports.get(req.params.id));
    })
  );

  // POST /api/reports - Queue PDF (or tabular fallback) generation for a month
  router.post(
    '/',
    asyncHandler(async (req, res) => {
      const month = optionalString(bodyFields(req.body).get('month')) ?? '';
      const job = await reports.submit(month);
      res.status(202).json(job);
    })
  );

  // GET /api/reports/:month - Report payload for an external renderer
  router.get(
    '/:month',
    asyncHandler(async (req, res) => {
      const month = assertMonthKey(req.params.month);
      res.json(assembleMonthReport(records.snapshot(), await preferences.get(), month, topCategories));
    })
  );

  return router;
}
