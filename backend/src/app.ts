import cors from 'cors';
import express, { type Express } from 'express';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import expensesRoutes from './routes/expenses.js';
import incomeRoutes from './routes/income.js';
import insightsRoutes from './routes/insights.js';
import preferencesRoutes from './routes/preferences.js';
import reportsRoutes from './routes/reports.js';
import sipRoutes from './routes/sip.js';
import type { PreferencesStore } from './services/preferences.js';
import type { RecordStore } from './services/records.js';
import type { ReportJobQueue } from './services/reportJobs.js';

/** Everything the routes need, created once at startup and passed in explicitly */
export interface AppServices {
  records: RecordStore;
  preferences: PreferencesStore;
  reports: ReportJobQueue;
  topCategories: number;
}

export interface AppOptions {
  corsOrigin?: string;
}

export function createApp(services: AppServices, options: AppOptions = {}): Express {
  const app = express();

  app.use(cors({ origin: options.corsOrigin || 'http://localhost:5173' }));
  app.use(express.json());

  app.use('/api/expenses', expensesRoutes(services));
  app.use('/api/income', incomeRoutes(services));
  app.use('/api/preferences', preferencesRoutes(services));
  app.use('/api/insights', insightsRoutes(services));
  app.use('/api/sip', sipRoutes(services));
  app.use('/api/reports', reportsRoutes(services));

  // Health check
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
