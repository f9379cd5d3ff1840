import 'dotenv/config';
import { createApp } from './app.js';
import { loadConfig } from './config/env.js';
import logger from './logger.js';
import { PreferencesStore } from './services/preferences.js';
import { RecordStore } from './services/records.js';
import { ReportJobQueue } from './services/reportJobs.js';

async function startServer() {
  const config = loadConfig();

  const preferences = new PreferencesStore(config.dataDir);
  const { currencySymbol } = await preferences.get();
  const records = await RecordStore.open({ dataDir: config.dataDir, defaultCurrencySymbol: currencySymbol });
  const reports = new ReportJobQueue({
    records,
    preferences,
    outputDir: config.reportsDir,
    topN: config.topCategories,
  });

  const app = createApp(
    { records, preferences, reports, topCategories: config.topCategories },
    { corsOrigin: config.corsOrigin }
  );

  const server = app.listen(config.port, () => {
    logger.info({ port: config.port, dataDir: config.dataDir }, 'Expense tracker API running');
    logger.info({ url: `http://localhost:${config.port}/api/insights/months` }, 'Insights API available');
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Shutting down, waiting for report jobs');
    server.close();
    reports
      .drain()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, 'Report jobs did not settle cleanly');
        process.exit(1);
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

startServer().catch((err) => {
  logger.error({ err }, 'Failed to start server');
  process.exit(1);
});
