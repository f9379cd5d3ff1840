import pino from 'pino';
import { resolveLogLevel } from './config/env.js';

export const logger = pino({
  name: 'ledgerline',
  level: resolveLogLevel(),
});

export default logger;
