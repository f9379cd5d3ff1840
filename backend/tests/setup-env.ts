import { config } from 'dotenv';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

const here = dirname(fileURLToPath(import.meta.url));

config({ path: resolve(here, '../.env.test') });

process.env.NODE_ENV = process.env.NODE_ENV || 'test';
if (!process.env.LOG_LEVEL) {
  process.env.LOG_LEVEL = 'silent';
}
