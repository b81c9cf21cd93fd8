/**
 * Environment configuration
 * .env.local wins over .env; both are optional
 */

import dotenv from 'dotenv';
import { DEFAULT_OVERRIDES_PATH } from './overrides.js';

dotenv.config({ path: '.env.local' });
dotenv.config();

export interface EnvConfig {
  dataSource: string;
  dataDir: string;
  dbPath: string;
  overridesPath: string;
  debug: boolean;
}

export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  return {
    dataSource: env.RESUPPLY_DATA_SOURCE || 'json',
    dataDir: env.RESUPPLY_DATA_DIR || './data',
    dbPath: env.RESUPPLY_DB_PATH || 'resupply.db',
    overridesPath: env.RESUPPLY_OVERRIDES_PATH || DEFAULT_OVERRIDES_PATH,
    debug: env.RESUPPLY_DEBUG === 'true' || env.RESUPPLY_DEBUG === '1',
  };
}
