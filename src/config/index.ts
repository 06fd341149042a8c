import 'dotenv/config';
import { configFromEnv } from './env.js';
import { ConfigError } from '../utils/errors.js';
import type { Config } from './schema.js';

function loadConfig(): Config {
  try {
    return configFromEnv(process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error('❌ Invalid configuration:');
      for (const issue of error.issues) {
        console.error(`  - ${issue}`);
      }
      process.exit(1);
    }
    throw error;
  }
}

export const config = loadConfig();
export type { Config };
