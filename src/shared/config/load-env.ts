import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { Logger } from '@nestjs/common';

/**
 * Loads the env file for the current NODE_ENV before Nest boots.
 * ENV_FILE overrides the choice; `.env` is the fallback.
 */
export function loadEnv(): void {
  const logger = new Logger('Env');
  const nodeEnv = process.env.NODE_ENV || 'development';
  let envFile = process.env.ENV_FILE;

  if (!envFile) {
    if (nodeEnv === 'production') {
      envFile = '.env.prod';
    } else if (nodeEnv === 'development') {
      envFile = '.env.local';
    } else {
      envFile = '.env';
    }
  }

  // process.cwd() is the project root when running scripts
  const envPath = path.resolve(process.cwd(), envFile);

  if (fs.existsSync(envPath)) {
    dotenv.config({ path: envPath });
    logger.log(`Loaded environment from ${envFile}`);
    return;
  }

  const defaultEnvPath = path.resolve(process.cwd(), '.env');
  if (fs.existsSync(defaultEnvPath)) {
    dotenv.config({ path: defaultEnvPath });
    logger.log('Loaded environment from .env (fallback)');
  } else {
    logger.warn(
      `Environment file ${envFile} not found and no .env fallback available.`,
    );
  }
}
