import fs from 'fs';
import path from 'path';
import { logger } from './logger';

let envLoaded = false;

/**
 * Reads KEY=value pairs from ./.env into process.env. Variables already set win.
 */
export function loadEnv(cwd: string = process.cwd()) {
  if (envLoaded) {
    return;
  }

  const envFile = path.resolve(cwd, '.env');
  if (fs.existsSync(envFile)) {
    const content = fs.readFileSync(envFile, 'utf-8');
    for (const line of content.split('\n')) {
      const trimmed = line.trim();
      if (!trimmed || trimmed.startsWith('#')) continue;
      const [key, ...rest] = trimmed.split('=');
      const value = rest.join('=').trim().replace(/^(['"])(.*)\1$/, '$2');
      if (key && !(key.trim() in process.env)) {
        process.env[key.trim()] = value;
      }
    }
    logger.info('Environment variables loaded from .env');
  }

  envLoaded = true;
}
