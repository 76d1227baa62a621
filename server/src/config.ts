import path from 'path';
import dotenv from 'dotenv';

export interface AppConfig {
  port: number;
  databasePath: string;
  origins: string[];
}

const DEV_ORIGIN = 'http://localhost:5173';

/** Loads `<dir>/.env` into process.env; variables already set win. */
export function loadEnvFile(dir: string = process.cwd()): void {
  dotenv.config({ path: path.join(dir, '.env') });
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const rawPort = (env.PORT ?? '').trim();
  const port = rawPort ? Number(rawPort) : 4000;
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`PORT must be an integer between 0 and 65535, got "${env.PORT}"`);
  }

  const databasePath = (env.DATABASE_PATH ?? '').trim() || 'projects.db';

  const origins = [DEV_ORIGIN];
  const origin = (env.ORIGIN ?? '').trim();
  if (origin && origin !== DEV_ORIGIN) origins.unshift(origin);

  return { port, databasePath, origins };
}
