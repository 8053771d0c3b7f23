import { registerAs } from '@nestjs/config';
import { dirname, join } from 'path';

/** The api package directory, the same whether running from sources or from dist/. */
export const PACKAGE_ROOT = dirname(require.resolve('@activity-signup/api/package.json'));

export const DEFAULT_PORT = 8000;

export interface AppConfig {
  port: number;
  databasePath: string;
  staticDir: string;
  dbLogging: boolean;
}

export function parsePort(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') {
    return DEFAULT_PORT;
  }

  const port = Number(raw);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`Invalid PORT value: ${raw}`);
  }

  return port;
}

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: parsePort(env.PORT),
    databasePath: env.DATABASE_PATH || join(PACKAGE_ROOT, 'activities.db'),
    staticDir: env.STATIC_DIR || join(PACKAGE_ROOT, 'static'),
    dbLogging: env.DB_LOGGING === 'true',
  };
}

export const appConfig = registerAs('app', (): AppConfig => loadAppConfig());
