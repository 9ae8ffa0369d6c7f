import path from 'path';

export type AppConfig = {
  port: number;
  host: string;
  dataDir: string;
  corsOrigins: string[];
  seedOnStart: boolean;
  logRequests: boolean;
  version: string;
};

const DEFAULT_PORT = 9092;

function flag(value: string | undefined, fallback: boolean) {
  if (value === undefined || value.trim() === '') return fallback;
  return value.trim().toLowerCase() !== 'false';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const port = env.PORT ? Number(env.PORT) : DEFAULT_PORT;
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid PORT: ${env.PORT}`);
  }

  const corsOrigins = (env.CORS_ORIGINS ?? 'http://localhost:9008')
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);

  return {
    port,
    host: env.HOST || '0.0.0.0',
    dataDir: path.resolve(process.cwd(), env.DATA_DIR || 'data'),
    corsOrigins,
    seedOnStart: flag(env.SEED_ON_START, true),
    logRequests: flag(env.LOG_REQUESTS, true),
    version: env.APP_VERSION || '1.0.0',
  };
}
