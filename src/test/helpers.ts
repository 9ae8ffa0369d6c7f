import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import type { AppConfig } from '../config';
import { createServices } from '../services';
import type { Services } from '../services';

export const USER_AGENT = 'vitest-client/1.0';

// Local time so that formatDate(FIXED_NOW) is 2024-05-15 in any timezone.
export const FIXED_NOW = new Date(2024, 4, 15, 10, 30, 0);
export const TODAY = '2024-05-15';
export const YESTERDAY = '2024-05-14';

export async function makeDataDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'org-attendance-'));
}

export async function removeDataDir(dir: string) {
  await fs.rm(dir, { recursive: true, force: true });
}

export function testConfig(dataDir: string): AppConfig {
  return {
    port: 0,
    host: '127.0.0.1',
    dataDir,
    corsOrigins: ['http://localhost:9008'],
    seedOnStart: false,
    logRequests: false,
    version: '1.0.0-test',
  };
}

export function testServices(dataDir: string): Services {
  return createServices({ dataDir }, () => FIXED_NOW);
}
