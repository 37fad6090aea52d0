import { parse } from 'dotenv';
import { existsSync, readFileSync } from 'fs';

/**
 * Copies `.env` into the environment. Variables that are already set keep
 * their values. Runs before anything reads `DATABASE` or `CLUSTER_WORKERS`.
 */
export function loadEnvFile(path = '.env', env: NodeJS.ProcessEnv = process.env): void {
  if (!existsSync(path)) {
    return;
  }
  const parsed = parse(readFileSync(path));
  for (const [key, value] of Object.entries(parsed)) {
    if (env[key] === undefined) {
      env[key] = value;
    }
  }
}
