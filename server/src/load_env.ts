import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';

export const ENV_FILE_NAMES = ['.env.local', '.env'];

/**
 * `explicit` (ENV_FILE) wins and must exist. Otherwise the first of
 * `.env.local`, `.env` found in `cwd`, then in its parent.
 */
export function findEnvFile(
  cwd: string,
  explicit?: string,
  exists: (candidate: string) => boolean = fs.existsSync
): string | null {
  if (explicit) {
    const resolved = path.resolve(cwd, explicit);
    if (!exists(resolved)) {
      throw new Error(`ENV_FILE not found: ${resolved}`);
    }
    return resolved;
  }
  for (const dir of [cwd, path.resolve(cwd, '..')]) {
    for (const name of ENV_FILE_NAMES) {
      const candidate = path.join(dir, name);
      if (exists(candidate)) return candidate;
    }
  }
  return null;
}

/** Loads the env file into `process.env` without overriding what is already set. Returns its path. */
export function loadEnv(cwd = process.cwd()): string | null {
  const envPath = findEnvFile(cwd, process.env.ENV_FILE);
  if (envPath) {
    dotenv.config({ path: envPath });
  }
  return envPath;
}
