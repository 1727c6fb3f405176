import { config as loadEnv } from 'dotenv';
import { existsSync } from 'fs';
import path from 'path';

const DEFAULT_APP_VERSION = '1.0.0';

let envLoaded = false;

export function getAppEnv(): string {
  return process.env.APP_ENV ?? process.env.NODE_ENV ?? 'development';
}

/**
 * Load `.env` files from `projectRoot` in increasing precedence. Later files win.
 * Safe to call more than once; only the first call reads the disk.
 */
export function loadEnvFiles(projectRoot: string = process.cwd()): void {
  if (envLoaded) return;
  envLoaded = true;

  // Silence noisy dotenv tips when loading multiple files.
  if (!process.env.DOTENV_CONFIG_QUIET) {
    process.env.DOTENV_CONFIG_QUIET = 'true';
  }

  const appEnv = getAppEnv();
  const envFiles = ['.env', `.env.${appEnv}`, '.env.local', `.env.${appEnv}.local`];

  envFiles.forEach((file) => {
    const fullPath = path.resolve(projectRoot, file);
    if (existsSync(fullPath)) {
      loadEnv({ path: fullPath, override: true });
    }
  });
}

export function getEnvVar(key: string): string | undefined {
  const raw = process.env[key];
  if (raw == null) return undefined;
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function isDevEnvironment(): boolean {
  const env = getAppEnv();
  return env === 'development' || env === 'test';
}

export function getDataDir(): string | undefined {
  return getEnvVar('ROUTINES_DATA_DIR');
}

export function getAppVersion(): string {
  return getEnvVar('ROUTINES_APP_VERSION') ?? DEFAULT_APP_VERSION;
}

export function getHapticsEnabledDefault(): boolean {
  return getEnvVar('ROUTINES_HAPTICS_ENABLED') !== 'false';
}
