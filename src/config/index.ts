import path from 'node:path';
import { fileURLToPath } from 'node:url';

const MODULE_DIR = path.dirname(fileURLToPath(import.meta.url));

// src/config and dist/config both sit two levels below the package root.
export const PACKAGE_ROOT = path.resolve(MODULE_DIR, '..', '..');
export const DEFAULT_CONFIG_FILE = path.join(PACKAGE_ROOT, 'config', 'config.json');

export const CONFIG_ENV_VAR = 'JAVA_SWITCHER_CONFIG';

export const HOME_VARIABLE = 'JAVA_HOME';
export const PATH_VARIABLE = 'Path';
export const SWITCH_LOG_FILE = 'java-switcher.log';

export function resolveConfigPath(explicit?: string, env: NodeJS.ProcessEnv = process.env): string {
  if (explicit && explicit.trim()) {
    return path.resolve(explicit.trim());
  }
  const fromEnv = env[CONFIG_ENV_VAR];
  if (fromEnv && fromEnv.trim()) {
    return path.resolve(fromEnv.trim());
  }
  return DEFAULT_CONFIG_FILE;
}
