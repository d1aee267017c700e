import { existsSync, readFileSync } from 'node:fs';
import { load } from 'js-yaml';
import { MenuConfigSchema, type MenuConfig } from '../shared/schemas.js';

export const DEFAULT_CONFIG_PATH = '/etc/sudo-menu.yaml';
export const CONFIG_ENV_VAR = 'SUDO_MENU_CONFIG';

/**
 * Pick the config file to read: explicit flag, then environment, then the
 * system default when present. `null` means built-in defaults only.
 */
export function resolveConfigPath(
  explicit?: string,
  env: NodeJS.ProcessEnv = process.env,
): string | null {
  if (explicit) return explicit;
  const fromEnv = env[CONFIG_ENV_VAR];
  if (fromEnv) return fromEnv;
  return existsSync(DEFAULT_CONFIG_PATH) ? DEFAULT_CONFIG_PATH : null;
}

export function parseMenuConfig(raw: unknown, source = 'config'): MenuConfig {
  const result = MenuConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid ${source}: ${details}`);
  }
  return result.data;
}

export function readMenuConfig(configPath: string | null): MenuConfig {
  if (configPath === null) return parseMenuConfig({});
  if (!existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }
  const raw = readFileSync(configPath, 'utf8');
  return parseMenuConfig(load(raw), configPath);
}
