/**
 * Runtime configuration.
 *
 * Values come from the process environment first, then from the nearest
 * `.env` file, merged over {@link DEFAULT_CONFIG}.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

import { isArticleMode } from './core/context';
import { DEFAULT_THEME, isThemeName, listThemes } from './core/themes';
import type { ArticleMode, ThemeName } from './core/types';

export interface AppConfig {
  appId: string;
  appSecret: string;
  theme: ThemeName;
  mode: ArticleMode;
  author?: string;
}

export const DEFAULT_CONFIG: Pick<AppConfig, 'theme' | 'mode'> = {
  theme: DEFAULT_THEME,
  mode: 'news',
};

/** How many parent directories are searched for a `.env` file. */
export const ENV_SEARCH_DEPTH = 5;

export interface LoadConfigOptions {
  /** Defaults to `process.env`. */
  env?: Readonly<Record<string, string | undefined>>;
  /** Directory the `.env` search starts from. Defaults to `process.cwd()`. */
  cwd?: string;
  /** Explicit `.env` path; disables the search. */
  envFile?: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// ---------------------------------------------------------------------------
// .env handling
// ---------------------------------------------------------------------------

/**
 * Parse `KEY=value` lines. Blank lines and `#` comments are ignored, an
 * optional `export ` prefix is dropped and matching surrounding quotes are
 * removed.
 */
export function parseEnvFile(content: string): Record<string, string> {
  const values: Record<string, string> = {};
  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;

    const eq = line.indexOf('=');
    if (eq <= 0) continue;

    const key = line.slice(0, eq).trim().replace(/^export\s+/, '');
    let value = line.slice(eq + 1).trim();
    const quote = value[0];
    if ((quote === '"' || quote === "'") && value.length >= 2 && value.endsWith(quote)) {
      value = value.slice(1, -1);
    } else {
      value = value.replace(/\s+#.*$/, '');
    }
    values[key] = value;
  }
  return values;
}

/** Nearest `.env` at or above `startDir`, or `undefined`. */
export function findEnvFile(startDir: string, depth = ENV_SEARCH_DEPTH): string | undefined {
  let dir = path.resolve(startDir);
  for (let i = 0; i <= depth; i++) {
    const candidate = path.join(dir, '.env');
    if (fs.existsSync(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// loadConfig
// ---------------------------------------------------------------------------

/**
 * Resolve the configuration.
 *
 * @throws {ConfigError} when credentials are missing or the theme or mode
 * is unknown.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const envFile = options.envFile ?? findEnvFile(options.cwd ?? process.cwd());
  const fileValues = envFile ? parseEnvFile(fs.readFileSync(envFile, 'utf8')) : {};

  const read = (key: string): string | undefined => {
    const value = env[key] ?? fileValues[key];
    return value && value.trim() ? value.trim() : undefined;
  };

  const appId = read('WECHAT_APPID');
  const appSecret = read('WECHAT_APP_SECRET');
  const missing = [appId ? null : 'WECHAT_APPID', appSecret ? null : 'WECHAT_APP_SECRET'].filter(
    (key): key is string => key !== null,
  );
  if (!appId || !appSecret) {
    throw new ConfigError(`Missing ${missing.join(' and ')} (environment or .env file)`);
  }

  const theme = read('WECHAT_THEME') ?? DEFAULT_CONFIG.theme;
  if (!isThemeName(theme)) {
    throw new ConfigError(`Unknown theme "${theme}" in WECHAT_THEME. Available themes: ${listThemes().join(', ')}`);
  }

  const mode = read('WECHAT_MODE') ?? DEFAULT_CONFIG.mode;
  if (!isArticleMode(mode)) {
    throw new ConfigError(`Unknown article mode "${mode}" in WECHAT_MODE. Expected "news" or "newspic"`);
  }

  const config: AppConfig = { appId, appSecret, theme, mode };
  const author = read('WECHAT_AUTHOR');
  if (author) config.author = author;
  return config;
}
