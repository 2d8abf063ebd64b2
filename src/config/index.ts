/**
 * Server Configuration
 *
 * Loads environment variables (optionally from `.env`) and validates them.
 *
 * ## Environment Variables
 *
 * - `NODE_ENV` - development | production | test (default: development)
 * - `PORT` - Port to listen on (default: 3000)
 * - `LOG_LEVEL` - debug | info | warn | error (default: info)
 * - `LOCALE_DIR` - Catalog root, one sub-directory per locale (default: ./locales)
 * - `SUPPORTED_LOCALES` - Comma-separated locale list (default: en)
 * - `DEFAULT_LOCALE` - Must be in SUPPORTED_LOCALES (default: first supported locale)
 * - `CATALOG_DOMAIN` - Catalog file name inside each locale directory (default: messages)
 * - `VIEWS_DIR` - Handlebars templates (default: ./views)
 */

import dotenv from 'dotenv';
import path from 'path';
import { ConfigurationError } from '../errors/ApiError';
import { AppConfigSchema } from './schema';
import type { AppConfig } from './schema';

export type { AppConfig, I18nConfig } from './schema';

type Env = Record<string, string | undefined>;

/**
 * Parse a comma-separated list, dropping blanks and duplicates
 */
export function parseList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  const items = value.split(',').map((item) => item.trim()).filter((item) => item.length > 0);
  return [...new Set(items)];
}

/**
 * Build and validate the configuration from an environment
 *
 * @throws ConfigurationError listing every invalid setting
 */
export function loadConfig(env: Env = process.env): Readonly<AppConfig> {
  const supportedLocales = env.SUPPORTED_LOCALES === undefined ? ['en'] : parseList(env.SUPPORTED_LOCALES);

  const candidate = {
    server: {
      nodeEnv: env.NODE_ENV || 'development',
      port: parseInt(env.PORT || '3000', 10),
    },
    i18n: {
      localeDir: path.resolve(env.LOCALE_DIR || './locales'),
      supportedLocales,
      defaultLocale: env.DEFAULT_LOCALE?.trim() || supportedLocales[0] || '',
      domain: env.CATALOG_DOMAIN || 'messages',
    },
    views: {
      dir: path.resolve(env.VIEWS_DIR || './views'),
    },
    logging: {
      level: (env.LOG_LEVEL || 'info').toLowerCase(),
    },
  };

  const result = AppConfigSchema.safeParse(candidate);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError('Invalid configuration', issues);
  }

  const config = result.data;
  Object.freeze(config.server);
  Object.freeze(config.i18n.supportedLocales);
  Object.freeze(config.i18n);
  Object.freeze(config.views);
  Object.freeze(config.logging);
  return Object.freeze(config);
}

let cached: Readonly<AppConfig> | undefined;

/**
 * Process configuration, read from `.env` and the environment on first use
 */
export function getConfig(): Readonly<AppConfig> {
  if (!cached) {
    dotenv.config();
    cached = loadConfig(process.env);
  }
  return cached;
}
