/**
 * Internationalization Types
 *
 * @module i18n/types
 */

import { z } from 'zod';

/**
 * A locale identifier such as "en" or "fr", drawn from the configured set
 */
export type LocaleId = string;

/**
 * Translate a message-id. Unknown ids come back unchanged.
 */
export type TranslateFunction = (msgid: string) => string;

/**
 * Immutable message-id to translation mapping for one locale
 */
export type Catalog = Readonly<Record<string, string>>;

/**
 * Per-request i18n state, one instance per request
 */
export interface I18nContextData {
  readonly locale: LocaleId;
  readonly translate: TranslateFunction;
}

/**
 * Name of the cookie carrying the client's locale preference
 */
export const LOCALE_COOKIE = 'locale';

/**
 * Lifetime of the locale cookie: 30 days
 */
export const LOCALE_COOKIE_MAX_AGE_SECONDS = 30 * 24 * 3600;

/**
 * Catalog file name (without extension) inside each locale directory
 */
export const DEFAULT_CATALOG_DOMAIN = 'messages';

export const I18nOptionsSchema = z
  .object({
    localeDir: z.string().min(1, 'localeDir is required'),
    supportedLocales: z.array(z.string().min(1)).min(1, 'at least one supported locale is required'),
    defaultLocale: z.string().min(1),
    domain: z.string().min(1).default(DEFAULT_CATALOG_DOMAIN),
  })
  .refine((options) => options.supportedLocales.includes(options.defaultLocale), {
    message: 'defaultLocale must be one of supportedLocales',
    path: ['defaultLocale'],
  });

/**
 * Options accepted by ExpressI18n
 */
export type I18nOptions = z.input<typeof I18nOptionsSchema>;

/**
 * Options after validation and defaulting
 */
export type ResolvedI18nOptions = z.output<typeof I18nOptionsSchema>;
