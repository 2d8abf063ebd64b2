/**
 * Locale Resolution
 *
 * Decides which locale applies to a request from the client's cookie value.
 *
 * @module i18n/localeResolver
 */

import type { LocaleId } from './types';

/**
 * Check if a value is one of the supported locales
 */
export function isSupportedLocale(value: unknown, supported: ReadonlySet<string>): value is LocaleId {
  return typeof value === 'string' && supported.has(value);
}

/**
 * Resolve the effective locale for a request
 *
 * The result is always a member of `supported` as long as `defaultLocale` is.
 *
 * @example
 * resolveLocale('fr', new Set(['en', 'fr']), 'en') // 'fr'
 * resolveLocale('xx', new Set(['en', 'fr']), 'en') // 'en'
 * resolveLocale(undefined, new Set(['en', 'fr']), 'en') // 'en'
 */
export function resolveLocale(
  cookieLocale: string | undefined,
  supported: ReadonlySet<string>,
  defaultLocale: LocaleId
): LocaleId {
  if (cookieLocale === undefined) {
    return defaultLocale;
  }
  return isSupportedLocale(cookieLocale, supported) ? cookieLocale : defaultLocale;
}
