/**
 * Locale API Routes
 *
 * GET /api/set-language/:locale  - store the locale preference in a cookie
 * GET /api/translations/:locale  - catalog as a flat JSON map for client-side use
 *
 * Unlike the request middleware, the translations endpoint reports catalog
 * failures to the caller instead of substituting identity translation.
 */

import { Router, Request, Response } from 'express';
import { isSupportedLocale } from '../i18n/localeResolver';
import { LOCALE_COOKIE, LOCALE_COOKIE_MAX_AGE_SECONDS } from '../i18n/types';
import type { Catalog, LocaleId } from '../i18n/types';
import type { LoadCatalogOptions } from '../i18n/catalogLoader';
import { responseAbortSignal } from '../utils/async';
import { getErrorMessage, isAbortError } from '../utils/errors';
import { createLogger, extractError } from '../utils/logger';

const log = createLogger('LOCALE_API');

/**
 * Source of raw catalog data. Failures must be thrown, not hidden.
 */
export interface CatalogSource {
  loadCatalog(locale: LocaleId, options?: LoadCatalogOptions): Promise<Catalog>;
}

export interface LocaleRouterOptions {
  catalogs: CatalogSource;
  supportedLocales: readonly LocaleId[];
}

export function createLocaleRouter(options: LocaleRouterOptions): Router {
  const router = Router();
  const supported: ReadonlySet<LocaleId> = new Set(options.supportedLocales);

  /**
   * GET /api/set-language/:locale
   */
  router.get('/api/set-language/:locale', (req: Request, res: Response) => {
    const { locale } = req.params;

    if (!isSupportedLocale(locale, supported)) {
      log.debug('Rejected unsupported locale', { requested: locale });
      res.status(400).json({ status: 'error', message: 'Unsupported locale' });
      return;
    }

    res.cookie(LOCALE_COOKIE, locale, {
      maxAge: LOCALE_COOKIE_MAX_AGE_SECONDS * 1000,
      path: '/',
      sameSite: 'lax',
    });
    res.json({ status: 'success', locale });
  });

  /**
   * GET /api/translations/:locale
   */
  router.get('/api/translations/:locale', async (req: Request, res: Response) => {
    const { locale } = req.params;

    if (!isSupportedLocale(locale, supported)) {
      res.status(404).json({ error: 'Unsupported locale' });
      return;
    }

    const signal = responseAbortSignal(res);

    try {
      const catalog = await options.catalogs.loadCatalog(locale, { signal });
      res.json(catalog);
    } catch (error) {
      if (isAbortError(error)) {
        log.debug('Translations request closed before the catalog was read', { requested: locale });
        return;
      }

      log.error('Failed to load translations', { requested: locale, ...extractError(error) });
      res.status(500).json({
        error: `Failed to load translations: ${getErrorMessage(error)}`,
      });
    }
  });

  return router;
}
