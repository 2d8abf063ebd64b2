/**
 * Express I18n
 *
 * Wires the catalog loader, the locale middleware and the locale API into
 * an Express application.
 *
 * @example
 * const i18n = new ExpressI18n({
 *   localeDir: './locales',
 *   supportedLocales: ['en', 'fr'],
 *   defaultLocale: 'en',
 * });
 * i18n.initApp(app);
 *
 * @module i18n/expressI18n
 */

import { Express, RequestHandler, Router } from 'express';
import cookieParser from 'cookie-parser';
import { createLocaleRouter } from '../api/locale';
import { ConfigurationError } from '../errors/ApiError';
import { i18nMiddleware } from '../middleware/i18n';
import { createLogger } from '../utils/logger';
import { CatalogLoader } from './catalogLoader';
import { I18nOptionsSchema } from './types';
import type { I18nOptions, LocaleId, ResolvedI18nOptions } from './types';

const log = createLogger('I18N');

export class ExpressI18n {
  readonly catalogs: CatalogLoader;
  readonly router: Router;
  readonly supportedLocales: readonly LocaleId[];
  readonly defaultLocale: LocaleId;

  /**
   * @throws ConfigurationError when defaultLocale is not supported or the list is empty
   */
  constructor(options: I18nOptions) {
    const result = I18nOptionsSchema.safeParse(options);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigurationError('Invalid i18n options', issues);
    }

    const resolved: ResolvedI18nOptions = result.data;
    this.supportedLocales = Object.freeze([...new Set(resolved.supportedLocales)]);
    this.defaultLocale = resolved.defaultLocale;
    this.catalogs = new CatalogLoader({ localeDir: resolved.localeDir, domain: resolved.domain });
    this.router = createLocaleRouter({
      catalogs: this.catalogs,
      supportedLocales: this.supportedLocales,
    });
  }

  middleware(): RequestHandler {
    return i18nMiddleware({
      catalogs: this.catalogs,
      supportedLocales: this.supportedLocales,
      defaultLocale: this.defaultLocale,
    });
  }

  /**
   * Install cookie parsing, the locale middleware and the locale routes.
   * Call before registering any route that needs a bound locale.
   */
  initApp(app: Express): void {
    app.use(cookieParser());
    app.use(this.middleware());
    app.use(this.router);

    log.info('I18n initialized', {
      defaultLocale: this.defaultLocale,
      supportedLocales: this.supportedLocales,
      localeDir: this.catalogs.localeDir,
    });
  }
}
