/**
 * Internationalization Middleware
 *
 * Binds a locale and translate function to every request before it reaches
 * a route handler:
 * 1. `locale` cookie, when it names a supported locale
 * 2. Default locale (fallback)
 *
 * Request-safe: the binding lives on the request object, in an
 * AsyncLocalStorage scope for the rest of the chain, and in `res.locals`
 * for the view engine. Nothing is written to app-wide state.
 *
 * @module middleware/i18n
 */

import { Request, RequestHandler } from 'express';
import { asyncHandler } from '../errors/errorHandler';
import { InternalError } from '../errors/ApiError';
import { i18nContext } from '../i18n/i18nContext';
import { resolveLocale } from '../i18n/localeResolver';
import { LOCALE_COOKIE } from '../i18n/types';
import type { I18nContextData, LocaleId, TranslateFunction } from '../i18n/types';
import { abortable, responseAbortSignal } from '../utils/async';
import { isAbortError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const log = createLogger('I18N');

declare global {
  namespace Express {
    interface Request {
      /** Set by i18nMiddleware */
      i18n?: I18nContextData;
    }
  }
}

/**
 * Anything that can produce a translator for a locale without failing
 */
export interface TranslatorSource {
  load(locale: LocaleId): Promise<TranslateFunction>;
}

export interface I18nMiddlewareOptions {
  catalogs: TranslatorSource;
  supportedLocales: readonly LocaleId[];
  defaultLocale: LocaleId;
}

/**
 * Locale cookie value, or undefined when unset or not a string
 */
function readLocaleCookie(req: Request): string | undefined {
  const cookies: unknown = req.cookies;
  if (typeof cookies !== 'object' || cookies === null || !(LOCALE_COOKIE in cookies)) {
    return undefined;
  }
  const value = cookies[LOCALE_COOKIE];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Middleware to resolve the request locale and bind its translator
 *
 * Downstream errors are not intercepted: they reach Express unchanged.
 */
export function i18nMiddleware(options: I18nMiddlewareOptions): RequestHandler {
  const supported: ReadonlySet<LocaleId> = new Set(options.supportedLocales);

  return asyncHandler(async (req, res, next) => {
    const signal = responseAbortSignal(res);
    const locale = resolveLocale(readLocaleCookie(req), supported, options.defaultLocale);

    let translate: TranslateFunction;
    try {
      translate = await abortable(options.catalogs.load(locale), signal);
    } catch (error) {
      if (isAbortError(error)) {
        log.debug('Request closed before locale was bound', { locale, path: req.path });
        return;
      }
      throw error;
    }

    const context: I18nContextData = Object.freeze({ locale, translate });
    req.i18n = context;

    // Per-response template namespace, read by the view engine at render time
    res.locals._ = translate;
    res.locals.locale = locale;

    i18nContext.run(context, () => next());
  });
}

/**
 * Get the i18n binding of a request
 *
 * @throws InternalError when i18nMiddleware has not run for this request
 */
export function getRequestI18n(req: Request): I18nContextData {
  if (!req.i18n) {
    throw new InternalError('i18n middleware has not been applied to this request');
  }
  return req.i18n;
}

/**
 * Get the locale from a request (for use in handlers and services)
 */
export function getRequestLocale(req: Request): LocaleId {
  return getRequestI18n(req).locale;
}

/**
 * Get the request-scoped translate function
 */
export function getRequestTranslator(req: Request): TranslateFunction {
  return getRequestI18n(req).translate;
}
