/**
 * Request-scoped internationalization for Express
 *
 * @module express-request-i18n
 */

export { ExpressI18n } from './i18n/expressI18n';
export { CatalogLoader, identityTranslate } from './i18n/catalogLoader';
export type { CatalogLoaderOptions, LoadCatalogOptions } from './i18n/catalogLoader';
export { resolveLocale, isSupportedLocale } from './i18n/localeResolver';
export { i18nContext } from './i18n/i18nContext';
export {
  i18nMiddleware,
  getRequestI18n,
  getRequestLocale,
  getRequestTranslator,
} from './middleware/i18n';
export type { I18nMiddlewareOptions, TranslatorSource } from './middleware/i18n';
export { createLocaleRouter } from './api/locale';
export type { CatalogSource, LocaleRouterOptions } from './api/locale';
export { TemplateRenderer, createViewEngine } from './views/renderer';
export type { TemplateRendererOptions, ViewEngine } from './views/renderer';
export { createApp } from './app';
export type { Application } from './app';
export { loadConfig, getConfig } from './config';
export {
  ApiError,
  ErrorCodes,
  NotFoundError,
  InternalError,
  ConfigurationError,
  CatalogNotFoundError,
  CatalogFormatError,
  CatalogLoadError,
  errorHandler,
  notFoundHandler,
  asyncHandler,
} from './errors';
export type { ApiErrorResponse, ErrorCode } from './errors';
export type { AppConfig, I18nConfig } from './config';

export type {
  Catalog,
  I18nContextData,
  I18nOptions,
  LocaleId,
  TranslateFunction,
} from './i18n/types';

export {
  DEFAULT_CATALOG_DOMAIN,
  LOCALE_COOKIE,
  LOCALE_COOKIE_MAX_AGE_SECONDS,
} from './i18n/types';
