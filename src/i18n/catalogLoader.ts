/**
 * Catalog Loader
 *
 * Loads per-locale translation catalogs from `<localeDir>/<locale>/<domain>.json`
 * and turns them into i18next-backed translate functions.
 *
 * Two policies live here:
 * - loadCatalog() surfaces every failure as a typed error. Used by callers
 *   that asked for catalog data explicitly.
 * - load() never fails. A missing catalog becomes identity translation;
 *   any other failure is logged and also becomes identity translation.
 *
 * Translators are cached for the process lifetime since catalogs are static.
 * Failures other than "not found" are not cached, so a repaired file is
 * picked up by the next request.
 *
 * @module i18n/catalogLoader
 */

import { readFile } from 'fs/promises';
import path from 'path';
import i18next from 'i18next';
import { z } from 'zod';
import { createLogger, createTimer, extractError } from '../utils/logger';
import { getErrorMessage, isAbortError, isErrnoException } from '../utils/errors';
import { CatalogFormatError, CatalogLoadError, CatalogNotFoundError } from '../errors/ApiError';
import { DEFAULT_CATALOG_DOMAIN } from './types';
import type { Catalog, LocaleId, TranslateFunction } from './types';

const log = createLogger('CATALOG');

const CatalogFileSchema = z.record(z.string(), z.unknown());

export interface CatalogLoaderOptions {
  /** Root directory holding one sub-directory per locale */
  localeDir: string;
  /** Catalog file name without extension (default: messages) */
  domain?: string;
}

export interface LoadCatalogOptions {
  /** Aborts the file read, e.g. when the client disconnects */
  signal?: AbortSignal;
}

export const identityTranslate: TranslateFunction = (msgid) => msgid;

/**
 * Parse catalog JSON, keeping only string translations
 */
function parseCatalog(locale: LocaleId, raw: string): Catalog {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new CatalogFormatError(locale, getErrorMessage(error));
  }

  // Entries come from the parsed JSON itself: zod rebuilds records by
  // assignment, which would drop a "__proto__" message-id
  const result = CatalogFileSchema.safeParse(parsed);
  if (!result.success || typeof parsed !== 'object' || parsed === null) {
    throw new CatalogFormatError(locale, 'expected a JSON object mapping message-ids to translations');
  }

  const entries = Object.entries(parsed).filter(
    (entry): entry is [string, string] => typeof entry[1] === 'string'
  );
  return Object.freeze(Object.fromEntries(entries));
}

export class CatalogLoader {
  readonly localeDir: string;
  readonly domain: string;

  private readonly translators = new Map<LocaleId, Promise<TranslateFunction>>();

  constructor(options: CatalogLoaderOptions) {
    this.localeDir = path.resolve(options.localeDir);
    this.domain = options.domain ?? DEFAULT_CATALOG_DOMAIN;
  }

  /**
   * Location of the catalog file for a locale
   */
  catalogPath(locale: LocaleId): string {
    return path.join(this.localeDir, locale, `${this.domain}.json`);
  }

  /**
   * Read and parse the catalog for a locale. Not cached.
   *
   * @throws CatalogNotFoundError when no catalog file exists for the locale
   * @throws CatalogFormatError when the file is not a JSON object
   * @throws CatalogLoadError on any other read failure
   */
  async loadCatalog(locale: LocaleId, options: LoadCatalogOptions = {}): Promise<Catalog> {
    const file = this.catalogPath(locale);

    // A locale is a single directory name, never a path
    if (locale === '' || locale === '.' || locale === '..' || path.basename(locale) !== locale) {
      throw new CatalogNotFoundError(locale, file);
    }

    let raw: string;
    try {
      raw = await readFile(file, { encoding: 'utf8', signal: options.signal });
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
        throw new CatalogNotFoundError(locale, file);
      }
      throw new CatalogLoadError(locale, getErrorMessage(error));
    }

    return parseCatalog(locale, raw);
  }

  /**
   * Get the translate function for a locale. Never rejects.
   */
  load(locale: LocaleId): Promise<TranslateFunction> {
    const cached = this.translators.get(locale);
    if (cached) {
      return cached;
    }

    log.debug('Catalog cache miss', { locale });

    const pending: Promise<TranslateFunction> = this.createTranslator(locale).catch((error: unknown) => {
      if (error instanceof CatalogNotFoundError) {
        log.debug('No catalog for locale, using identity translation', { locale, path: this.catalogPath(locale) });
        return identityTranslate;
      }

      if (this.translators.get(locale) === pending) {
        this.translators.delete(locale);
      }
      log.warn('Catalog failed to load, using identity translation', { locale, ...extractError(error) });
      return identityTranslate;
    });

    this.translators.set(locale, pending);
    return pending;
  }

  /**
   * Warm the cache. Returns the locales that fell back to identity translation.
   */
  async preload(locales: readonly LocaleId[]): Promise<LocaleId[]> {
    const results = await Promise.all(
      locales.map(async (locale) => ({ locale, translate: await this.load(locale) }))
    );
    return results.filter((result) => result.translate === identityTranslate).map((result) => result.locale);
  }

  isCached(locale: LocaleId): boolean {
    return this.translators.has(locale);
  }

  clear(): void {
    this.translators.clear();
  }

  private async createTranslator(locale: LocaleId): Promise<TranslateFunction> {
    const timer = createTimer();
    const catalog = await this.loadCatalog(locale);

    const instance = i18next.createInstance();
    await instance.init({
      lng: locale,
      fallbackLng: false,
      load: 'currentOnly',
      ns: [this.domain],
      defaultNS: this.domain,
      resources: {},
      // Message-ids are literal strings such as "Hello, world." or "Error: {0}"
      keySeparator: false,
      nsSeparator: false,
      interpolation: {
        escapeValue: false,
      },
      returnNull: false,
      returnEmptyString: false,
    });

    // i18next looks bundles up under its canonical code ("pt-br" -> "pt-BR")
    const code = instance.languages[0] ?? locale;
    instance.addResourceBundle(code, this.domain, catalog);
    const t = instance.getFixedT(code, this.domain);

    log.debug('Catalog loaded', {
      locale,
      entries: Object.keys(catalog).length,
      duration: timer.elapsedFormatted(),
    });

    return (msgid: string): string => {
      const result = t(msgid, { skipInterpolation: true });
      return typeof result === 'string' && result.length > 0 ? result : msgid;
    };
  }
}
