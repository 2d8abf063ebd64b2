/**
 * I18n Request Context
 *
 * AsyncLocalStorage scope holding the locale and translator bound for the
 * current request. Each request gets its own store, so concurrent requests
 * never observe each other's locale.
 *
 * @module i18n/i18nContext
 */

import { AsyncLocalStorage } from 'async_hooks';
import type { I18nContextData, LocaleId } from './types';

const asyncLocalStorage = new AsyncLocalStorage<I18nContextData>();

export const i18nContext = {
  /**
   * Run a function with the given locale binding
   */
  run<T>(context: I18nContextData, fn: () => T): T {
    return asyncLocalStorage.run(context, fn);
  },

  /**
   * Current binding, undefined outside a bound request
   */
  get(): I18nContextData | undefined {
    return asyncLocalStorage.getStore();
  },

  getLocale(): LocaleId | undefined {
    return asyncLocalStorage.getStore()?.locale;
  },

  /**
   * Translate with the current request's catalog (identity when unbound)
   */
  translate(msgid: string): string {
    const store = asyncLocalStorage.getStore();
    return store ? store.translate(msgid) : msgid;
  },
};

export default i18nContext;
