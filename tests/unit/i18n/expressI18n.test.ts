/**
 * ExpressI18n Tests
 */

import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import express from 'express';
import request from 'supertest';

vi.mock('../../../src/utils/logger', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../src/utils/logger')>()),
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

import { ExpressI18n } from '../../../src/i18n/expressI18n';
import { i18nContext } from '../../../src/i18n/i18nContext';
import { getRequestLocale } from '../../../src/middleware/i18n';
import { ConfigurationError } from '../../../src/errors/ApiError';
import { createLocaleDir, removeDir } from '../../helpers/catalogFixtures';

describe('ExpressI18n', () => {
  let localeDir: string;

  beforeAll(async () => {
    localeDir = await createLocaleDir({ fr: { Hello: 'Bonjour' } });
  });

  afterAll(async () => {
    await removeDir(localeDir);
  });

  describe('constructor', () => {
    it('should default the catalog domain', () => {
      const i18n = new ExpressI18n({ localeDir, supportedLocales: ['en'], defaultLocale: 'en' });

      expect(i18n.catalogs.domain).toBe('messages');
      expect(i18n.defaultLocale).toBe('en');
    });

    it('should deduplicate and freeze the supported locales', () => {
      const i18n = new ExpressI18n({ localeDir, supportedLocales: ['en', 'fr', 'en'], defaultLocale: 'fr' });

      expect(i18n.supportedLocales).toEqual(['en', 'fr']);
      expect(Object.isFrozen(i18n.supportedLocales)).toBe(true);
    });

    it('should reject a default locale outside the supported list', () => {
      expect(() => new ExpressI18n({ localeDir, supportedLocales: ['en', 'fr'], defaultLocale: 'de' })).toThrow(
        ConfigurationError
      );
    });

    it('should list the invalid options', () => {
      try {
        new ExpressI18n({ localeDir, supportedLocales: ['en'], defaultLocale: 'de' });
        expect.fail('constructor should throw');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigurationError);
        if (error instanceof ConfigurationError) {
          expect(error.message).toBe('Invalid i18n options');
          expect(error.details).toEqual({
            issues: ['defaultLocale: defaultLocale must be one of supportedLocales'],
          });
        }
      }
    });

    it('should reject an empty locale list', () => {
      expect(() => new ExpressI18n({ localeDir, supportedLocales: [], defaultLocale: 'en' })).toThrow(
        'Invalid i18n options'
      );
    });
  });

  describe('initApp', () => {
    let app: express.Express;

    beforeAll(() => {
      const i18n = new ExpressI18n({ localeDir, supportedLocales: ['en', 'fr'], defaultLocale: 'en' });
      app = express();
      i18n.initApp(app);
      app.get('/hello', (req, res) => {
        res.json({ locale: getRequestLocale(req), text: i18nContext.translate('Hello') });
      });
    });

    it('should bind the cookie locale for routes registered afterwards', async () => {
      const response = await request(app).get('/hello').set('Cookie', 'locale=fr');

      expect(response.body).toEqual({ locale: 'fr', text: 'Bonjour' });
    });

    it('should bind the default locale without a cookie', async () => {
      const response = await request(app).get('/hello');

      expect(response.body).toEqual({ locale: 'en', text: 'Hello' });
    });

    it('should mount the locale API', async () => {
      const response = await request(app).get('/api/translations/fr');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ Hello: 'Bonjour' });
    });
  });
});
