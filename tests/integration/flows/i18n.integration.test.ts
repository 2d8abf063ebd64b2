/**
 * I18n Flow Integration Tests
 *
 * Full request flow through the assembled application:
 * cookie → locale binding → handlers and templates, including overlapping
 * requests for different locales.
 */

import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import { writeFile } from 'fs/promises';
import path from 'path';
import express, { Express } from 'express';
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

import { createApp } from '../../../src/app';
import { loadConfig } from '../../../src/config';
import { asyncHandler } from '../../../src/errors/errorHandler';
import { ExpressI18n } from '../../../src/i18n/expressI18n';
import { i18nContext } from '../../../src/i18n/i18nContext';
import { getRequestI18n } from '../../../src/middleware/i18n';
import { sleep } from '../../../src/utils/async';
import { TemplateRenderer, createViewEngine } from '../../../src/views/renderer';
import { createLocaleDir, removeDir } from '../../helpers/catalogFixtures';

const REPO_ROOT = path.resolve(__dirname, '../../..');

function delayOf(value: unknown): number {
  return typeof value === 'string' ? Number(value) : 0;
}

describe('I18n request flow', () => {
  describe('overlapping requests', () => {
    let dir: string;
    let app: Express;

    beforeAll(async () => {
      dir = await createLocaleDir({
        fr: { Hello: 'Bonjour' },
        es: { Hello: 'Hola' },
      });
      await writeFile(path.join(dir, 'page.hbs'), '{{locale}}:{{_ "Hello"}}:{{who}}');

      const i18n = new ExpressI18n({ localeDir: dir, supportedLocales: ['en', 'fr', 'es'], defaultLocale: 'en' });
      const renderer = new TemplateRenderer({ viewsDir: dir });

      app = express();
      i18n.initApp(app);
      app.engine('hbs', createViewEngine(renderer, i18n.defaultLocale));
      app.set('view engine', 'hbs');
      app.set('views', dir);

      app.get(
        '/context',
        asyncHandler(async (req, res) => {
          await sleep(delayOf(req.query.delay));
          const bound = getRequestI18n(req);
          res.json({
            locale: bound.locale,
            text: bound.translate('Hello'),
            ambientLocale: i18nContext.getLocale(),
            ambientText: i18nContext.translate('Hello'),
          });
        })
      );

      app.get(
        '/page',
        asyncHandler(async (req, res) => {
          await sleep(delayOf(req.query.delay));
          res.render('page', { who: req.query.who });
        })
      );
    });

    afterAll(async () => {
      await removeDir(dir);
    });

    it('should keep each request bound to its own locale', async () => {
      const [slow, fast] = await Promise.all([
        request(app).get('/context?delay=40').set('Cookie', 'locale=fr'),
        request(app).get('/context?delay=0').set('Cookie', 'locale=es'),
      ]);

      expect(slow.body).toEqual({ locale: 'fr', text: 'Bonjour', ambientLocale: 'fr', ambientText: 'Bonjour' });
      expect(fast.body).toEqual({ locale: 'es', text: 'Hola', ambientLocale: 'es', ambientText: 'Hola' });
    });

    it('should render each page with its own translator', async () => {
      const [slow, fast, plain] = await Promise.all([
        request(app).get('/page?delay=40&who=a').set('Cookie', 'locale=fr'),
        request(app).get('/page?delay=0&who=b').set('Cookie', 'locale=es'),
        request(app).get('/page?delay=20&who=c'),
      ]);

      expect(slow.text).toBe('fr:Bonjour:a');
      expect(fast.text).toBe('es:Hola:b');
      expect(plain.text).toBe('en:Hello:c');
    });

    it('should fall back to the default locale for an unsupported cookie', async () => {
      const response = await request(app).get('/page?who=d').set('Cookie', 'locale=de');

      expect(response.text).toBe('en:Hello:d');
    });

    it('should apply a locale chosen through the API on the next request', async () => {
      const agent = request.agent(app);

      const choice = await agent.get('/api/set-language/es');
      expect(choice.body).toEqual({ status: 'success', locale: 'es' });

      const page = await agent.get('/page?who=e');
      expect(page.text).toBe('es:Hola:e');
    });
  });

  describe('application', () => {
    let app: Express;

    beforeAll(() => {
      const config = loadConfig({
        NODE_ENV: 'test',
        LOCALE_DIR: path.join(REPO_ROOT, 'locales'),
        VIEWS_DIR: path.join(REPO_ROOT, 'views'),
        SUPPORTED_LOCALES: 'en,fr,es',
      });
      app = createApp(config).app;
    });

    it('should render the home page in the cookie locale', async () => {
      const response = await request(app).get('/').set('Cookie', 'locale=fr');

      expect(response.status).toBe(200);
      expect(response.text).toContain('<html lang="fr">');
      expect(response.text).toContain('<title>Bienvenue</title>');
      expect(response.text).toContain('<p>Choisissez votre langue</p>');
      expect(response.text).toContain('<li><a href="/api/set-language/es">es</a></li>');
    });

    it('should render the home page in the default locale', async () => {
      const response = await request(app).get('/');

      expect(response.text).toContain('<html lang="en">');
      expect(response.text).toContain('<title>Welcome</title>');
    });

    it('should serve translations for client-side use', async () => {
      const response = await request(app).get('/api/translations/es');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        Welcome: 'Bienvenido',
        'Choose your language': 'Elige tu idioma',
        Hello: 'Hola',
      });
    });

    it('should answer the health check', async () => {
      const response = await request(app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('ok');
    });

    it('should answer unknown routes with a JSON 404', async () => {
      const response = await request(app).get('/nope');

      expect(response.status).toBe(404);
      expect(response.body.code).toBe('NOT_FOUND');
    });
  });
});
