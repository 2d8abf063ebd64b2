/**
 * Application Factory
 *
 * Assembles the Express application: security headers, request logging,
 * locale binding, the locale API, the Handlebars view engine and error
 * handling.
 */

import express, { Express, Request, Response } from 'express';
import helmet from 'helmet';
import type { AppConfig } from './config';
import { errorHandler, notFoundHandler } from './errors';
import { ExpressI18n } from './i18n/expressI18n';
import { requestLogger } from './middleware/requestLogger';
import { TemplateRenderer, createViewEngine } from './views/renderer';

export interface Application {
  app: Express;
  i18n: ExpressI18n;
  renderer: TemplateRenderer;
}

export function createApp(config: Readonly<AppConfig>): Application {
  const app = express();

  app.disable('x-powered-by');
  app.use(helmet());
  app.use(requestLogger);

  // Liveness probe, answered before locale binding
  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  const i18n = new ExpressI18n({
    localeDir: config.i18n.localeDir,
    supportedLocales: config.i18n.supportedLocales,
    defaultLocale: config.i18n.defaultLocale,
    domain: config.i18n.domain,
  });
  i18n.initApp(app);

  const renderer = new TemplateRenderer({
    viewsDir: config.views.dir,
    cache: config.server.nodeEnv === 'production',
  });
  app.engine('hbs', createViewEngine(renderer, i18n.defaultLocale));
  app.set('view engine', 'hbs');
  app.set('views', renderer.viewsDir);

  app.get('/', (_req: Request, res: Response) => {
    res.render('index', { locales: i18n.supportedLocales });
  });

  app.use(notFoundHandler);
  app.use(errorHandler);

  return { app, i18n, renderer };
}
