/**
 * Template Renderer
 *
 * Handlebars rendering with the locale and translator passed on every
 * render call. Templates use `{{_ "Message id"}}` and `{{locale}}`.
 *
 * The `_` helper is supplied per call rather than registered on the
 * Handlebars environment, so concurrent renders for different locales
 * cannot see each other's translator.
 *
 * @module views/renderer
 */

import { readFile } from 'fs/promises';
import path from 'path';
import Handlebars from 'handlebars';
import { NotFoundError } from '../errors/ApiError';
import { identityTranslate } from '../i18n/catalogLoader';
import type { I18nContextData, LocaleId, TranslateFunction } from '../i18n/types';
import { isErrnoException } from '../utils/errors';

type CompiledTemplate = ReturnType<typeof Handlebars.compile>;

export interface TemplateRendererOptions {
  viewsDir: string;
  /** Template file extension (default: .hbs) */
  extension?: string;
  /** Keep compiled templates in memory (default: true) */
  cache?: boolean;
}

/**
 * Express view engine callback signature
 */
export type ViewEngine = (
  filePath: string,
  options: object,
  callback: (error: unknown, rendered?: string) => void
) => void;

// Express-internal render options that are not template data
const RESERVED_LOCALS = new Set(['settings', '_locals', 'cache', '_']);

function isTranslateFunction(value: unknown): value is TranslateFunction {
  return typeof value === 'function';
}

export class TemplateRenderer {
  readonly viewsDir: string;
  readonly extension: string;

  private readonly handlebars = Handlebars.create();
  private readonly templates = new Map<string, CompiledTemplate>();
  private readonly cache: boolean;

  constructor(options: TemplateRendererOptions) {
    this.viewsDir = path.resolve(options.viewsDir);
    this.extension = options.extension ?? '.hbs';
    this.cache = options.cache ?? true;
  }

  /**
   * Absolute path of a named view, confined to viewsDir
   */
  resolveView(view: string): string {
    const fileName = view.endsWith(this.extension) ? view : `${view}${this.extension}`;
    const file = path.resolve(this.viewsDir, fileName);
    if (!file.startsWith(this.viewsDir + path.sep)) {
      throw new NotFoundError(`View not found: ${view}`);
    }
    return file;
  }

  async render(view: string, bindings: I18nContextData, data: Record<string, unknown> = {}): Promise<string> {
    return this.renderFile(this.resolveView(view), bindings, data);
  }

  async renderFile(
    filePath: string,
    bindings: I18nContextData,
    data: Record<string, unknown> = {}
  ): Promise<string> {
    const template = await this.compile(filePath);
    const { locale, translate } = bindings;

    return template(
      { ...data, locale },
      {
        helpers: {
          _: (msgid: unknown) => (typeof msgid === 'string' ? translate(msgid) : ''),
        },
      }
    );
  }

  private async compile(filePath: string): Promise<CompiledTemplate> {
    const cached = this.templates.get(filePath);
    if (cached) {
      return cached;
    }

    let source: string;
    try {
      source = await readFile(filePath, 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new NotFoundError(`View not found: ${path.basename(filePath)}`);
      }
      throw error;
    }

    const template = this.handlebars.compile(source);
    if (this.cache) {
      this.templates.set(filePath, template);
    }
    return template;
  }
}

/**
 * Express view engine backed by a TemplateRenderer
 *
 * Reads `_` and `locale` from the render options, which Express builds from
 * `res.locals` for each render, and hands them to the renderer explicitly.
 * Renders outside a bound request use identity translation and `fallbackLocale`.
 */
export function createViewEngine(renderer: TemplateRenderer, fallbackLocale: LocaleId): ViewEngine {
  return (filePath, options, callback) => {
    const locals = new Map<string, unknown>(Object.entries(options));
    const translate = locals.get('_');
    const locale = locals.get('locale');

    const bindings: I18nContextData = {
      locale: typeof locale === 'string' ? locale : fallbackLocale,
      translate: isTranslateFunction(translate) ? translate : identityTranslate,
    };
    const data = Object.fromEntries([...locals].filter(([key]) => !RESERVED_LOCALS.has(key)));

    renderer.renderFile(filePath, bindings, data).then(
      (html) => callback(null, html),
      (error: unknown) => callback(error)
    );
  };
}
