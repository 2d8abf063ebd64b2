/**
 * Configuration Validation Schema
 *
 * Zod schema for runtime validation of application configuration.
 */

import { z } from 'zod';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
export const NodeEnvSchema = z.enum(['development', 'production', 'test']);

export const ServerConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  port: z.number().int().min(1).max(65535),
});

export const I18nConfigSchema = z
  .object({
    localeDir: z.string().min(1),
    supportedLocales: z.array(z.string().min(1)).min(1, 'SUPPORTED_LOCALES must name at least one locale'),
    defaultLocale: z.string().min(1),
    domain: z.string().min(1),
  })
  .refine((i18n) => i18n.supportedLocales.includes(i18n.defaultLocale), {
    message: 'DEFAULT_LOCALE must be one of SUPPORTED_LOCALES',
    path: ['defaultLocale'],
  });

export const ViewsConfigSchema = z.object({
  dir: z.string().min(1),
});

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema,
});

export const AppConfigSchema = z.object({
  server: ServerConfigSchema,
  i18n: I18nConfigSchema,
  views: ViewsConfigSchema,
  logging: LoggingConfigSchema,
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type I18nConfig = z.infer<typeof I18nConfigSchema>;
