/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Service API
  NOTION_TOKEN: Type.Optional(Type.String({ minLength: 1 })),
  NOTION_API_BASE_URL: Type.String({ default: 'https://api.notion.com' }),
  NOTION_VERSION: Type.String({ default: '2022-06-28' }),
  NOTION_PAGE_SIZE: Type.Integer({ default: 100, minimum: 1, maximum: 100 }),
  NOTION_TIMEOUT_MS: Type.Integer({ default: 30_000, minimum: 1 }),
});

export type Env = Static<typeof EnvSchema>;

const parseInteger = (value: string | undefined, fallback: number): number =>
  value != null && value !== '' ? Number(value) : fallback;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    NOTION_TOKEN: env['NOTION_TOKEN'],
    NOTION_API_BASE_URL: env['NOTION_API_BASE_URL'] ?? 'https://api.notion.com',
    NOTION_VERSION: env['NOTION_VERSION'] ?? '2022-06-28',
    NOTION_PAGE_SIZE: parseInteger(env['NOTION_PAGE_SIZE'], 100),
    NOTION_TIMEOUT_MS: parseInteger(env['NOTION_TIMEOUT_MS'], 30_000),
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  isProduction: env.NODE_ENV === 'production',
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  api: {
    /** Integration token; undefined until configured */
    token: env.NOTION_TOKEN,
    baseUrl: env.NOTION_API_BASE_URL,
    version: env.NOTION_VERSION,
    pageSize: env.NOTION_PAGE_SIZE,
    timeoutMs: env.NOTION_TIMEOUT_MS,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
