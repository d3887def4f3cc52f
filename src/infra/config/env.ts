/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import path from 'node:path';

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

  // Templating
  TEMPLATE_TYPE: Type.String({ minLength: 1, default: 'handlebars' }),
  TEMPLATE_INCLUDE_PATHS: Type.Optional(Type.String()),
  TEMPLATE_EMBED_TAG_NAME: Type.Optional(Type.String({ pattern: '^[A-Za-z_][A-Za-z0-9_]*$' })),
  TEMPLATE_AUTO_ADD_EXTENSION: Type.Boolean({ default: true }),
  TEMPLATE_RETURN_REFERENCES: Type.Boolean({ default: false }),
});

export type Env = Static<typeof EnvSchema>;

const parseBoolean = (value: string | undefined, fallback: boolean): boolean | string => {
  if (value === undefined || value === '') return fallback;
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  // Left as a string so validation reports it
  return value;
};

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    TEMPLATE_TYPE: env['TEMPLATE_TYPE'] ?? 'handlebars',
    TEMPLATE_INCLUDE_PATHS: env['TEMPLATE_INCLUDE_PATHS'],
    TEMPLATE_EMBED_TAG_NAME: env['TEMPLATE_EMBED_TAG_NAME'],
    TEMPLATE_AUTO_ADD_EXTENSION: parseBoolean(env['TEMPLATE_AUTO_ADD_EXTENSION'], true),
    TEMPLATE_RETURN_REFERENCES: parseBoolean(env['TEMPLATE_RETURN_REFERENCES'], false),
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
  server: {
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  templating: {
    defaultType: env.TEMPLATE_TYPE,
    /** Split on the platform path delimiter (`:` or `;`) */
    includePaths: env.TEMPLATE_INCLUDE_PATHS?.split(path.delimiter).filter(Boolean) ?? [],
    autoAddTemplateExtension: env.TEMPLATE_AUTO_ADD_EXTENSION,
    returnReferences: env.TEMPLATE_RETURN_REFERENCES,
    /** Applied to every backend section when set */
    embedTagName: env.TEMPLATE_EMBED_TAG_NAME,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
