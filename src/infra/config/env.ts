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

  // Inputs
  REFERENCE_PATH: Type.String({ minLength: 1 }),
  RUN_CONFIG_PATH: Type.String({ minLength: 1 }),
  SOURCE_ROWS_PATH: Type.String({ minLength: 1 }),

  // Outputs
  OUTPUT_DIR: Type.String({ minLength: 1, default: 'output' }),
});

export type Env = Static<typeof EnvSchema>;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    REFERENCE_PATH: env['REFERENCE_PATH'],
    RUN_CONFIG_PATH: env['RUN_CONFIG_PATH'],
    SOURCE_ROWS_PATH: env['SOURCE_ROWS_PATH'],
    OUTPUT_DIR: env['OUTPUT_DIR'] != null && env['OUTPUT_DIR'] !== '' ? env['OUTPUT_DIR'] : 'output',
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
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  inputs: {
    /** Reference admin hierarchy (YAML or JSON) */
    referencePath: env.REFERENCE_PATH,
    /** Run configuration: levels, sectors, organization aliases */
    runConfigPath: env.RUN_CONFIG_PATH,
    /** Decoded source rows (JSON) */
    sourceRowsPath: env.SOURCE_ROWS_PATH,
  },
  outputs: {
    dir: env.OUTPUT_DIR,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
