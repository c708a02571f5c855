/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import os from 'node:os';
import path from 'node:path';

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

export const DEFAULT_DATA_DIR = '~/.quack';
export const DEFAULT_PROGRESS_FILE = 'ducktyper_user.json';
export const DEFAULT_CERTIFICATE_ISSUER = 'QuackVerse';

/** Used outside production when QUACK_CERTIFICATE_SECRET is unset */
export const DEVELOPMENT_CERTIFICATE_SECRET = 'quack-secret-key';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  // Server
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),
  PORT: Type.Number({ default: 3000, minimum: 1, maximum: 65535 }),
  HOST: Type.String({ default: '127.0.0.1' }),

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

  // Progress file
  QUACK_DATA_DIR: Type.String({ minLength: 1, default: DEFAULT_DATA_DIR }),
  QUACK_PROGRESS_FILE: Type.String({ minLength: 1, default: DEFAULT_PROGRESS_FILE }),

  // Identity
  GITHUB_USERNAME: Type.Optional(Type.String()),

  // Certificates
  QUACK_CERTIFICATE_SECRET: Type.Optional(Type.String({ minLength: 1 })),
  QUACK_CERTIFICATE_ISSUER: Type.String({ minLength: 1, default: DEFAULT_CERTIFICATE_ISSUER }),
});

export type Env = Static<typeof EnvSchema>;

const valueOrDefault = (value: string | undefined, fallback: string): string =>
  value != null && value !== '' ? value : fallback;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    PORT: env['PORT'] != null && env['PORT'] !== '' ? Number.parseInt(env['PORT'], 10) : 3000,
    HOST: env['HOST'] ?? '127.0.0.1',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    QUACK_DATA_DIR: valueOrDefault(env['QUACK_DATA_DIR'], DEFAULT_DATA_DIR),
    QUACK_PROGRESS_FILE: valueOrDefault(env['QUACK_PROGRESS_FILE'], DEFAULT_PROGRESS_FILE),
    GITHUB_USERNAME: env['GITHUB_USERNAME'],
    QUACK_CERTIFICATE_SECRET: env['QUACK_CERTIFICATE_SECRET'],
    QUACK_CERTIFICATE_ISSUER: valueOrDefault(
      env['QUACK_CERTIFICATE_ISSUER'],
      DEFAULT_CERTIFICATE_ISSUER
    ),
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  if (rawEnv.NODE_ENV === 'production' && rawEnv.QUACK_CERTIFICATE_SECRET === undefined) {
    throw new Error(
      'Invalid environment configuration: QUACK_CERTIFICATE_SECRET is required in production'
    );
  }

  return rawEnv;
};

/**
 * Expands a leading "~" to the home directory and resolves the result.
 */
export const expandHome = (dir: string, homeDir: string = os.homedir()): string => {
  if (dir === '~') {
    return homeDir;
  }
  if (dir.startsWith('~/')) {
    return path.join(homeDir, dir.slice(2));
  }
  return path.resolve(dir);
};

/**
 * Path of the progress file: QUACK_PROGRESS_FILE inside QUACK_DATA_DIR.
 */
export const resolveProgressFilePath = (
  dataDir: string,
  fileName: string,
  homeDir: string = os.homedir()
): string => {
  return path.join(expandHome(dataDir, homeDir), fileName);
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  server: {
    port: env.PORT,
    host: env.HOST,
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV === 'development',
  },
  progress: {
    dataDir: expandHome(env.QUACK_DATA_DIR),
    filePath: resolveProgressFilePath(env.QUACK_DATA_DIR, env.QUACK_PROGRESS_FILE),
  },
  identity: {
    /** Explicit GitHub username; otherwise git config or the OS user is used */
    githubUsername: env.GITHUB_USERNAME,
  },
  certificates: {
    secret: env.QUACK_CERTIFICATE_SECRET ?? DEVELOPMENT_CERTIFICATE_SECRET,
    usingDevelopmentSecret: env.QUACK_CERTIFICATE_SECRET === undefined,
    issuer: env.QUACK_CERTIFICATE_ISSUER,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
