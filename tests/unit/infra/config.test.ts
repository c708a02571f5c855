/**
 * Unit tests for configuration module
 */

import { describe, expect, it } from 'vitest';

import {
  DEVELOPMENT_CERTIFICATE_SECRET,
  createConfig,
  expandHome,
  parseEnv,
  resolveProgressFilePath,
} from '@/infra/config/env.js';

describe('Configuration', () => {
  describe('parseEnv', () => {
    it('returns default values when env is empty', () => {
      const env = parseEnv({});

      expect(env).toEqual({
        NODE_ENV: 'development',
        PORT: 3000,
        HOST: '127.0.0.1',
        LOG_LEVEL: 'info',
        QUACK_DATA_DIR: '~/.quack',
        QUACK_PROGRESS_FILE: 'ducktyper_user.json',
        GITHUB_USERNAME: undefined,
        QUACK_CERTIFICATE_SECRET: undefined,
        QUACK_CERTIFICATE_ISSUER: 'QuackVerse',
      });
    });

    it('parses PORT as number', () => {
      const env = parseEnv({ PORT: '8080' });

      expect(env.PORT).toBe(8080);
    });

    it('treats empty strings as unset for file settings', () => {
      const env = parseEnv({ QUACK_DATA_DIR: '', QUACK_PROGRESS_FILE: '' });

      expect(env.QUACK_DATA_DIR).toBe('~/.quack');
      expect(env.QUACK_PROGRESS_FILE).toBe('ducktyper_user.json');
    });

    it('accepts valid LOG_LEVEL values', () => {
      const levels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

      for (const level of levels) {
        expect(parseEnv({ LOG_LEVEL: level }).LOG_LEVEL).toBe(level);
      }
    });

    it('throws on invalid LOG_LEVEL', () => {
      expect(() => parseEnv({ LOG_LEVEL: 'verbose' })).toThrow(/Invalid environment configuration/);
    });

    it('throws on a PORT that is not a number', () => {
      expect(() => parseEnv({ PORT: 'abc' })).toThrow(/Invalid environment configuration/);
    });

    it('throws on a PORT out of range', () => {
      expect(() => parseEnv({ PORT: '70000' })).toThrow(/Invalid environment configuration/);
    });

    it('requires a certificate secret in production', () => {
      expect(() => parseEnv({ NODE_ENV: 'production' })).toThrow(
        'Invalid environment configuration: QUACK_CERTIFICATE_SECRET is required in production'
      );
      expect(
        parseEnv({ NODE_ENV: 'production', QUACK_CERTIFICATE_SECRET: 'test-secret' }).NODE_ENV
      ).toBe('production');
    });
  });

  describe('expandHome', () => {
    it('expands a leading tilde', () => {
      expect(expandHome('~', '/home/duck')).toBe('/home/duck');
      expect(expandHome('~/.quack', '/home/duck')).toBe('/home/duck/.quack');
    });

    it('leaves absolute paths alone', () => {
      expect(expandHome('/var/lib/quack', '/home/duck')).toBe('/var/lib/quack');
    });
  });

  describe('resolveProgressFilePath', () => {
    it('joins the data directory and file name', () => {
      expect(resolveProgressFilePath('~/.quack', 'progress.json', '/home/duck')).toBe(
        '/home/duck/.quack/progress.json'
      );
    });
  });

  describe('createConfig', () => {
    it('creates config from explicit settings', () => {
      const config = createConfig(
        parseEnv({
          NODE_ENV: 'test',
          PORT: '4000',
          QUACK_DATA_DIR: '/srv/quack',
          GITHUB_USERNAME: 'duck',
          QUACK_CERTIFICATE_SECRET: 'test-secret',
          QUACK_CERTIFICATE_ISSUER: 'Duck Academy',
        })
      );

      expect(config.server).toEqual({
        port: 4000,
        host: '127.0.0.1',
        isDevelopment: false,
        isProduction: false,
        isTest: true,
      });
      expect(config.logger.pretty).toBe(false);
      expect(config.progress).toEqual({
        dataDir: '/srv/quack',
        filePath: '/srv/quack/ducktyper_user.json',
      });
      expect(config.identity.githubUsername).toBe('duck');
      expect(config.certificates).toEqual({
        secret: 'test-secret',
        usingDevelopmentSecret: false,
        issuer: 'Duck Academy',
      });
    });

    it('falls back to the development secret outside production', () => {
      const config = createConfig(parseEnv({}));

      expect(config.certificates.secret).toBe(DEVELOPMENT_CERTIFICATE_SECRET);
      expect(config.certificates.usingDevelopmentSecret).toBe(true);
      expect(config.logger.pretty).toBe(true);
    });
  });
});
