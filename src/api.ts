/**
 * API server entry point
 * Loads the local progress record and starts the Fastify HTTP server
 */

import { buildApp } from './app/build-app.js';
import { parseEnv, createConfig } from './infra/config/env.js';
import { createLogger } from './infra/logger/index.js';
import {
  createGamificationService,
  makeHmacCertificateSigner,
  makeJsonProgressStore,
  resolveGithubUsername,
} from './modules/gamification/index.js';
import { makeProgressStoreHealthChecker } from './modules/health/index.js';

const main = async (): Promise<void> => {
  // Parse and validate environment
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const logger = createLogger({
    level: config.logger.level,
    pretty: config.logger.pretty,
  });

  logger.info(
    { config: { server: config.server, progressFile: config.progress.filePath } },
    'Starting API server'
  );

  if (config.certificates.usingDevelopmentSecret) {
    logger.warn('QUACK_CERTIFICATE_SECRET not configured - using the development secret');
  }

  // Initialize dependencies
  const store = makeJsonProgressStore({ filePath: config.progress.filePath, logger });
  const username = resolveGithubUsername({
    logger,
    configured: config.identity.githubUsername,
  });
  const service = createGamificationService({ store, logger, username });
  const signer = makeHmacCertificateSigner(config.certificates.secret);

  const app = await buildApp({
    fastifyOptions: {
      logger: {
        level: config.logger.level,
        ...(config.logger.pretty && {
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          },
        }),
      },
    },
    deps: {
      config,
      service,
      signer,
      healthCheckers: [makeProgressStoreHealthChecker(store)],
    },
    version: process.env['APP_VERSION'],
  });

  // Graceful shutdown handler
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      service.save();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address, user: username }, 'Server listening');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

// Start the server (top-level await)
await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
