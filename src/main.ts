import http from 'node:http';
import { config } from './config';
import { logger } from './logging/logger';
import { createApp } from './http/create-app';
import { createRpcServer } from './rpc';
import { createHostMethods } from './methods';
import { InMemoryUserStore } from './auth/user-store';
import { SessionTokenService } from './auth/token-validator';
import { createSessionResolver } from './middleware/authentication';

async function bootstrap() {
  const users = config.auth.usersFile
    ? await InMemoryUserStore.fromFile(config.auth.usersFile)
    : new InMemoryUserStore();

  const sessions = new SessionTokenService({
    secret: config.auth.sessionSecret,
    ttlSeconds: config.auth.sessionTtlSeconds,
    issuer: config.serverName,
  });

  const server = createRpcServer({
    url: config.rpc.url,
    serviceType: config.rpc.serviceType,
    restrictIntrospection: config.rpc.restrictIntrospection,
    restrictOotbAuth: config.rpc.restrictOotbAuth,
    authBackend: users,
    methods: createHostMethods(users),
  });

  const app = createApp({
    server,
    sessions,
    resolveSession: createSessionResolver(sessions, users),
    logRequestsResponses: config.logging.requestsResponses,
  });

  const httpServer = http.createServer(app);

  await new Promise<void>((resolve) => {
    httpServer.listen(config.port, () => {
      logger.info(
        { port: config.port, url: config.rpc.url, version: config.buildVersion },
        'JSON-RPC server listening',
      );
      resolve();
    });
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Received shutdown signal');
    httpServer.close((error) => {
      if (error) {
        logger.error({ err: error }, 'Error during HTTP server shutdown');
      } else {
        logger.info('HTTP server closed gracefully');
      }
      process.exit(error ? 1 : 0);
    });
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

bootstrap().catch((error) => {
  logger.error({ err: error }, 'Failed to bootstrap JSON-RPC server');
  process.exit(1);
});
