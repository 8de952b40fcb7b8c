import express from 'express';
import cors from 'cors';
import type { Application } from 'express';
import { config } from '../config';
import { AppError } from '../lib/errors';
import { correlationIdMiddleware, getCorrelationId } from '../middleware/correlation-id';
import { errorHandler } from '../middleware/error-handler';
import { requestLogger } from '../middleware/request-logger';
import {
  SESSION_HEADER,
  buildMethodSummary,
  flattenHeaders,
  handleRpcRequest,
  type RpcEndpointDependencies,
} from './rpc-endpoint';

export type AppDependencies = RpcEndpointDependencies;

export function createApp(deps: AppDependencies): Application {
  const app = express();
  const rpcUrl = config.rpc.url;
  app.disable('x-powered-by');

  app.use(correlationIdMiddleware);
  app.use((req, res, next) => requestLogger(req, res, next));

  // An empty allow-origin disables CORS headers altogether.
  const rpcCors = cors({
    origin: config.http.accessAllowOrigin || false,
    credentials: config.http.accessCredentials,
    methods: ['POST', 'GET', 'OPTIONS'],
    exposedHeaders: [SESSION_HEADER],
    maxAge: 0,
  });

  app.get('/healthz', (_req, res) => {
    res.json({
      status: 'ok',
      service: config.serverName,
      version: config.buildVersion,
      timestamp: new Date().toISOString(),
      uptimeSeconds: Math.round(process.uptime()),
      methods: deps.server.registry.size,
    });
  });

  app.options(rpcUrl, rpcCors, (_req, res) => {
    res.status(204).end();
  });

  app.get(rpcUrl, rpcCors, (_req, res, next) => {
    if (config.rpc.restrictMethodSummary) {
      next(new AppError('Endpoint not found.', { status: 404, code: 'not_found' }));
      return;
    }
    res.json(buildMethodSummary(deps.server, config.buildVersion));
  });

  // The raw body is handed to the dispatcher untouched, whatever its content type.
  app.post(rpcUrl, rpcCors, express.text({ type: () => true, limit: config.http.bodyLimit }), async (req, res, next) => {
    try {
      const result = await handleRpcRequest(deps, {
        body: typeof req.body === 'string' ? req.body : '',
        headers: flattenHeaders(req.headers),
        remoteAddress: req.socket.remoteAddress,
        correlationId: getCorrelationId(),
      });

      if (result.sessionToken !== undefined) {
        res.setHeader(SESSION_HEADER, result.sessionToken);
      }
      res.type('application/json').send(result.body);
    } catch (error) {
      next(error);
    }
  });

  app.use((_req, res) => {
    res.status(404).json({
      status: 404,
      code: 'not_found',
      message: 'Endpoint not found.',
    });
  });

  app.use(errorHandler);

  return app;
}
