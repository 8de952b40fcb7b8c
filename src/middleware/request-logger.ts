import pinoHttp from 'pino-http';
import type { IncomingMessage, ServerResponse } from 'node:http';
import type { LevelWithSilent } from 'pino';
import { logger } from '../logging/logger';
import { getCorrelationId } from './correlation-id';

const UNLOGGED_PATHS = new Set(['/healthz']);

/**
 * RPC failures are 200 responses with an error envelope, so only transport
 * failures raise the level here.
 */
export function resolveLogLevel(
  _req: IncomingMessage,
  res: ServerResponse<IncomingMessage>,
  error: Error | undefined,
): LevelWithSilent {
  if (error || res.statusCode >= 500) return 'error';
  if (res.statusCode >= 400) return 'warn';
  return 'info';
}

export const requestLogger = pinoHttp({
  logger,
  autoLogging: {
    ignore: (req) => UNLOGGED_PATHS.has(req.url ?? ''),
  },
  customLogLevel: resolveLogLevel,
  customProps: () => {
    const correlationId = getCorrelationId();
    return correlationId ? { correlationId, component: 'http' } : { component: 'http' };
  },
  customSuccessMessage: (req, res) => `${req.method} ${req.url} ${res.statusCode}`,
});
