import pino from 'pino';
import { z } from 'zod';
import { config } from '../config';

const CENSOR = '[Redacted]';

/** Credentials that can end up in log objects: auth headers, session tokens and password fields. */
export const REDACTED_PATHS = [
  'req.headers.authorization',
  'req.headers.cookie',
  'req.headers["x-rpc-session"]',
  'res.headers["x-rpc-session"]',
  'password',
  'passwordHash',
  'sessionToken',
  '*.password',
  '*.passwordHash',
];

const LoginEnvelopeSchema = z
  .object({
    method: z.literal('system.login'),
    params: z.array(z.unknown()),
  })
  .passthrough();

/**
 * Serializer for raw RPC bodies logged under `rpcBody`. A `system.login`
 * call has its password param replaced; anything else is logged as sent.
 */
export function redactRpcBody(body: unknown): unknown {
  if (typeof body !== 'string' || !body.includes('system.login')) {
    return body;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return body;
  }

  const login = LoginEnvelopeSchema.safeParse(parsed);
  if (!login.success) {
    return body;
  }
  return { ...login.data, params: login.data.params.map((param, index) => (index === 1 ? CENSOR : param)) };
}

export type LogComponent = 'rpc' | 'registry' | 'dispatcher' | 'auth' | 'http';

export function buildLoggerOptions(level: string): pino.LoggerOptions {
  return {
    level,
    base: {
      service: config.serverName,
      version: config.buildVersion,
      rpcUrl: config.rpc.url,
    },
    serializers: {
      rpcBody: redactRpcBody,
    },
    redact: {
      paths: REDACTED_PATHS,
      censor: CENSOR,
    },
    transport:
      config.env === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname,rpcUrl',
            },
          }
        : undefined,
  };
}

export const logger = pino(buildLoggerOptions(config.logging.level));

export function componentLogger(component: LogComponent): pino.Logger {
  return logger.child({ component });
}
