import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';
import type { Request, Response, NextFunction } from 'express';

type Context = {
  correlationId: string;
};

const storage = new AsyncLocalStorage<Context>();
export const CORRELATION_HEADER = 'x-correlation-id';

/** Inbound headers that may carry a caller's id, checked in order. */
const INBOUND_HEADERS = [CORRELATION_HEADER, 'x-request-id'] as const;

export function correlationIdMiddleware(req: Request, res: Response, next: NextFunction) {
  const correlationId = resolveCorrelationId((name) => req.header(name));

  res.setHeader(CORRELATION_HEADER, correlationId);

  storage.run({ correlationId }, () => {
    next();
  });
}

export function resolveCorrelationId(readHeader: (name: string) => string | undefined): string {
  for (const name of INBOUND_HEADERS) {
    const correlationId = sanitizeCorrelationId(readHeader(name));
    if (correlationId) {
      return correlationId;
    }
  }
  return randomUUID();
}

export function sanitizeCorrelationId(value?: string | null): string | null {
  if (!value) {
    return null;
  }

  const trimmed = value.trim();
  if (trimmed.length === 0 || trimmed.length > 128 || !/^[\w.:-]+$/.test(trimmed)) {
    return null;
  }

  return trimmed;
}

export function getCorrelationId(): string | undefined {
  return storage.getStore()?.correlationId;
}
