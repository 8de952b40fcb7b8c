import type { JsonRpcId } from '../rpc/types';

export class AppError extends Error {
  public readonly status: number;
  public readonly code: string;
  public readonly details?: unknown;

  constructor(message: string, options: { status?: number; code?: string; details?: unknown } = {}) {
    super(message);
    this.name = 'AppError';
    this.status = options.status ?? 500;
    this.code = options.code ?? 'internal_error';
    this.details = options.details;
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Exception names as they appear in the `exception` field of an encoded error.
 * Clients match on these, so they keep their historical spelling.
 */
export type RpcErrorKind =
  | 'RpcException'
  | 'BadDataException'
  | 'BadMethodException'
  | 'UnknownProcessingError'
  | 'ProcessingException'
  | 'BadParamsException'
  | 'AuthException';

export interface RpcErrorOptions {
  /** Request id known at the point of failure, echoed in the response envelope. */
  id?: JsonRpcId;
}

/**
 * Root of the RPC failure taxonomy. `code` and `kind` are part of the wire
 * contract and must not change for an existing subclass.
 */
export class RpcError extends Error {
  public readonly code: number = 100;
  public readonly kind: RpcErrorKind = 'RpcException';
  public readonly id?: JsonRpcId;

  constructor(message: string, options: RpcErrorOptions = {}) {
    super(message);
    this.name = 'RpcError';
    this.id = options.id;
  }
}

/** Body missing, not JSON, not an object, or missing `method`/`params`. */
export class BadDataError extends RpcError {
  public override readonly code: number = 101;
  public override readonly kind: RpcErrorKind = 'BadDataException';

  constructor(message: string, options: RpcErrorOptions = {}) {
    super(message, options);
    this.name = 'BadDataError';
  }
}

/** Wrong method name or type, or `params` not an array. */
export class BadMethodError extends RpcError {
  public override readonly code: number = 102;
  public override readonly kind: RpcErrorKind = 'BadMethodException';

  constructor(message: string, options: RpcErrorOptions = {}) {
    super(message, options);
    this.name = 'BadMethodError';
  }
}

export class UnknownProcessingError extends RpcError {
  public override readonly code: number = 104;
  public override readonly kind: RpcErrorKind = 'UnknownProcessingError';

  constructor(message: string, options: RpcErrorOptions = {}) {
    super(message, options);
    this.name = 'UnknownProcessingError';
  }
}

/** Base class for errors raised by method handlers. */
export class ProcessingError extends RpcError {
  public override readonly code: number = 200;
  public override readonly kind: RpcErrorKind = 'ProcessingException';

  constructor(message: string, options: RpcErrorOptions = {}) {
    super(message, options);
    this.name = 'ProcessingError';
  }
}

export class BadParamsError extends ProcessingError {
  public override readonly code: number = 201;
  public override readonly kind: RpcErrorKind = 'BadParamsException';

  constructor(message: string, options: RpcErrorOptions = {}) {
    super(message, options);
    this.name = 'BadParamsError';
  }
}

export class AuthError extends ProcessingError {
  public override readonly code: number = 403;
  public override readonly kind: RpcErrorKind = 'AuthException';

  constructor(message: string, options: RpcErrorOptions = {}) {
    super(message, options);
    this.name = 'AuthError';
  }
}

export function isRpcError(error: unknown): error is RpcError {
  return error instanceof RpcError;
}

/**
 * Wraps anything thrown outside the taxonomy. Only the formatted
 * `<name>: <message>` survives; the original error is not kept.
 */
export function toUnknownProcessingError(error: unknown, id?: JsonRpcId): UnknownProcessingError {
  const description =
    error instanceof Error ? `${error.name}: ${error.message}` : `${typeof error}: ${String(error)}`;
  return new UnknownProcessingError(description, { id });
}
