import { z } from 'zod';
import type { RpcErrorKind } from '../lib/errors';

/** Any JSON value. Ids are echoed back exactly as the client sent them. */
export type JsonRpcId = unknown;

export const JsonRpcEnvelopeSchema = z.record(z.string(), z.unknown());
export const MethodNameSchema = z.string();
export const ParamsSchema = z.array(z.unknown());

export type JsonRpcEnvelope = z.infer<typeof JsonRpcEnvelopeSchema>;

export interface JsonRpcRequest {
  id: JsonRpcId;
  method: string;
  params: unknown[];
}

export interface EncodedError {
  name: 'JSONRPCError';
  exception: RpcErrorKind;
  code: number;
  message: string;
}

export type JsonRpcSuccess = {
  id: JsonRpcId;
  result: unknown;
  error: null;
};

export type JsonRpcFailure = {
  id: JsonRpcId;
  result: null;
  error: EncodedError;
};

export type JsonRpcResponse = JsonRpcSuccess | JsonRpcFailure;

export const TYPE_TAGS = [
  'int',
  'i4',
  'double',
  'string',
  'boolean',
  'array',
  'struct',
  'base64',
  'dateTime.iso8601',
  'nil',
  'object',
] as const;

export type TypeTag = (typeof TYPE_TAGS)[number];

/** `[returnType, param1Type, param2Type, ...]` */
export type MethodSignature = readonly TypeTag[];

export interface ParamDescriptor {
  name: string;
  rpctype: TypeTag;
}

export interface RpcUser {
  username: string;
  isActive: boolean;
  isStaff: boolean;
  isSuperuser: boolean;
  permissions: readonly string[];
}

/**
 * Per-request session owned by the host. The built-in login/logout methods
 * and the basic auth hook write to it; the host decides how it is persisted.
 */
export interface RpcSession {
  readonly user?: RpcUser;
  login(user: RpcUser): void;
  logout(): void;
}

export interface RpcRequestInfo {
  headers: Record<string, string | undefined>;
  remoteAddress?: string;
  correlationId?: string;
}

export interface RpcContext {
  request: RpcRequestInfo;
  user?: RpcUser;
  session?: RpcSession;
}

/**
 * A method implementation. It is called with the request params spread
 * positionally, followed by the {@link RpcContext}, which it may ignore.
 */
export type RpcHandler = (...args: never[]) => unknown;

export type AuthenticationHook = (context: RpcContext) => RpcContext | Promise<RpcContext>;
export type AuthorizationHook = (context: RpcContext) => void | Promise<void>;

export interface RpcMethodOptions {
  /** External name; defaults to the handler's own name. */
  name?: string;
  /**
   * Positional parameter names, in call order. Without them the handler's
   * arity decides, with placeholder names `arg0`, `arg1`, ...; a handler that
   * reads the trailing context must therefore declare its params.
   */
  params?: readonly string[];
  signature?: readonly TypeTag[];
  help?: string;
  /** Defaults to `true` when a permission is set. */
  loginRequired?: boolean;
  permission?: string;
  authentication?: AuthenticationHook;
  authorization?: AuthorizationHook;
}

export interface RpcMethodDefinition {
  readonly handler: RpcHandler;
  readonly options: Readonly<RpcMethodOptions>;
}

/** Values passed at registration time rather than attached to the definition. */
export interface RegistrationOverrides {
  name?: string;
  params?: readonly string[];
  signature?: readonly TypeTag[];
  help?: string;
}

export interface MethodDescription {
  name: string;
  summary: string;
  params: ParamDescriptor[];
  return: TypeTag;
}

export interface ServiceDescription {
  serviceType: string;
  serviceURL: string;
  methods: MethodDescription[];
}

export function createAnonymousContext(request: Partial<RpcRequestInfo> = {}): RpcContext {
  return {
    request: {
      headers: request.headers ?? {},
      remoteAddress: request.remoteAddress,
      correlationId: request.correlationId,
    },
  };
}
