import type { IncomingHttpHeaders } from 'node:http';
import type { SessionTokenService } from '../auth/token-validator';
import { BadDataError } from '../lib/errors';
import { componentLogger } from '../logging/logger';
import type { SessionResolver } from '../middleware/authentication';
import type { RpcServer } from '../rpc';
import type { ParamDescriptor, RpcContext, TypeTag } from '../rpc/types';

const logger = componentLogger('http');

export const SESSION_HEADER = 'x-rpc-session';
const JSON_CONTENT_TYPE = 'application/json';

export interface RpcEndpointDependencies {
  server: RpcServer;
  sessions: SessionTokenService;
  resolveSession: SessionResolver;
  logRequestsResponses: boolean;
}

export interface RpcHttpRequest {
  body: string;
  headers: Record<string, string | undefined>;
  remoteAddress?: string;
  correlationId?: string;
}

export interface RpcHttpResponse {
  body: string;
  /** Token to hand back in {@link SESSION_HEADER}: a new token, `''` after logout, absent when unchanged. */
  sessionToken?: string;
}

export interface MethodSummaryEntry {
  name: string;
  help: string;
  signature: readonly TypeTag[];
  params: ParamDescriptor[];
  returns: TypeTag;
  loginRequired: boolean;
  permission?: string;
  stub: string;
}

export interface MethodSummary {
  url: string;
  version: string;
  methods: MethodSummaryEntry[];
}

export function isJsonContentType(contentType: string | undefined): boolean {
  return typeof contentType === 'string' && contentType.toLowerCase().includes(JSON_CONTENT_TYPE);
}

export function flattenHeaders(headers: IncomingHttpHeaders): Record<string, string | undefined> {
  const flattened: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(headers)) {
    flattened[key.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return flattened;
}

/**
 * One POST to the RPC URL: checks the content type, resolves the session,
 * dispatches, and reports whether the session has to be re-issued.
 */
export async function handleRpcRequest(
  deps: RpcEndpointDependencies,
  request: RpcHttpRequest,
): Promise<RpcHttpResponse> {
  const correlationId = request.correlationId;

  if (!isJsonContentType(request.headers['content-type'])) {
    return {
      body: deps.server.dispatcher.encodeError(new BadDataError(`Use ${JSON_CONTENT_TYPE} content type`)),
    };
  }

  if (deps.logRequestsResponses) {
    logger.debug({ correlationId, rpcBody: request.body }, 'Incoming RPC request');
  }

  const session = deps.resolveSession(request.headers['authorization']);
  const context: RpcContext = {
    request: {
      headers: request.headers,
      remoteAddress: request.remoteAddress,
      correlationId,
    },
    user: session.user,
    session,
  };

  const body = await deps.server.dispatch(request.body, context);

  if (deps.logRequestsResponses) {
    logger.debug({ correlationId, rpcBody: body }, 'Outgoing RPC response');
  }

  if (!session.changed) {
    return { body };
  }
  return { body, sessionToken: session.user ? deps.sessions.issue(session.user) : '' };
}

export function buildMethodSummary(server: RpcServer, version: string): MethodSummary {
  return {
    url: server.url,
    version,
    methods: server.registry.listMethods().map((method) => ({
      name: method.name,
      help: method.help,
      signature: method.signature,
      params: method.getParams(),
      returns: method.getReturnType(),
      loginRequired: method.loginRequired,
      permission: method.permission,
      stub: method.toStub(),
    })),
  };
}
