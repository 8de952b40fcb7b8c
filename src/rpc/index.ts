import type { AuthBackend } from '../auth/backend';
import { AppError } from '../lib/errors';
import { componentLogger } from '../logging/logger';
import { defaultJsonCodec, type JsonCodec } from './codec';
import { JsonRpcDispatcher } from './dispatcher';
import { registerAuthMethods, registerIntrospectionMethods } from './introspection';
import { MethodRegistry } from './registry';
import type { RpcContext, RpcHandler, RpcMethodDefinition } from './types';

export { createJsonCodec, defaultJsonCodec, type JsonCodec, type ValueSerializer } from './codec';
export { JsonRpcDispatcher } from './dispatcher';
export { RpcMethod, defineRpcMethod } from './method';
export { MethodRegistry } from './registry';
export * from './types';

const logger = componentLogger('rpc');

const DEFAULT_SERVICE_TYPE = 'JSONRPC 1.0 dispatcher';

export interface RpcServerOptions {
  /** Path the host serves RPC on; reported by `system.describe`. */
  url?: string;
  serviceType?: string;
  /** Skip the `system.*` introspection methods. */
  restrictIntrospection?: boolean;
  /** Skip `system.login` and `system.logout`. Defaults to true. */
  restrictOotbAuth?: boolean;
  codec?: JsonCodec;
  authBackend?: AuthBackend;
  /** Host methods, registered after the built-ins in list order. */
  methods?: ReadonlyArray<RpcHandler | RpcMethodDefinition>;
}

export interface RpcServer {
  readonly url: string;
  readonly registry: MethodRegistry;
  readonly dispatcher: JsonRpcDispatcher;
  dispatch(rawBody: string | null | undefined, context?: RpcContext): Promise<string>;
}

/**
 * Builds the registry (built-ins first, then host methods), seals it, and
 * wires the dispatcher to it.
 */
export function createRpcServer(options: RpcServerOptions = {}): RpcServer {
  const url = options.url ?? '';
  const registry = new MethodRegistry();

  if (!options.restrictIntrospection) {
    registerIntrospectionMethods(registry, {
      serviceType: options.serviceType ?? DEFAULT_SERVICE_TYPE,
      serviceUrl: url,
    });
  }

  if (!(options.restrictOotbAuth ?? true)) {
    if (!options.authBackend) {
      throw new AppError('system.login and system.logout need an auth backend', { code: 'invalid_config' });
    }
    registerAuthMethods(registry, options.authBackend);
  }

  for (const method of options.methods ?? []) {
    registry.add(method);
  }

  registry.seal();
  logger.info({ url, methodCount: registry.size }, 'RPC method registry ready');

  const dispatcher = new JsonRpcDispatcher(registry, options.codec ?? defaultJsonCodec);

  return {
    url,
    registry,
    dispatcher,
    dispatch: (rawBody, context) => dispatcher.dispatch(rawBody, context),
  };
}
