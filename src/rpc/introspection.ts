import type { AuthBackend } from '../auth/backend';
import { BadMethodError } from '../lib/errors';
import { componentLogger } from '../logging/logger';
import { defineRpcMethod } from './method';
import type { MethodRegistry } from './registry';
import type { RpcContext, ServiceDescription, TypeTag } from './types';

const logger = componentLogger('rpc');

export interface IntrospectionOptions {
  serviceType: string;
  serviceUrl: string;
}

function requireMethod(registry: MethodRegistry, name: unknown) {
  const method = typeof name === 'string' ? registry.lookup(name) : undefined;
  if (!method) {
    throw new BadMethodError(`Method ${String(name)} not registered here`);
  }
  return method;
}

export function registerIntrospectionMethods(registry: MethodRegistry, options: IntrospectionOptions): void {
  registry.add(
    defineRpcMethod((): string[] => registry.listMethodNames(), {
      name: 'system.listMethods',
      signature: ['array'],
      help: 'Returns a list of supported methods',
    }),
  );

  registry.add(
    defineRpcMethod((name: unknown): string => requireMethod(registry, name).help, {
      name: 'system.methodHelp',
      params: ['method_name'],
      signature: ['string', 'string'],
      help: 'Returns documentation for a specified method',
    }),
  );

  registry.add(
    defineRpcMethod((name: unknown): readonly TypeTag[] => requireMethod(registry, name).signature, {
      name: 'system.methodSignature',
      params: ['method_name'],
      signature: ['array', 'string'],
      help: 'Returns the signature for a specified method',
    }),
  );

  registry.add(
    defineRpcMethod(
      (): ServiceDescription =>
        registry.describe({ serviceType: options.serviceType, serviceUrl: options.serviceUrl }),
      {
        name: 'system.describe',
        signature: ['struct'],
        help: 'Returns a simple method description of the methods supported',
      },
    ),
  );
}

export function registerAuthMethods(registry: MethodRegistry, backend: AuthBackend): void {
  registry.add(
    defineRpcMethod(
      async (username: unknown, password: unknown, context: RpcContext): Promise<boolean> => {
        if (!context.session || typeof username !== 'string' || typeof password !== 'string') {
          return false;
        }

        const user = await backend.authenticate(username, password);
        if (!user || !user.isActive) {
          logger.info({ username }, 'Rejected system.login attempt');
          return false;
        }

        context.session.login(user);
        return true;
      },
      {
        name: 'system.login',
        params: ['username', 'password'],
        signature: ['boolean', 'string', 'string'],
        help: 'Authorizes a user to enable sending protected RPC requests',
      },
    ),
  );

  registry.add(
    defineRpcMethod(
      (context: RpcContext): boolean => {
        if (!context.session) {
          return false;
        }
        context.session.logout();
        return true;
      },
      {
        name: 'system.logout',
        params: [],
        signature: ['boolean'],
        help: 'Deauthorizes a user',
      },
    ),
  );
}
