import { AuthError } from '../lib/errors';
import type { AuthorizationHook, RpcContext } from '../rpc/types';
import type { AuthBackend } from './backend';
import { hasPermission } from './permissions';

/**
 * Authentication hook for HTTP basic credentials. A context that already
 * carries an active user is returned unchanged.
 */
export function basicHttpAuth(backend: AuthBackend): (context: RpcContext) => Promise<RpcContext> {
  return async (context: RpcContext): Promise<RpcContext> => {
    if (context.user?.isActive) {
      return context;
    }

    const header = context.request.headers['authorization'];
    if (!header) {
      throw new AuthError('Authentication required');
    }

    const parts = header.trim().split(/\s+/);
    if (parts.length !== 2) {
      throw new AuthError('Wrong HTTP_AUTHORIZATION header');
    }

    const [scheme, encoded] = parts;
    if (scheme.toLowerCase() !== 'basic') {
      throw new AuthError('We support only basic http auth');
    }

    const credentials = Buffer.from(encoded, 'base64').toString('utf8');
    const separator = credentials.indexOf(':');
    if (separator < 0) {
      throw new AuthError('Wrong HTTP_AUTHORIZATION header');
    }

    const user = await backend.authenticate(credentials.slice(0, separator), credentials.slice(separator + 1));
    if (!user || !user.isActive) {
      throw new AuthError('Wrong user.');
    }

    context.session?.login(user);
    return { ...context, user };
  };
}

export const staffRequired: AuthorizationHook = (context) => {
  const user = context.user;
  if (!user) {
    throw new AuthError('User not authenticated');
  }
  if (!(user.isStaff || user.isSuperuser)) {
    throw new AuthError('User does not have permissions');
  }
};

export function permissionsRequired(permission: string): AuthorizationHook {
  return (context) => {
    const user = context.user;
    if (!user) {
      throw new AuthError('User not authenticated');
    }
    if (!hasPermission(user, permission)) {
      throw new AuthError('User does not have permissions');
    }
  };
}
