import { hasPermission } from '../auth/permissions';
import { AuthError, isRpcError, toUnknownProcessingError, type RpcError } from '../lib/errors';
import { err, ok, type Result } from '../lib/result';
import type { RpcMethod } from './method';
import type { JsonRpcId, RpcContext } from './types';

/**
 * Runs a method's access policy before it is invoked: the authentication
 * hook (which may attach a user), the authorization hook, then the declared
 * login and permission requirements.
 */
export async function guardMethod(
  method: RpcMethod,
  context: RpcContext,
  id: JsonRpcId,
): Promise<Result<RpcContext, RpcError>> {
  let current = context;

  try {
    if (method.authentication) {
      current = await method.authentication(current);
    }
    if (method.authorization) {
      await method.authorization(current);
    }
  } catch (error) {
    return err(isRpcError(error) ? error : toUnknownProcessingError(error, id));
  }

  if (method.loginRequired && !current.user) {
    return err(new AuthError('Login required', { id }));
  }

  if (method.permission !== undefined && (!current.user || !hasPermission(current.user, method.permission))) {
    return err(new AuthError('User does not have permissions', { id }));
  }

  return ok(current);
}
