import type { AuthBackend } from '../auth/backend';
import { basicHttpAuth, staffRequired } from '../auth/hooks';
import { AuthError } from '../lib/errors';
import { defineRpcMethod } from '../rpc/method';
import type { RpcContext, RpcMethodDefinition } from '../rpc/types';

export interface WhoAmIResult {
  username: string;
  isStaff: boolean;
  isSuperuser: boolean;
  permissions: string[];
}

export function createAccountMethods(backend: AuthBackend): RpcMethodDefinition[] {
  const whoami = defineRpcMethod(
    (context: RpcContext): WhoAmIResult => {
      const user = context.user;
      if (!user) {
        throw new AuthError('User not authenticated');
      }
      return {
        username: user.username,
        isStaff: user.isStaff,
        isSuperuser: user.isSuperuser,
        permissions: [...user.permissions],
      };
    },
    {
      name: 'account.whoami',
      params: [],
      signature: ['struct'],
      help: 'Returns the authenticated user. Accepts a session token or HTTP basic credentials.',
      loginRequired: true,
      authentication: basicHttpAuth(backend),
    },
  );

  const serverTime = defineRpcMethod((): Date => new Date(), {
    name: 'admin.serverTime',
    signature: ['dateTime.iso8601'],
    help: 'Returns the server clock. Staff only.',
    authorization: staffRequired,
  });

  return [whoami, serverTime];
}
