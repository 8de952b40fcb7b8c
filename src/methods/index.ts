import type { AuthBackend } from '../auth/backend';
import type { RpcMethodDefinition } from '../rpc/types';
import { createAccountMethods } from './account';
import { addMethod, echoMethod } from './math';

/** Host methods in registration order. */
export function createHostMethods(backend: AuthBackend): RpcMethodDefinition[] {
  return [addMethod, echoMethod, ...createAccountMethods(backend)];
}
