import type { RpcUser } from '../rpc/types';

/** Credential store consulted by `system.login` and the basic auth hook. */
export interface AuthBackend {
  /** Resolves the user when the credentials match, `null` otherwise. Inactive users are returned as-is. */
  authenticate(username: string, password: string): Promise<RpcUser | null>;
  findUser(username: string): RpcUser | undefined;
}
