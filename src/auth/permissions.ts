import type { RpcUser } from '../rpc/types';

export function hasPermission(user: RpcUser, permission: string): boolean {
  if (!user.isActive) {
    return false;
  }
  return user.isSuperuser || user.permissions.includes(permission);
}
