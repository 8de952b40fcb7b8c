import type { RpcSession, RpcUser } from '../rpc/types';

/** Request-scoped session; the host persists it when {@link changed} is set. */
export class TokenSession implements RpcSession {
  private current?: RpcUser;
  private dirty = false;

  constructor(user?: RpcUser) {
    this.current = user;
  }

  get user(): RpcUser | undefined {
    return this.current;
  }

  get changed(): boolean {
    return this.dirty;
  }

  login(user: RpcUser): void {
    this.current = user;
    this.dirty = true;
  }

  logout(): void {
    this.current = undefined;
    this.dirty = true;
  }
}
