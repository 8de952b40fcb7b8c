import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { componentLogger } from '../logging/logger';
import type { RpcUser } from '../rpc/types';
import type { AuthBackend } from './backend';
import { verifyPassword } from './password';

const logger = componentLogger('auth');

export const StoredUserSchema = z.object({
  username: z.string().min(1),
  passwordHash: z.string().startsWith('scrypt:'),
  isActive: z.boolean().default(true),
  isStaff: z.boolean().default(false),
  isSuperuser: z.boolean().default(false),
  permissions: z.array(z.string().min(1)).default([]),
});

export const UsersFileSchema = z.object({
  users: z.array(StoredUserSchema),
});

export type StoredUser = z.infer<typeof StoredUserSchema>;
export type StoredUserInput = z.input<typeof StoredUserSchema>;

function toRpcUser(stored: StoredUser): RpcUser {
  return Object.freeze({
    username: stored.username,
    isActive: stored.isActive,
    isStaff: stored.isStaff,
    isSuperuser: stored.isSuperuser,
    permissions: Object.freeze([...stored.permissions]),
  });
}

export class InMemoryUserStore implements AuthBackend {
  private readonly users = new Map<string, StoredUser>();

  constructor(users: readonly StoredUserInput[] = []) {
    for (const user of users) {
      const parsed = StoredUserSchema.parse(user);
      if (this.users.has(parsed.username)) {
        throw new Error(`Duplicate user in user store: ${parsed.username}`);
      }
      this.users.set(parsed.username, parsed);
    }
  }

  public static async fromFile(path: string): Promise<InMemoryUserStore> {
    const raw = await readFile(path, 'utf8');
    const parsed = UsersFileSchema.parse(JSON.parse(raw));
    logger.info({ path, userCount: parsed.users.length }, 'Loaded RPC users');
    return new InMemoryUserStore(parsed.users);
  }

  public async authenticate(username: string, password: string): Promise<RpcUser | null> {
    const stored = this.users.get(username);
    if (!stored) {
      return null;
    }
    const matches = await verifyPassword(password, stored.passwordHash);
    return matches ? toRpcUser(stored) : null;
  }

  public findUser(username: string): RpcUser | undefined {
    const stored = this.users.get(username);
    return stored ? toRpcUser(stored) : undefined;
  }

  public get size(): number {
    return this.users.size;
  }
}
