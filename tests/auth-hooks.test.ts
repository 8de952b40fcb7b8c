import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { basicHttpAuth, permissionsRequired, staffRequired } from '../src/auth/hooks';
import { hashPassword } from '../src/auth/password';
import { hasPermission } from '../src/auth/permissions';
import { TokenSession } from '../src/auth/session';
import { InMemoryUserStore } from '../src/auth/user-store';
import { createAnonymousContext, type RpcContext, type RpcUser } from '../src/rpc/types';

function user(overrides: Partial<RpcUser> = {}): RpcUser {
  return {
    username: 'alice',
    isActive: true,
    isStaff: false,
    isSuperuser: false,
    permissions: [],
    ...overrides,
  };
}

function withAuthorization(header: string, session?: TokenSession): RpcContext {
  return { ...createAnonymousContext({ headers: { authorization: header } }), session };
}

function basic(credentials: string): string {
  return `Basic ${Buffer.from(credentials, 'utf8').toString('base64')}`;
}

async function buildUsers() {
  const passwordHash = await hashPassword('test-secret', Buffer.alloc(16, 1));
  return new InMemoryUserStore([
    { username: 'alice', passwordHash, permissions: ['reports.view'] },
    { username: 'dormant', passwordHash, isActive: false },
  ]);
}

describe('basicHttpAuth', () => {
  it('passes a context that already has an active user', async () => {
    const hook = basicHttpAuth(await buildUsers());
    const context = { ...createAnonymousContext(), user: user() };
    assert.equal(await hook(context), context);
  });

  it('requires an authorization header', async () => {
    const hook = basicHttpAuth(await buildUsers());
    await assert.rejects(hook(createAnonymousContext()), { name: 'AuthError', message: 'Authentication required' });
  });

  it('rejects malformed headers', async () => {
    const hook = basicHttpAuth(await buildUsers());
    await assert.rejects(hook(withAuthorization('Basic')), {
      name: 'AuthError',
      message: 'Wrong HTTP_AUTHORIZATION header',
    });
    await assert.rejects(hook(withAuthorization(basic('no-colon'))), {
      name: 'AuthError',
      message: 'Wrong HTTP_AUTHORIZATION header',
    });
  });

  it('only accepts the basic scheme', async () => {
    const hook = basicHttpAuth(await buildUsers());
    await assert.rejects(hook(withAuthorization('Bearer abc')), {
      name: 'AuthError',
      message: 'We support only basic http auth',
    });
  });

  it('rejects wrong credentials and inactive users', async () => {
    const hook = basicHttpAuth(await buildUsers());
    await assert.rejects(hook(withAuthorization(basic('alice:wrong'))), { name: 'AuthError', message: 'Wrong user.' });
    await assert.rejects(hook(withAuthorization(basic('dormant:test-secret'))), {
      name: 'AuthError',
      message: 'Wrong user.',
    });
  });

  it('attaches the user and logs the session in', async () => {
    const hook = basicHttpAuth(await buildUsers());
    const session = new TokenSession();

    const context = await hook(withAuthorization(basic('alice:test-secret'), session));

    assert.equal(context.user?.username, 'alice');
    assert.deepEqual(context.user?.permissions, ['reports.view']);
    assert.equal(session.user?.username, 'alice');
    assert.equal(session.changed, true);
  });

  it('keeps colons after the first one in the password', async () => {
    const passwordHash = await hashPassword('a:b', Buffer.alloc(16, 2));
    const hook = basicHttpAuth(new InMemoryUserStore([{ username: 'colon', passwordHash }]));

    const context = await hook(withAuthorization(basic('colon:a:b')));
    assert.equal(context.user?.username, 'colon');
  });
});

describe('staffRequired', () => {
  it('rejects anonymous callers', () => {
    assert.throws(() => staffRequired(createAnonymousContext()), {
      name: 'AuthError',
      message: 'User not authenticated',
    });
  });

  it('rejects users who are not staff', () => {
    assert.throws(() => staffRequired({ ...createAnonymousContext(), user: user() }), {
      name: 'AuthError',
      message: 'User does not have permissions',
    });
  });

  it('accepts staff and superusers', () => {
    assert.doesNotThrow(() => staffRequired({ ...createAnonymousContext(), user: user({ isStaff: true }) }));
    assert.doesNotThrow(() => staffRequired({ ...createAnonymousContext(), user: user({ isSuperuser: true }) }));
  });
});

describe('permissionsRequired', () => {
  const hook = permissionsRequired('reports.view');

  it('rejects anonymous callers and users without the permission', () => {
    assert.throws(() => hook(createAnonymousContext()), { name: 'AuthError', message: 'User not authenticated' });
    assert.throws(() => hook({ ...createAnonymousContext(), user: user() }), {
      name: 'AuthError',
      message: 'User does not have permissions',
    });
  });

  it('accepts users holding the permission', () => {
    assert.doesNotThrow(() => hook({ ...createAnonymousContext(), user: user({ permissions: ['reports.view'] }) }));
  });
});

describe('hasPermission', () => {
  it('grants superusers everything and inactive users nothing', () => {
    assert.equal(hasPermission(user({ isSuperuser: true }), 'anything'), true);
    assert.equal(hasPermission(user({ permissions: ['a'] }), 'a'), true);
    assert.equal(hasPermission(user({ permissions: ['a'] }), 'b'), false);
    assert.equal(hasPermission(user({ isSuperuser: true, isActive: false }), 'anything'), false);
  });
});
