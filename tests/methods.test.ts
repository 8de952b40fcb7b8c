import { test } from 'node:test';
import assert from 'node:assert/strict';
import { InMemoryUserStore } from '../src/auth/user-store';
import { createHostMethods } from '../src/methods';
import { addMethod, echoMethod } from '../src/methods/math';
import { createRpcServer } from '../src/rpc';

const server = createRpcServer({ restrictIntrospection: true, methods: [addMethod, echoMethod] });

async function call(method: string, params: unknown[]): Promise<unknown> {
  return JSON.parse(await server.dispatch(JSON.stringify({ id: 'm', method, params })));
}

test('math.add sums two numbers', async () => {
  assert.deepEqual(await call('math.add', [1.5, 2]), { id: 'm', result: 3.5, error: null });
});

test('math.add rejects operands that are not numbers', async () => {
  assert.deepEqual(await call('math.add', [1, '2']), {
    id: 'm',
    result: null,
    error: {
      name: 'JSONRPCError',
      exception: 'BadParamsException',
      code: 201,
      message: 'Parameter b must be a finite number',
    },
  });
});

test('echo returns structured values unchanged', async () => {
  const value = { list: [1, 'two', null], nested: { flag: true } };
  assert.deepEqual(await call('echo', [value]), { id: 'm', result: value, error: null });
});

test('host methods are registered in a fixed order', () => {
  const names = createHostMethods(new InMemoryUserStore()).map((definition) => definition.options.name);
  assert.deepEqual(names, ['math.add', 'echo', 'account.whoami', 'admin.serverTime']);
});
