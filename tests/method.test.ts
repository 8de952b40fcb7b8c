import { test } from 'node:test';
import assert from 'node:assert/strict';
import { AppError } from '../src/lib/errors';
import { RpcMethod, defineRpcMethod, isRpcMethodDefinition } from '../src/rpc/method';

function ping() {
  return 'pong';
}

test('a bare handler takes its own name and default metadata', () => {
  const method = new RpcMethod(ping);

  assert.equal(method.name, 'ping');
  assert.equal(method.help, '');
  assert.deepEqual(method.args, []);
  assert.deepEqual(method.signature, ['object']);
  assert.equal(method.loginRequired, false);
  assert.equal(method.permission, undefined);
  assert.equal(method.handler, ping);
});

test('name and help resolve override, then attached, then default', () => {
  const definition = defineRpcMethod(ping, { name: 'attached.name', help: 'attached help' });

  const fromAttached = new RpcMethod(definition);
  assert.equal(fromAttached.name, 'attached.name');
  assert.equal(fromAttached.help, 'attached help');

  const fromOverride = new RpcMethod(definition, { name: 'override.name', help: 'override help' });
  assert.equal(fromOverride.name, 'override.name');
  assert.equal(fromOverride.help, 'override help');
});

function add(a: number, b: number) {
  return a + b;
}

test('a handler without declared params takes placeholder names from its arity', () => {
  const method = new RpcMethod(add);

  assert.equal(method.name, 'add');
  assert.deepEqual(method.args, ['arg0', 'arg1']);
  assert.deepEqual(method.signature, ['object', 'object', 'object']);
  assert.deepEqual(method.getParams(), [
    { name: 'arg0', rpctype: 'object' },
    { name: 'arg1', rpctype: 'object' },
  ]);
});

test('an override signature applies to a handler without declared params', () => {
  const method = new RpcMethod(add, { signature: ['int', 'int', 'int'] });
  assert.deepEqual(method.signature, ['int', 'int', 'int']);
});

test('params resolve override, then attached, then arity', () => {
  assert.deepEqual(new RpcMethod(add, { params: ['x', 'y'] }).args, ['x', 'y']);
  assert.deepEqual(new RpcMethod(defineRpcMethod(add, { params: ['left', 'right'] })).args, ['left', 'right']);
  assert.deepEqual(
    new RpcMethod(defineRpcMethod(add, { params: ['left', 'right'] }), { params: ['x', 'y'] }).args,
    ['x', 'y'],
  );
  assert.deepEqual(new RpcMethod(defineRpcMethod(add, { params: [] })).args, []);
});

test('default signature has one object slot per parameter plus the return', () => {
  const method = new RpcMethod(defineRpcMethod((a: number, b: number) => a + b, { name: 'add', params: ['a', 'b'] }));
  assert.deepEqual(method.signature, ['object', 'object', 'object']);
});

test('attached signature of the right length beats the override', () => {
  const definition = defineRpcMethod((a: number, b: number) => a + b, {
    name: 'add',
    params: ['a', 'b'],
    signature: ['int', 'int', 'int'],
  });

  const method = new RpcMethod(definition, { signature: ['double', 'double', 'double'] });
  assert.deepEqual(method.signature, ['int', 'int', 'int']);
});

test('signatures of the wrong length are discarded', () => {
  const definition = defineRpcMethod((a: string) => a, {
    name: 'shout',
    params: ['text'],
    signature: ['string'],
  });

  assert.deepEqual(new RpcMethod(definition, { signature: ['string', 'string'] }).signature, ['string', 'string']);
  assert.deepEqual(new RpcMethod(definition, { signature: ['string', 'string', 'int'] }).signature, [
    'object',
    'object',
  ]);
  assert.deepEqual(new RpcMethod(definition).signature, ['object', 'object']);
});

test('a permission implies login unless login is set explicitly', () => {
  const guarded = new RpcMethod(defineRpcMethod(ping, { permission: 'reports.view' }));
  assert.equal(guarded.loginRequired, true);
  assert.equal(guarded.permission, 'reports.view');

  const open = new RpcMethod(defineRpcMethod(ping, { permission: 'reports.view', loginRequired: false }));
  assert.equal(open.loginRequired, false);

  const loginOnly = new RpcMethod(defineRpcMethod(ping, { loginRequired: true }));
  assert.equal(loginOnly.loginRequired, true);
  assert.equal(loginOnly.permission, undefined);
});

test('getParams zips names with signature types and getReturnType reads slot zero', () => {
  const method = new RpcMethod(
    defineRpcMethod((name: string, count: number) => name.repeat(count), {
      name: 'text.repeat',
      params: ['name', 'count'],
      signature: ['string', 'string', 'int'],
    }),
  );

  assert.deepEqual(method.getParams(), [
    { name: 'name', rpctype: 'string' },
    { name: 'count', rpctype: 'int' },
  ]);
  assert.equal(method.getReturnType(), 'string');
  assert.deepEqual(method.describe(), {
    name: 'text.repeat',
    summary: '',
    params: [
      { name: 'name', rpctype: 'string' },
      { name: 'count', rpctype: 'int' },
    ],
    return: 'string',
  });
});

test('toStub renders an example request envelope', () => {
  const method = new RpcMethod(defineRpcMethod((a: number, b: number) => a + b, { name: 'math.add', params: ['a', 'b'] }));
  assert.equal(method.toStub(), '{\n"id": "jsonrpc",\n"method": "math.add",\n"params": [\n   "a","b"\n]\n}');
});

test('an anonymous handler without a name is rejected', () => {
  assert.throws(() => new RpcMethod(defineRpcMethod(() => 1)), AppError);
});

test('descriptors and their metadata are frozen', () => {
  const method = new RpcMethod(defineRpcMethod(ping, { params: [], signature: ['string'] }));
  assert.ok(Object.isFrozen(method));
  assert.ok(Object.isFrozen(method.signature));
  assert.ok(Object.isFrozen(method.args));
});

test('isRpcMethodDefinition tells definitions from handlers', () => {
  assert.equal(isRpcMethodDefinition(ping), false);
  assert.equal(isRpcMethodDefinition(defineRpcMethod(ping)), true);
});
