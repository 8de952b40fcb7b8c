import { AppError } from '../lib/errors';
import { componentLogger } from '../logging/logger';
import type {
  AuthenticationHook,
  AuthorizationHook,
  MethodDescription,
  MethodSignature,
  ParamDescriptor,
  RegistrationOverrides,
  RpcHandler,
  RpcMethodDefinition,
  RpcMethodOptions,
  TypeTag,
} from './types';

const logger = componentLogger('registry');

const DEFAULT_TYPE: TypeTag = 'object';

/**
 * Attaches RPC metadata to a handler. The result is what hosts hand to
 * {@link MethodRegistry.add}.
 *
 * @example
 * defineRpcMethod((a: number, b: number) => a + b, {
 *   name: 'math.add',
 *   params: ['a', 'b'],
 *   signature: ['int', 'int', 'int'],
 * });
 */
export function defineRpcMethod(handler: RpcHandler, options: RpcMethodOptions = {}): RpcMethodDefinition {
  return Object.freeze({ handler, options: Object.freeze({ ...options }) });
}

function placeholderParams(handler: RpcHandler): string[] {
  return Array.from({ length: handler.length }, (_, index) => `arg${index}`);
}

export function isRpcMethodDefinition(value: RpcHandler | RpcMethodDefinition): value is RpcMethodDefinition {
  return typeof value !== 'function';
}

/**
 * Registry entry for one callable method. Built once at registration and
 * never modified afterwards.
 */
export class RpcMethod {
  public readonly name: string;
  public readonly handler: RpcHandler;
  public readonly args: readonly string[];
  public readonly signature: MethodSignature;
  public readonly help: string;
  public readonly loginRequired: boolean;
  public readonly permission?: string;
  public readonly authentication?: AuthenticationHook;
  public readonly authorization?: AuthorizationHook;

  constructor(source: RpcHandler | RpcMethodDefinition, overrides: RegistrationOverrides = {}) {
    const definition = isRpcMethodDefinition(source) ? source : defineRpcMethod(source);
    const attached = definition.options;

    this.handler = definition.handler;
    this.name = overrides.name ?? attached.name ?? definition.handler.name;
    if (this.name.length === 0) {
      throw new AppError('RPC method has no name; pass one in its options', { code: 'invalid_rpc_method' });
    }

    this.help = overrides.help ?? attached.help ?? '';
    this.args = Object.freeze([...(overrides.params ?? attached.params ?? placeholderParams(definition.handler))]);
    this.signature = Object.freeze([...this.resolveSignature(attached.signature, overrides.signature)]);

    this.permission = attached.permission;
    this.loginRequired = attached.loginRequired ?? attached.permission !== undefined;
    this.authentication = attached.authentication;
    this.authorization = attached.authorization;

    Object.freeze(this);
  }

  private resolveSignature(
    attached: readonly TypeTag[] | undefined,
    override: readonly TypeTag[] | undefined,
  ): readonly TypeTag[] {
    const expectedLength = this.args.length + 1;
    let chosen: readonly TypeTag[] | undefined;

    // Attached metadata takes precedence over the registration override.
    for (const candidate of [attached, override]) {
      if (!candidate) continue;
      if (candidate.length !== expectedLength) {
        logger.warn(
          { method: this.name, signature: candidate, expectedLength },
          'Ignoring RPC signature with wrong length',
        );
        continue;
      }
      chosen ??= candidate;
    }

    return chosen ?? [DEFAULT_TYPE, ...this.args.map(() => DEFAULT_TYPE)];
  }

  getParams(): ParamDescriptor[] {
    return this.args.map((name, index) => ({
      name,
      rpctype: this.signature[index + 1] ?? DEFAULT_TYPE,
    }));
  }

  getReturnType(): TypeTag {
    return this.signature[0] ?? DEFAULT_TYPE;
  }

  describe(): MethodDescription {
    return {
      name: this.name,
      summary: this.help,
      params: this.getParams(),
      return: this.getReturnType(),
    };
  }

  /** Example request envelope shown in the method summary. */
  toStub(): string {
    const params = this.args.map((arg) => JSON.stringify(arg)).join(',');
    return ['{', '"id": "jsonrpc",', `"method": ${JSON.stringify(this.name)},`, '"params": [', `   ${params}`, ']', '}'].join(
      '\n',
    );
  }
}
