import { AppError } from '../lib/errors';
import { componentLogger } from '../logging/logger';
import { RpcMethod } from './method';
import type { RegistrationOverrides, RpcHandler, RpcMethodDefinition, ServiceDescription } from './types';

const logger = componentLogger('registry');

export interface DescribeOptions {
  serviceType: string;
  serviceUrl: string;
}

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export class MethodRegistry {
  private readonly methods = new Map<string, RpcMethod>();
  private sealed = false;

  /**
   * Adds a method unless its name is taken. The first registration for a
   * name wins; later ones are ignored without error.
   *
   * @returns false when the name was already registered
   */
  register(method: RpcMethod): boolean {
    this.assertOpen(method.name);
    if (this.methods.has(method.name)) {
      logger.debug({ method: method.name }, 'Ignoring duplicate RPC method registration');
      return false;
    }
    this.methods.set(method.name, method);
    return true;
  }

  /** Builds the descriptor and registers it; returns the method now in effect for that name. */
  add(source: RpcHandler | RpcMethodDefinition, overrides: RegistrationOverrides = {}): RpcMethod {
    const method = new RpcMethod(source, overrides);
    this.register(method);
    return this.methods.get(method.name) ?? method;
  }

  lookup(name: string): RpcMethod | undefined {
    return this.methods.get(name);
  }

  has(name: string): boolean {
    return this.methods.has(name);
  }

  get size(): number {
    return this.methods.size;
  }

  listMethods(): RpcMethod[] {
    return Array.from(this.methods.values()).sort((a, b) => compareNames(a.name, b.name));
  }

  listMethodNames(): string[] {
    return this.listMethods().map((method) => method.name);
  }

  /** Methods are listed in registration order, unlike {@link listMethods}. */
  describe(options: DescribeOptions): ServiceDescription {
    return {
      serviceType: options.serviceType,
      serviceURL: options.serviceUrl,
      methods: Array.from(this.methods.values()).map((method) => method.describe()),
    };
  }

  /** Freezes the method set once start-up registration is done. */
  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  private assertOpen(name: string) {
    if (this.sealed) {
      throw new AppError(`Cannot register RPC method ${name}: registry is sealed`, {
        code: 'registry_sealed',
      });
    }
  }
}
