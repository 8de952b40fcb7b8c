import {
  BadDataError,
  BadMethodError,
  isRpcError,
  toUnknownProcessingError,
  type RpcError,
} from '../lib/errors';
import { andThen, andThenAsync, err, ok, type Result } from '../lib/result';
import { componentLogger } from '../logging/logger';
import { JSON_INDENT, defaultJsonCodec, type JsonCodec } from './codec';
import { guardMethod } from './guard';
import type { RpcMethod } from './method';
import type { MethodRegistry } from './registry';
import {
  JsonRpcEnvelopeSchema,
  MethodNameSchema,
  ParamsSchema,
  createAnonymousContext,
  type EncodedError,
  type JsonRpcEnvelope,
  type JsonRpcFailure,
  type JsonRpcId,
  type JsonRpcRequest,
  type JsonRpcResponse,
  type RpcContext,
} from './types';

const logger = componentLogger('dispatcher');

type RoutedCall = {
  request: JsonRpcRequest;
  method: RpcMethod;
};

const ERROR_NAME = 'JSONRPCError';

export function toEncodedError(error: RpcError): EncodedError {
  return {
    name: ERROR_NAME,
    exception: error.kind,
    code: error.code,
    message: error.message,
  };
}

/** Sent when the codec cannot encode a response. Contains only primitives besides the id. */
export function encodeFailureEnvelope(id: JsonRpcId): JsonRpcFailure {
  return {
    id,
    result: null,
    error: {
      name: ERROR_NAME,
      exception: 'RpcException',
      code: 100,
      message: 'Failed to encode return value',
    },
  };
}

/**
 * JSON-RPC 1.0 dispatcher. Each call runs decode, validate, route, guard,
 * invoke and encode; every step returns a Result, and the first failure
 * becomes the error envelope. Nothing is kept between calls.
 */
export class JsonRpcDispatcher {
  constructor(
    private readonly registry: MethodRegistry,
    private readonly codec: JsonCodec = defaultJsonCodec,
  ) {}

  public async dispatch(
    rawBody: string | null | undefined,
    context: RpcContext = createAnonymousContext(),
  ): Promise<string> {
    const decoded = this.decode(rawBody);
    if (!decoded.ok) {
      return this.encodeError(decoded.error, '');
    }

    const envelope = decoded.value;
    const id: JsonRpcId = Object.hasOwn(envelope, 'id') ? envelope.id : '';

    const routed = andThen(this.validate(envelope, id), (request) => this.route(request));
    const outcome = await andThenAsync(routed, (call) => this.execute(call, context));

    return outcome.ok ? this.encodeResult(id, outcome.value) : this.encodeError(outcome.error, id);
  }

  public encodeResult(id: JsonRpcId, result: unknown): string {
    return this.encode({ id, result: result === undefined ? null : result, error: null });
  }

  public encodeError(error: RpcError, id: JsonRpcId = error.id ?? ''): string {
    return this.encode({ id, result: null, error: toEncodedError(error) });
  }

  private decode(rawBody: string | null | undefined): Result<JsonRpcEnvelope, RpcError> {
    if (!rawBody) {
      return err(new BadDataError('No POST data'));
    }

    let parsed: unknown;
    try {
      parsed = this.codec.decode(rawBody);
    } catch (error) {
      logger.debug({ err: error }, 'JSON-RPC body is not valid JSON');
      return err(new BadDataError('JSON decoding error'));
    }

    const envelope = JsonRpcEnvelopeSchema.safeParse(parsed);
    if (!envelope.success) {
      return err(new BadDataError('JSON does not contain dict as its root object'));
    }
    return ok(envelope.data);
  }

  private validate(envelope: JsonRpcEnvelope, id: JsonRpcId): Result<JsonRpcRequest, RpcError> {
    if (!Object.hasOwn(envelope, 'method') || !Object.hasOwn(envelope, 'params')) {
      return err(new BadDataError('JSON must contain attributes method and params', { id }));
    }

    const method = MethodNameSchema.safeParse(envelope.method);
    if (!method.success) {
      return err(new BadMethodError('JSON Wrong parameter method', { id }));
    }

    const params = ParamsSchema.safeParse(envelope.params);
    if (!params.success) {
      return err(new BadMethodError('JSON method params has to be Array', { id }));
    }

    return ok({ id, method: method.data, params: params.data });
  }

  private route(request: JsonRpcRequest): Result<RoutedCall, RpcError> {
    const method = this.registry.lookup(request.method);
    if (!method) {
      return err(
        new BadMethodError(`Called method ${request.method} does not exist in this api, see system.listMethods`, {
          id: request.id,
        }),
      );
    }
    return ok({ request, method });
  }

  private async execute(call: RoutedCall, context: RpcContext): Promise<Result<unknown, RpcError>> {
    const guarded = await guardMethod(call.method, context, call.request.id);
    return andThenAsync(guarded, (authorizedContext) => this.invoke(call, authorizedContext));
  }

  private async invoke({ request, method }: RoutedCall, context: RpcContext): Promise<Result<unknown, RpcError>> {
    if (request.params.length !== method.args.length) {
      const mismatch = new TypeError(
        `${method.name}() takes exactly ${method.args.length} arguments (${request.params.length} given)`,
      );
      logger.debug({ method: method.name, given: request.params.length }, 'JSON-RPC call with wrong argument count');
      return err(toUnknownProcessingError(mismatch, request.id));
    }

    try {
      const result: unknown = await Reflect.apply(method.handler, undefined, [...request.params, context]);
      return ok(result);
    } catch (error) {
      if (isRpcError(error)) {
        logger.debug({ err: error, method: method.name }, 'JSON-RPC method raised an RPC error');
        return err(error);
      }

      logger.error({ err: error, method: method.name }, 'Unhandled error during JSON-RPC call');
      return err(toUnknownProcessingError(error, request.id));
    }
  }

  private encode(envelope: JsonRpcResponse): string {
    try {
      return this.codec.encode(envelope);
    } catch (error) {
      logger.error({ err: error }, 'Failed to encode JSON-RPC response');
      return JSON.stringify(encodeFailureEnvelope(envelope.id), null, JSON_INDENT);
    }
  }
}
