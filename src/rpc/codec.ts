export const JSON_INDENT = 4;

export interface JsonCodec {
  encode(value: unknown): string;
  decode(text: string): unknown;
}

/**
 * Converts a domain value (a decimal type, a model instance, ...) into
 * something JSON can represent. `test` sees the raw value, before `toJSON`.
 */
export interface ValueSerializer {
  test(value: unknown): boolean;
  serialize(value: unknown): unknown;
}

export interface JsonCodecOptions {
  indent?: number;
  serializers?: readonly ValueSerializer[];
}

export class UnserializableValueError extends TypeError {
  constructor(
    public readonly path: string,
    public readonly valueType: string,
  ) {
    super(`Value of type ${valueType} at "${path}" is not JSON serializable`);
    this.name = 'UnserializableValueError';
  }
}

function describeType(value: unknown): string {
  if (value instanceof Map) return 'Map';
  if (value instanceof Set) return 'Set';
  return typeof value;
}

export function createJsonCodec(options: JsonCodecOptions = {}): JsonCodec {
  const indent = options.indent ?? JSON_INDENT;
  const serializers = options.serializers ?? [];

  // JSON.stringify drops functions and symbols and flattens Map/Set to {},
  // so those are rejected here instead of losing data silently.
  function replacer(this: Record<string, unknown>, key: string, value: unknown): unknown {
    const original = this[key];
    for (const serializer of serializers) {
      if (serializer.test(original)) {
        return serializer.serialize(original);
      }
    }

    if (value === undefined) {
      return null;
    }

    if (
      typeof value === 'function' ||
      typeof value === 'symbol' ||
      typeof value === 'bigint' ||
      value instanceof Map ||
      value instanceof Set
    ) {
      throw new UnserializableValueError(key || '<root>', describeType(value));
    }

    return value;
  }

  return {
    encode(value: unknown): string {
      return JSON.stringify(value, replacer, indent);
    },
    decode(text: string): unknown {
      return JSON.parse(text);
    },
  };
}

export const defaultJsonCodec: JsonCodec = createJsonCodec();
