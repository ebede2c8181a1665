/** Values that pass through a tuple representation unchanged. */
export type Primitive = null | undefined | boolean | number | string;

/**
 * What a serializer hands back: opaque bytes, or an ordered tuple of
 * sub-values that are themselves serialized recursively.
 */
export type Representation = Uint8Array | readonly unknown[];

/** One slot of a serialized tuple. */
export type Encoded = Primitive | Uint8Array | SerializedObject;

export interface SerializedObject {
  tag: string;
  data: Uint8Array | Encoded[];
}

/**
 * Anything carrying a prototype can identify a type: classes, built-in
 * constructors such as `Map` or `BigInt`, and abstract ones like %TypedArray%.
 */
export interface TypeRef<T = unknown> {
  readonly name: string;
  readonly prototype: T;
}

/**
 * Serializer/deserializer pair for one registered type.
 *
 * The registry does not check that `deserialize` accepts every shape
 * `serialize` produces. Tuple elements reach `deserialize` already rebuilt.
 */
export interface TypeCodec<T = unknown, R extends Representation = Representation> {
  serialize(value: T): R;
  deserialize(data: R): T;
}

export interface RegistrationEntry {
  /** Undefined only for the fallback entry. */
  type: TypeRef | undefined;
  tag: string;
  codec: TypeCodec;
  /** True when the codec delegates to the context's fallback byte codec. */
  pickled: boolean;
}

export type DuplicateTagPolicy = 'overwrite' | 'warn' | 'error';

export type RegisterOptions<T, R extends Representation> =
  | { serializer: (value: T) => R; deserializer: (data: R) => T; pickle?: false }
  | { pickle: true };

export function isPrimitive(value: unknown): value is Primitive {
  return (
    value === null ||
    value === undefined ||
    typeof value === 'boolean' ||
    typeof value === 'number' ||
    typeof value === 'string'
  );
}

export function isSerializedObject(value: unknown): value is SerializedObject {
  if (typeof value !== 'object' || value === null) return false;
  if (!('tag' in value) || !('data' in value)) return false;
  return typeof value.tag === 'string' && (value.data instanceof Uint8Array || Array.isArray(value.data));
}
