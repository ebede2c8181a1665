import { ByteCodec } from '../codec/types.js';
import { msgpackCodec } from '../codec/msgpack.js';
import { LogSink, noopSink, RegistryLogEntry } from '../logging/jsonl.js';
import {
  CodecDirection,
  CodecFailureError,
  DepthExceededError,
  DuplicateTagError,
  ReservedTagError,
  SerializationError,
  UnregisteredTagError
} from './errors.js';
import {
  DuplicateTagPolicy,
  Encoded,
  isPrimitive,
  isSerializedObject,
  RegisterOptions,
  RegistrationEntry,
  Representation,
  SerializedObject,
  TypeCodec,
  TypeRef
} from './types.js';

export const FALLBACK_TAG = '__fallback__';
export const DEFAULT_MAX_DEPTH = 100;

export interface ContextOptions {
  name?: string;
  /** Byte codec behind the catch-all entry and every `pickle: true` type. */
  fallback?: ByteCodec;
  duplicateTags?: DuplicateTagPolicy;
  maxDepth?: number;
  log?: LogSink;
}

/**
 * Registry mapping runtime types to tagged codecs.
 *
 * Dispatch looks up the value's prototype chain nearest-first and falls back
 * to the catch-all entry when no ancestor is registered. Prototype chains are
 * linear, so two registered ancestors never sit at the same distance.
 *
 * Cyclic values are not supported; they fail with `DepthExceeded`.
 */
export class SerializationContext {
  readonly name: string;
  readonly fallback: ByteCodec;
  readonly duplicateTags: DuplicateTagPolicy;
  readonly maxDepth: number;

  private readonly log: LogSink;
  private readonly fallbackEntry: RegistrationEntry;
  private readonly byPrototype = new Map<object, RegistrationEntry>();
  private readonly byTag = new Map<string, RegistrationEntry>();
  // prototype of a dispatched value -> resolved entry; cleared on every registration
  private readonly resolved = new Map<object, RegistrationEntry>();

  constructor(options: ContextOptions = {}) {
    this.name = options.name ?? 'context';
    this.fallback = options.fallback ?? msgpackCodec;
    this.duplicateTags = options.duplicateTags ?? 'warn';
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.log = options.log ?? noopSink;
    this.fallbackEntry = { type: undefined, tag: FALLBACK_TAG, codec: pickleCodec(this.fallback), pickled: true };
  }

  /**
   * Bind `type` to `tag`. Re-registering the same type replaces its codec;
   * an identical registration is a no-op.
   */
  register<T, R extends Representation>(
    type: TypeRef<T>,
    tag: string,
    serializer: (value: T) => R,
    deserializer: (data: R) => T
  ): void {
    this.bind(type, tag, { serialize: serializer, deserialize: deserializer }, false);
  }

  registerType<T, R extends Representation>(type: TypeRef<T>, tag: string, options: RegisterOptions<T, R>): void {
    if (options.pickle === true) {
      this.bind(type, tag, pickleCodec(this.fallback, type), true);
    } else {
      this.register(type, tag, options.serializer, options.deserializer);
    }
  }

  /**
   * Independent copy of this registry. Codec functions are shared; entries
   * and lookup tables are not. Pickled entries use the clone's fallback.
   */
  clone(overrides: ContextOptions = {}): SerializationContext {
    const copy = new SerializationContext({
      name: overrides.name ?? `${this.name}:clone`,
      fallback: overrides.fallback ?? this.fallback,
      duplicateTags: overrides.duplicateTags ?? this.duplicateTags,
      maxDepth: overrides.maxDepth ?? this.maxDepth,
      log: overrides.log ?? this.log
    });
    for (const entry of this.byTag.values()) {
      const codec = entry.pickled ? pickleCodec(copy.fallback, entry.type) : entry.codec;
      const own: RegistrationEntry = { ...entry, codec };
      copy.byTag.set(own.tag, own);
      if (own.type) copy.byPrototype.set(prototypeKey(own.type), own);
    }
    this.emit({ event: 'context_cloned', context: copy.name, parent: this.name });
    return copy;
  }

  has(tag: string): boolean {
    return this.byTag.has(tag);
  }

  /** Registered tags, in registration order. */
  tags(): string[] {
    return Array.from(this.byTag.keys());
  }

  typeForTag(tag: string): TypeRef | undefined {
    return this.byTag.get(tag)?.type;
  }

  resolve(value: unknown): RegistrationEntry {
    if (value === null || value === undefined) return this.fallbackEntry;
    const start: object | null = Object.getPrototypeOf(Object(value));
    if (start === null) return this.fallbackEntry;

    const cached = this.resolved.get(start);
    if (cached) return cached;

    let entry = this.fallbackEntry;
    for (let proto: object | null = start; proto !== null; proto = Object.getPrototypeOf(proto)) {
      const found = this.byPrototype.get(proto);
      if (found) {
        entry = found;
        break;
      }
    }
    this.resolved.set(start, entry);
    return entry;
  }

  serialize(value: unknown): SerializedObject {
    return this.serializeAt(value, 0);
  }

  deserialize(tag: string, data: Uint8Array | readonly Encoded[]): unknown {
    return this.deserializeAt(tag, data, 0);
  }

  private serializeAt(value: unknown, depth: number): SerializedObject {
    if (depth > this.maxDepth) throw new DepthExceededError(this.maxDepth);
    const entry = this.resolve(value);

    let representation: Representation;
    try {
      representation = entry.codec.serialize(value);
    } catch (err) {
      throw this.failure(entry, typeNameOf(value), 'serialize', err);
    }

    if (representation instanceof Uint8Array) {
      return { tag: entry.tag, data: representation };
    }
    if (!Array.isArray(representation)) {
      const err = new TypeError('serializer returned neither bytes nor a tuple');
      throw this.failure(entry, typeNameOf(value), 'serialize', err);
    }
    return {
      tag: entry.tag,
      data: representation.map((item) => this.encodeItem(item, depth + 1))
    };
  }

  private encodeItem(item: unknown, depth: number): Encoded {
    if (isPrimitive(item) || item instanceof Uint8Array) return item;
    return this.serializeAt(item, depth);
  }

  private deserializeAt(tag: string, data: Uint8Array | readonly Encoded[], depth: number): unknown {
    if (depth > this.maxDepth) throw new DepthExceededError(this.maxDepth);
    const entry = tag === FALLBACK_TAG ? this.fallbackEntry : this.byTag.get(tag);
    if (!entry) throw new UnregisteredTagError(tag);

    const input: Representation =
      data instanceof Uint8Array ? data : data.map((item) => (isSerializedObject(item) ? this.deserializeAt(item.tag, item.data, depth + 1) : item));

    try {
      return entry.codec.deserialize(input);
    } catch (err) {
      throw this.failure(entry, entry.type?.name ?? 'unregistered type', 'deserialize', err);
    }
  }

  private bind(type: TypeRef, tag: string, codec: TypeCodec, pickled: boolean): void {
    if (tag === FALLBACK_TAG) throw new ReservedTagError(tag);
    const key = prototypeKey(type);
    const existing = this.byPrototype.get(key);

    if (existing && existing.tag === tag && sameCodec(existing, codec, pickled)) return;

    const holder = this.byTag.get(tag);
    if (holder && holder !== existing) {
      const previousType = holder.type?.name ?? 'unknown';
      if (this.duplicateTags === 'error') {
        throw new DuplicateTagError(tag, previousType, type.name);
      }
      if (this.duplicateTags === 'warn') {
        console.warn(`[Registry] ${this.name}: tag "${tag}" rebound from ${previousType} to ${type.name}`);
      }
      this.emit({ event: 'tag_conflict', tag, type: type.name, previousType });
      if (holder.type) this.byPrototype.delete(prototypeKey(holder.type));
    }
    if (existing && existing.tag !== tag) this.byTag.delete(existing.tag);

    const entry: RegistrationEntry = { type, tag, codec, pickled };
    this.byPrototype.set(key, entry);
    this.byTag.set(tag, entry);
    this.resolved.clear();
    this.emit({ event: existing ? 'type_replaced' : 'type_registered', tag, type: type.name });
  }

  private failure(entry: RegistrationEntry, typeName: string, direction: CodecDirection, err: unknown): SerializationError {
    // Errors raised by nested dispatch already name the innermost codec.
    if (err instanceof SerializationError) return err;
    const failure = new CodecFailureError(entry.tag, typeName, direction, err);
    this.emit({ event: 'codec_failure', tag: entry.tag, type: typeName, direction, error: failure.message });
    return failure;
  }

  private emit(fields: Omit<RegistryLogEntry, 'ts' | 'context'> & { context?: string }): void {
    this.log({ ts: new Date().toISOString(), context: this.name, ...fields });
  }
}

export function serialize(context: SerializationContext, value: unknown): SerializedObject {
  return context.serialize(value);
}

export function deserialize(context: SerializationContext, tag: string, data: Uint8Array | readonly Encoded[]): unknown {
  return context.deserialize(tag, data);
}

export function typeNameOf(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value !== 'object' && typeof value !== 'function') return typeof value;
  const proto: unknown = Object.getPrototypeOf(value);
  if (typeof proto !== 'object' || proto === null || !('constructor' in proto)) return 'Object';
  const ctor = proto.constructor;
  return typeof ctor === 'function' && ctor.name ? ctor.name : 'Object';
}

function prototypeKey(type: TypeRef): object {
  const proto = type.prototype;
  if (typeof proto === 'function') return proto;
  if (typeof proto !== 'object' || proto === null) {
    throw new TypeError(`Cannot register ${type.name || 'anonymous type'}: it has no prototype`);
  }
  return proto;
}

function sameCodec(entry: RegistrationEntry, codec: TypeCodec, pickled: boolean): boolean {
  if (entry.pickled || pickled) return entry.pickled === pickled;
  return entry.codec.serialize === codec.serialize && entry.codec.deserialize === codec.deserialize;
}

/**
 * Whole-value codec over `bytes`. With a registered `type`, a decoded object
 * that lost its class (a plain record from msgpack or JSON) gets the type's
 * prototype back; its own fields are copied over, no constructor runs.
 */
function pickleCodec(bytes: ByteCodec, type?: TypeRef): TypeCodec {
  return {
    serialize: (value) => bytes.encode(value),
    deserialize: (data) => {
      if (!(data instanceof Uint8Array)) {
        throw new TypeError(`${bytes.name} fallback expects bytes, got a tuple`);
      }
      const decoded = bytes.decode(data);
      return type ? restorePrototype(type, decoded) : decoded;
    }
  };
}

function restorePrototype(type: TypeRef, decoded: unknown): unknown {
  if (typeof decoded !== 'object' || decoded === null) return decoded;
  const proto = prototypeKey(type);
  if (proto.isPrototypeOf(decoded)) return decoded;
  const restored: object = Object.create(proto);
  return Object.assign(restored, decoded);
}
