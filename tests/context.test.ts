/**
 * SerializationContext: registration, dispatch, cloning and error paths
 */

import { strict as assert } from 'assert';
import { describe, it, mock } from 'node:test';
import { jsonCodec } from '../src/codec/json.js';
import type { RegistryLogEntry } from '../src/logging/jsonl.js';
import type { ContextOptions } from '../src/serialization/context.js';
import { deserialize, FALLBACK_TAG, serialize, SerializationContext } from '../src/serialization/context.js';
import {
  CodecFailureError,
  DepthExceededError,
  DuplicateTagError,
  ReservedTagError,
  UnregisteredTagError
} from '../src/serialization/errors.js';

class Shape {
  sides: number;
  constructor(sides: number) {
    this.sides = sides;
  }
}

class Square extends Shape {
  size: number;
  constructor(size: number) {
    super(4);
    this.size = size;
  }
}

class Tile extends Square {}

class Point {
  x: number;
  y: number;
  constructor(x: number, y: number) {
    this.x = x;
    this.y = y;
  }
}

class OrderedMapping {
  readonly keys: string[] = [];
  readonly values: unknown[] = [];

  set(key: string, value: unknown): this {
    this.keys.push(key);
    this.values.push(value);
    return this;
  }
}

const serializeShape = (s: Shape): [number] => [s.sides];
const deserializeShape = ([sides]: [number]) => new Shape(sides);
const serializeSquare = (s: Square): [number] => [s.size];
const deserializeSquare = ([size]: [number]) => new Square(size);
const serializePoint = (p: Point): [number, number] => [p.x, p.y];
const deserializePoint = ([x, y]: [number, number]) => new Point(x, y);

function recordingContext(options: ContextOptions = {}) {
  const events: RegistryLogEntry[] = [];
  const context = new SerializationContext({ name: 'test', log: (e) => events.push(e), ...options });
  return { context, events };
}

describe('dispatch', () => {
  it('uses the exact registration for a registered type', () => {
    const context = new SerializationContext();
    context.register(Shape, 'Shape', serializeShape, deserializeShape);
    assert.deepEqual(context.serialize(new Shape(3)), { tag: 'Shape', data: [3] });
  });

  it('walks to a registered ancestor for an unregistered subclass', () => {
    const context = new SerializationContext();
    context.register(Shape, 'Shape', serializeShape, deserializeShape);
    assert.deepEqual(context.serialize(new Square(2)), { tag: 'Shape', data: [4] });
  });

  it('prefers the nearest ancestor regardless of registration order', () => {
    const context = new SerializationContext();
    context.register(Square, 'Square', serializeSquare, deserializeSquare);
    context.register(Shape, 'Shape', serializeShape, deserializeShape);
    assert.equal(context.resolve(new Tile(5)).tag, 'Square');
    assert.equal(context.resolve(new Shape(3)).tag, 'Shape');
  });

  it('picks up registrations made after a cached lookup', () => {
    const context = new SerializationContext();
    context.register(Shape, 'Shape', serializeShape, deserializeShape);
    assert.equal(context.resolve(new Square(1)).tag, 'Shape');
    context.register(Square, 'Square', serializeSquare, deserializeSquare);
    assert.equal(context.resolve(new Square(1)).tag, 'Square');
  });

  it('falls back for unrelated and null-prototype values', () => {
    const context = new SerializationContext();
    context.register(Shape, 'Shape', serializeShape, deserializeShape);
    const bare: Record<string, number> = Object.create(null);
    bare.x = 1;
    assert.equal(context.resolve(new Point(1, 2)).tag, FALLBACK_TAG);
    assert.equal(context.resolve(bare).tag, FALLBACK_TAG);
    assert.equal(context.resolve(null).tag, FALLBACK_TAG);
    assert.equal(context.resolve(undefined).tag, FALLBACK_TAG);
  });

  it('round-trips unregistered values through the fallback codec', () => {
    const context = new SerializationContext();
    const value = { a: 1, b: [1, 2], c: 'three' };
    const serialized = context.serialize(value);
    assert.equal(serialized.tag, FALLBACK_TAG);
    assert.ok(serialized.data instanceof Uint8Array);
    assert.deepEqual(context.deserialize(serialized.tag, serialized.data), value);
  });

  it('round-trips top-level primitives', () => {
    const context = new SerializationContext();
    for (const value of [42, 'hello', true, null]) {
      const { tag, data } = serialize(context, value);
      assert.equal(tag, FALLBACK_TAG);
      assert.equal(deserialize(context, tag, data), value);
    }
  });
});

describe('tuple representations', () => {
  it('keeps insertion order through an ordered mapping codec', () => {
    const context = new SerializationContext();
    context.register(
      OrderedMapping,
      'OrderedMapping',
      (m): [string[], unknown[]] => [m.keys, m.values],
      ([keys, values]) => {
        const m = new OrderedMapping();
        keys.forEach((key, i) => m.set(key, values[i]));
        return m;
      }
    );

    const serialized = context.serialize(new OrderedMapping().set('a', 1).set('b', 2));
    assert.equal(serialized.tag, 'OrderedMapping');
    assert.ok(Array.isArray(serialized.data));
    assert.equal(serialized.data.length, 2);

    const restored = context.deserialize(serialized.tag, serialized.data);
    assert.ok(restored instanceof OrderedMapping);
    assert.deepEqual(restored.keys, ['a', 'b']);
    assert.deepEqual(restored.values, [1, 2]);
  });

  it('passes primitives and bytes through and nests objects', () => {
    const context = new SerializationContext();
    context.register(Point, 'Point', serializePoint, deserializePoint);
    const bytes = new Uint8Array([1, 2, 3]);
    context.register(
      Shape,
      'Shape',
      (s): [number, string, null, Uint8Array, Point] => [s.sides, 'label', null, bytes, new Point(7, 8)],
      ([sides]) => new Shape(sides)
    );

    assert.deepEqual(context.serialize(new Shape(6)), {
      tag: 'Shape',
      data: [6, 'label', null, bytes, { tag: 'Point', data: [7, 8] }]
    });
  });

  it('rebuilds nested elements before calling the deserializer', () => {
    const context = new SerializationContext();
    context.register(Point, 'Point', serializePoint, deserializePoint);
    const seen: unknown[] = [];
    context.register(
      Shape,
      'Shape',
      (s): [number, Point] => [s.sides, new Point(1, 2)],
      (data) => {
        seen.push(data[1]);
        return new Shape(data[0]);
      }
    );

    const { tag, data } = context.serialize(new Shape(5));
    const restored = context.deserialize(tag, data);
    assert.ok(restored instanceof Shape);
    assert.equal(restored.sides, 5);
    assert.ok(seen[0] instanceof Point);
    assert.deepEqual(seen[0], new Point(1, 2));
  });
});

describe('registration', () => {
  it('treats an identical registration as a no-op', () => {
    const { context, events } = recordingContext();
    context.register(Shape, 'Shape', serializeShape, deserializeShape);
    context.register(Shape, 'Shape', serializeShape, deserializeShape);
    assert.deepEqual(context.tags(), ['Shape']);
    assert.deepEqual(events.map((e) => e.event), ['type_registered']);
    assert.deepEqual(context.serialize(new Shape(3)), { tag: 'Shape', data: [3] });
  });

  it('replaces the codec when a type is registered again under the same tag', () => {
    const { context, events } = recordingContext();
    context.register(Shape, 'Shape', serializeShape, deserializeShape);
    context.register(Shape, 'Shape', (s): [number, number] => [s.sides, s.sides * 2], ([sides]) => new Shape(sides));
    assert.deepEqual(context.serialize(new Shape(3)), { tag: 'Shape', data: [3, 6] });
    assert.deepEqual(events.map((e) => e.event), ['type_registered', 'type_replaced']);
  });

  it('unbinds the old tag when a type moves to a new tag', () => {
    const context = new SerializationContext();
    context.register(Shape, 'Shape', serializeShape, deserializeShape);
    context.register(Shape, 'Polygon', serializeShape, deserializeShape);
    assert.equal(context.has('Shape'), false);
    assert.deepEqual(context.tags(), ['Polygon']);
    assert.equal(context.resolve(new Shape(3)).tag, 'Polygon');
  });

  it('rejects the reserved fallback tag', () => {
    const context = new SerializationContext();
    assert.throws(
      () => context.register(Shape, FALLBACK_TAG, serializeShape, deserializeShape),
      (err: unknown) => err instanceof ReservedTagError && err.code === 'ReservedTag'
    );
  });

  it('rejects a type without a prototype', () => {
    const context = new SerializationContext();
    const arrow = { name: 'arrow', prototype: undefined };
    assert.throws(
      () => context.register(arrow, 'arrow', () => [], () => undefined),
      { name: 'TypeError', message: 'Cannot register arrow: it has no prototype' }
    );
  });

  it('binds a type to the fallback codec with pickle: true', () => {
    const context = new SerializationContext();
    context.registerType(Point, 'Point', { pickle: true });
    const serialized = context.serialize(new Point(1, 2));
    assert.equal(serialized.tag, 'Point');
    assert.ok(serialized.data instanceof Uint8Array);
    const restored = context.deserialize(serialized.tag, serialized.data);
    assert.ok(restored instanceof Point);
    assert.deepEqual(restored, new Point(1, 2));
  });

  it('restores the registered class when the fallback is JSON', () => {
    const context = new SerializationContext({ fallback: jsonCodec });
    context.registerType(Point, 'Point', { pickle: true });
    const { tag, data } = context.serialize(new Point(3, 4));
    const restored = context.deserialize(tag, data);
    assert.ok(restored instanceof Point);
    assert.equal(restored.x, 3);
    assert.equal(restored.y, 4);
  });

  it('keeps the class of pickled entries in a clone', () => {
    const base = new SerializationContext();
    base.registerType(Point, 'Point', { pickle: true });
    const copy = base.clone({ fallback: jsonCodec });
    const { tag, data } = copy.serialize(new Point(5, 6));
    assert.ok(data instanceof Uint8Array);
    assert.equal(Buffer.from(data).toString('utf8'), '{"x":5,"y":6}');
    assert.deepEqual(copy.deserialize(tag, data), new Point(5, 6));
  });

  it('returns unregistered class instances from the fallback as plain objects', () => {
    const context = new SerializationContext();
    const { tag, data } = context.serialize(new Point(1, 2));
    assert.equal(tag, FALLBACK_TAG);
    const restored = context.deserialize(tag, data);
    assert.ok(!(restored instanceof Point));
    assert.deepEqual(restored, { x: 1, y: 2 });
  });
});

describe('duplicate tags', () => {
  it('throws and leaves the context untouched under the error policy', () => {
    const { context } = recordingContext({ duplicateTags: 'error' });
    context.register(Shape, 'Thing', serializeShape, deserializeShape);
    assert.throws(
      () => context.register(Point, 'Thing', serializePoint, deserializePoint),
      (err: unknown) =>
        err instanceof DuplicateTagError &&
        err.code === 'DuplicateTagConflict' &&
        err.message === 'Tag "Thing" is already bound to Shape, cannot bind it to Point'
    );
    assert.equal(context.typeForTag('Thing'), Shape);
    assert.equal(context.resolve(new Shape(3)).tag, 'Thing');
  });

  it('rebinds silently under the overwrite policy', () => {
    const { context, events } = recordingContext({ duplicateTags: 'overwrite' });
    const warn = mock.method(console, 'warn', () => {});
    try {
      context.register(Shape, 'Thing', serializeShape, deserializeShape);
      context.register(Point, 'Thing', serializePoint, deserializePoint);
      assert.equal(warn.mock.callCount(), 0);
    } finally {
      warn.mock.restore();
    }
    assert.equal(context.typeForTag('Thing'), Point);
    assert.equal(context.resolve(new Shape(3)).tag, FALLBACK_TAG);
    const conflict = events.find((e) => e.event === 'tag_conflict');
    assert.equal(conflict?.previousType, 'Shape');
    assert.equal(conflict?.type, 'Point');
  });

  it('rebinds with a console warning under the warn policy', () => {
    const { context } = recordingContext({ duplicateTags: 'warn' });
    const warn = mock.method(console, 'warn', () => {});
    try {
      context.register(Shape, 'Thing', serializeShape, deserializeShape);
      context.register(Point, 'Thing', serializePoint, deserializePoint);
      assert.equal(warn.mock.callCount(), 1);
      assert.deepEqual(warn.mock.calls[0].arguments, ['[Registry] test: tag "Thing" rebound from Shape to Point']);
    } finally {
      warn.mock.restore();
    }
    assert.equal(context.typeForTag('Thing'), Point);
  });
});

describe('clone', () => {
  it('isolates registrations made on the clone', () => {
    const base = new SerializationContext({ name: 'base' });
    base.register(Shape, 'Shape', serializeShape, deserializeShape);
    const copy = base.clone();

    copy.register(Point, 'Point', serializePoint, deserializePoint);
    assert.equal(copy.resolve(new Point(1, 2)).tag, 'Point');
    assert.equal(base.resolve(new Point(1, 2)).tag, FALLBACK_TAG);
    assert.equal(base.has('Point'), false);
  });

  it('isolates registrations made on the original', () => {
    const base = new SerializationContext();
    base.register(Shape, 'Shape', serializeShape, deserializeShape);
    const copy = base.clone();

    base.register(Square, 'Square', serializeSquare, deserializeSquare);
    assert.equal(base.resolve(new Square(1)).tag, 'Square');
    assert.equal(copy.resolve(new Square(1)).tag, 'Shape');
  });

  it('lets a clone override a codec without touching the original', () => {
    const base = new SerializationContext();
    base.register(Shape, 'Shape', serializeShape, deserializeShape);
    const copy = base.clone();
    copy.registerType(Shape, 'Shape', { pickle: true });

    assert.ok(copy.serialize(new Shape(3)).data instanceof Uint8Array);
    assert.deepEqual(base.serialize(new Shape(3)), { tag: 'Shape', data: [3] });
  });

  it('keeps two clones of one base independent', () => {
    const base = new SerializationContext();
    const left = base.clone({ name: 'left' });
    const right = base.clone({ name: 'right' });
    left.register(Point, 'Point', serializePoint, deserializePoint);
    assert.equal(right.has('Point'), false);
    assert.equal(left.name, 'left');
  });

  it('inherits settings and logs the clone', () => {
    const { context, events } = recordingContext({ duplicateTags: 'error', maxDepth: 7 });
    const copy = context.clone();
    assert.equal(copy.name, 'test:clone');
    assert.equal(copy.duplicateTags, 'error');
    assert.equal(copy.maxDepth, 7);
    assert.deepEqual(
      events.map((e) => [e.event, e.context, e.parent]),
      [['context_cloned', 'test:clone', 'test']]
    );
  });
});

describe('errors', () => {
  it('fails on a tag the context never registered', () => {
    const context = new SerializationContext();
    assert.throws(
      () => context.deserialize('Nope', []),
      (err: unknown) => err instanceof UnregisteredTagError && err.tag === 'Nope' && err.code === 'UnregisteredTag'
    );
  });

  it('fails when output from one context meets an incompatible one', () => {
    const writer = new SerializationContext();
    writer.register(Point, 'Point', serializePoint, deserializePoint);
    const { tag, data } = writer.serialize(new Point(1, 2));
    const reader = new SerializationContext();
    assert.throws(() => reader.deserialize(tag, data), UnregisteredTagError);
  });

  it('wraps serializer failures with tag, type and direction', () => {
    const { context, events } = recordingContext();
    const boom = new Error('boom');
    context.register(Shape, 'Shape', (): [number] => { throw boom; }, deserializeShape);

    assert.throws(
      () => context.serialize(new Square(1)),
      (err: unknown) =>
        err instanceof CodecFailureError &&
        err.tag === 'Shape' &&
        err.typeName === 'Square' &&
        err.direction === 'serialize' &&
        err.cause === boom &&
        err.message === 'Failed to serialize Square with codec "Shape": boom'
    );
    assert.equal(events.at(-1)?.event, 'codec_failure');
  });

  it('wraps deserializer failures', () => {
    const context = new SerializationContext();
    context.register(Point, 'Point', serializePoint, () => { throw new Error('bad point'); });
    const { tag, data } = context.serialize(new Point(1, 2));
    assert.throws(
      () => context.deserialize(tag, data),
      (err: unknown) =>
        err instanceof CodecFailureError &&
        err.direction === 'deserialize' &&
        err.message === 'Failed to deserialize Point with codec "Point": bad point'
    );
  });

  it('reports the innermost failing codec', () => {
    const context = new SerializationContext();
    context.register(Point, 'Point', (): [number, number] => { throw new Error('inner'); }, deserializePoint);
    context.register(Shape, 'Shape', (s): [number, Point] => [s.sides, new Point(0, 0)], ([sides]) => new Shape(sides));
    assert.throws(
      () => context.serialize(new Shape(3)),
      (err: unknown) => err instanceof CodecFailureError && err.tag === 'Point'
    );
  });

  it('rejects a serializer that returns neither bytes nor a tuple', () => {
    const context = new SerializationContext();
    context.register(Point, 'Point', (): [] => JSON.parse('"oops"'), () => new Point(0, 0));
    assert.throws(
      () => context.serialize(new Point(1, 2)),
      (err: unknown) =>
        err instanceof CodecFailureError &&
        err.message === 'Failed to serialize Point with codec "Point": serializer returned neither bytes nor a tuple'
    );
  });

  it('fails the fallback on values the byte codec cannot encode', () => {
    const context = new SerializationContext({ fallback: jsonCodec });
    assert.throws(
      () => context.serialize(10n),
      (err: unknown) => err instanceof CodecFailureError && err.tag === FALLBACK_TAG && err.typeName === 'bigint'
    );
  });
});

describe('depth limit', () => {
  function listContext(maxDepth: number) {
    const context = new SerializationContext({ maxDepth });
    context.register<unknown[], unknown[]>(Array, 'list', (items) => Array.from(items), (items) => items);
    return context;
  }

  it('allows nesting up to the limit', () => {
    const context = listContext(2);
    const { tag, data } = context.serialize([[[1]]]);
    assert.deepEqual(context.deserialize(tag, data), [[[1]]]);
  });

  it('fails one level past the limit', () => {
    const context = listContext(2);
    assert.throws(
      () => context.serialize([[[[1]]]]),
      (err: unknown) => err instanceof DepthExceededError && err.limit === 2
    );
  });

  it('turns cycles into a depth failure', () => {
    const context = listContext(10);
    const cyclic: unknown[] = [];
    cyclic.push(cyclic);
    assert.throws(() => context.serialize(cyclic), DepthExceededError);
  });
});
