import { decodeTypedArray, DType, encodeTypedArray, TypedArray } from '../buffer/ndarray.js';
import {
  ColumnStructure,
  columnToStructure,
  structureToColumn,
  structureToTable,
  TableStructure,
  tableToStructure
} from '../table/structural.js';
import { Column, Table } from '../table/table.js';
import { ContextOptions, SerializationContext } from './context.js';
import { TypeRef } from './types.js';

type MapStructure = [keys: unknown[], values: unknown[]];

/**
 * The abstract %TypedArray% constructor every typed array (and Node's Buffer)
 * inherits from. Registering it catches all of them through the ancestry walk.
 */
export const TypedArrayBase: TypeRef<TypedArray> = (() => {
  const base: unknown = Object.getPrototypeOf(Int8Array);
  if (typeof base !== 'function') throw new Error('%TypedArray% constructor not found');
  return base;
})();

export function registerDefaultHandlers(context: SerializationContext): void {
  // Arbitrary precision integers travel as decimal strings
  context.register(BigInt, 'bigint', (value): [string] => [value.toString(10)], ([digits]) => BigInt(digits));

  context.register<Map<unknown, unknown>, MapStructure>(
    Map,
    'Map',
    (map) => [Array.from(map.keys()), Array.from(map.values())],
    ([keys, values]) => new Map(keys.map((key, i) => [key, values[i]]))
  );

  context.register<Set<unknown>, [values: unknown[]]>(
    Set,
    'Set',
    (set) => [Array.from(set)],
    ([values]) => new Set(values)
  );

  context.register(Date, 'Date', (date): [number] => [date.getTime()], ([ms]) => new Date(ms));

  context.register(RegExp, 'RegExp', (re): [string, string] => [re.source, re.flags], ([source, flags]) => new RegExp(source, flags));

  context.register<unknown[], unknown[]>(
    Array,
    'list',
    (items) => Array.from(items),
    (items) => items
  );

  context.register<TypedArray, [dtype: DType, bytes: Uint8Array]>(
    TypedArrayBase,
    'ndarray',
    (array) => {
      const { dtype, bytes } = encodeTypedArray(array);
      return [dtype, bytes];
    },
    ([dtype, bytes]) => decodeTypedArray(dtype, bytes)
  );

  context.register<Column, ColumnStructure>(Column, 'Column', columnToStructure, structureToColumn);
  context.register<Table, TableStructure>(Table, 'Table', tableToStructure, structureToTable);
}

export function createDefaultContext(options: ContextOptions = {}): SerializationContext {
  const context = new SerializationContext({ name: 'default', ...options });
  registerDefaultHandlers(context);
  return context;
}

/**
 * Clone of `base` that hands tables, columns and typed arrays to the fallback
 * codec whole instead of decomposing them.
 */
export function createLightweightContext(base: SerializationContext, options: ContextOptions = {}): SerializationContext {
  const context = base.clone({ name: 'lightweight', ...options });
  context.registerType(Table, 'Table', { pickle: true });
  context.registerType(Column, 'Column', { pickle: true });
  context.registerType(TypedArrayBase, 'ndarray', { pickle: true });
  return context;
}
