import { addExtension } from 'msgpackr';
import { isTypedArray } from '../buffer/ndarray.js';
import { Column, ColumnValues, Table } from './table.js';

// msgpackr extension type codes, application range
const TABLE_EXT = 0x30;
const COLUMN_EXT = 0x31;

let enabled = false;

/**
 * Teach msgpackr to rebuild Table and Column instances, so the msgpack
 * fallback round-trips them with their class. msgpackr extensions are
 * process-wide; calling this more than once is harmless.
 */
export function enableTablePickling(): void {
  if (enabled) return;
  enabled = true;

  addExtension({
    Class: Column,
    type: COLUMN_EXT,
    write: (column: Column) => [column.name, column.values],
    read: (data: unknown) => readColumn(data)
  });

  addExtension({
    Class: Table,
    type: TABLE_EXT,
    write: (table: Table) => table.columns.map((c) => [c.name, c.values]),
    read: (data: unknown) => {
      if (!Array.isArray(data)) throw new TypeError('Pickled table is not a column list');
      return new Table(data.map(readColumn));
    }
  });
}

function readColumn(data: unknown): Column {
  if (!Array.isArray(data) || data.length !== 2 || typeof data[0] !== 'string') {
    throw new TypeError('Pickled column is not a [name, values] pair');
  }
  return new Column(data[0], toColumnValues(data[1]));
}

function toColumnValues(values: unknown): ColumnValues {
  if (Array.isArray(values) || isTypedArray(values)) return values;
  throw new TypeError('Pickled column values are neither an array nor a typed array');
}
