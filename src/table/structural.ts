import { Column, ColumnValues, Table } from './table.js';

/** Column names, then each column's values in the same order. */
export type TableStructure = [names: string[], columns: ColumnValues[]];

export type ColumnStructure = [name: string, values: ColumnValues];

// The values stay as arrays and typed arrays; the context decomposes them
// further into tagged buffers.
export function tableToStructure(table: Table): TableStructure {
  return [table.columnNames, table.columns.map((c) => c.values)];
}

export function structureToTable([names, columns]: TableStructure): Table {
  if (names.length !== columns.length) {
    throw new RangeError(`Table structure has ${names.length} names for ${columns.length} columns`);
  }
  return new Table(names.map((name, i) => new Column(name, columns[i])));
}

export function columnToStructure(column: Column): ColumnStructure {
  return [column.name, column.values];
}

export function structureToColumn([name, values]: ColumnStructure): Column {
  return new Column(name, values);
}
