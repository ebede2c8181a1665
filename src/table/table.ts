import { TypedArray } from '../buffer/ndarray.js';

export type ColumnValues = TypedArray | unknown[];

/** A named, ordered sequence of values. */
export class Column {
  readonly name: string;
  readonly values: ColumnValues;

  constructor(name: string, values: ColumnValues) {
    this.name = name;
    this.values = values;
  }

  get length(): number {
    return this.values.length;
  }

  at(index: number): unknown {
    return this.values[index];
  }
}

/**
 * Columns of equal length, kept in insertion order. Column names must be
 * unique.
 */
export class Table {
  readonly columns: readonly Column[];

  constructor(columns: Column[]) {
    const names = new Set<string>();
    for (const column of columns) {
      if (names.has(column.name)) {
        throw new Error(`Duplicate column name: ${column.name}`);
      }
      names.add(column.name);
      if (column.length !== columns[0].length) {
        throw new RangeError(`Column ${column.name} has ${column.length} rows, expected ${columns[0].length}`);
      }
    }
    this.columns = [...columns];
  }

  static fromRecord(record: Record<string, ColumnValues>): Table {
    return new Table(Object.entries(record).map(([name, values]) => new Column(name, values)));
  }

  get numRows(): number {
    return this.columns.length > 0 ? this.columns[0].length : 0;
  }

  get columnNames(): string[] {
    return this.columns.map((c) => c.name);
  }

  getColumn(name: string): Column | undefined {
    return this.columns.find((c) => c.name === name);
  }

  /** Row `index` as an object keyed by column name. */
  row(index: number): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const column of this.columns) {
      out[column.name] = column.at(index);
    }
    return out;
  }
}
