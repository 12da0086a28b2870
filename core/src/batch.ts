/**
 * @stratum/core - Data Batches
 *
 * A DataBatch is the unit passed between physical operators: a schema plus
 * one ColumnValue per field, all of the same length.
 */

import { ArrayColumn, type ColumnValue } from './column.js';
import type { Value } from './data-types.js';
import { ColumnNotFoundError, SchemaError, SizeMismatchError } from './errors.js';
import type { TableSchema } from './schema.js';

export class DataBatch {
  readonly schema: TableSchema;
  readonly columns: readonly ColumnValue[];

  /**
   * @throws SchemaError when the column count differs from the schema's field count
   * @throws SizeMismatchError when columns disagree in length
   */
  constructor(schema: TableSchema, columns: readonly ColumnValue[]) {
    if (columns.length !== schema.fields.length) {
      throw new SchemaError(
        `TableSchema has ${schema.fields.length} fields, but DataBatch has ${columns.length} columns`,
        undefined,
        { fields: schema.fields.length, columns: columns.length }
      );
    }
    const first = columns[0];
    if (first !== undefined) {
      columns.forEach((column, i) => {
        if (column.length !== first.length) {
          throw new SizeMismatchError(
            `Column ${i} has size ${column.length}, expected ${first.length}`,
            first.length,
            column.length
          );
        }
      });
    }
    this.schema = schema;
    this.columns = Object.freeze([...columns]);
    Object.freeze(this);
  }

  /**
   * Zero-row batch of array columns for `schema`.
   */
  static empty(schema: TableSchema): DataBatch {
    return new DataBatch(
      schema,
      schema.fields.map(f => new ArrayColumn(f.dataType, []))
    );
  }

  rowCount(): number {
    return this.columns[0]?.length ?? 0;
  }

  columnCount(): number {
    return this.columns.length;
  }

  column(index: number): ColumnValue {
    const found = Number.isInteger(index) ? this.columns[index] : undefined;
    if (found === undefined) {
      throw new ColumnNotFoundError(index, this.schema.fieldNames());
    }
    return found;
  }

  columnByName(name: string): ColumnValue {
    const index = this.schema.indexOf(name);
    if (index < 0) {
      throw new ColumnNotFoundError(name, this.schema.fieldNames());
    }
    return this.column(index);
  }

  /**
   * Materialize rows as plain records keyed by field name.
   */
  toRecords(): Record<string, Value>[] {
    const rows: Record<string, Value>[] = [];
    for (let row = 0; row < this.rowCount(); row++) {
      const record: Record<string, Value> = {};
      this.schema.fields.forEach((f, i) => {
        record[f.name] = this.column(i).valueAt(row);
      });
      rows.push(record);
    }
    return rows;
  }

  /**
   * Tab-separated table with a header line, meant for debugging output.
   */
  toTable(): string {
    const names = this.schema.fieldNames();
    const header = names.join('\t');
    const separator = '-'.repeat(header.length + names.length * 2);
    const lines = [separator, header, separator];

    for (let row = 0; row < this.rowCount(); row++) {
      lines.push(this.columns.map(c => formatCell(c.valueAt(row))).join('\t'));
    }
    return lines.join('\n');
  }

  toString(): string {
    return `Rows:    ${this.rowCount()}\nColumns: ${this.columnCount()}\nData:\n${this.toTable()}`;
  }
}

export function formatCell(value: Value): string {
  return value === null ? 'null' : String(value);
}
