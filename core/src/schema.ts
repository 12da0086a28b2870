/**
 * @stratum/core - Schema Model
 *
 * Named, typed column descriptors. A TableSchema is an ordered list of
 * uniquely named fields; it is immutable once constructed.
 */

import type { DataType } from './data-types.js';
import { ColumnNotFoundError, SchemaError } from './errors.js';

// =============================================================================
// SchemaField
// =============================================================================

/**
 * A single named, typed column descriptor.
 */
export interface SchemaField {
  readonly name: string;
  readonly dataType: DataType;
}

export function field(name: string, dataType: DataType): SchemaField {
  return Object.freeze({ name, dataType });
}

export function formatField(f: SchemaField): string {
  return `${f.name}:${f.dataType}`;
}

// =============================================================================
// TableSchema
// =============================================================================

/**
 * Ordered sequence of uniquely named fields.
 *
 * @example
 * ```typescript
 * const schema = new TableSchema([
 *   field('id', 'int64'),
 *   field('first_name', 'string'),
 * ]);
 * schema.select(['first_name']).toString(); // "first_name:string"
 * ```
 */
export class TableSchema {
  readonly fields: readonly SchemaField[];

  constructor(fields: readonly SchemaField[]) {
    const seen = new Set<string>();
    const duplicates: string[] = [];
    for (const f of fields) {
      if (seen.has(f.name) && !duplicates.includes(f.name)) {
        duplicates.push(f.name);
      }
      seen.add(f.name);
    }
    if (duplicates.length > 0) {
      throw SchemaError.duplicateFields(duplicates);
    }
    this.fields = Object.freeze([...fields]);
    Object.freeze(this);
  }

  static empty(): TableSchema {
    return new TableSchema([]);
  }

  get length(): number {
    return this.fields.length;
  }

  fieldNames(): string[] {
    return this.fields.map(f => f.name);
  }

  /**
   * Position of the field named `name`, or -1 when absent.
   */
  indexOf(name: string): number {
    return this.fields.findIndex(f => f.name === name);
  }

  /**
   * Field at position `index`; ColumnNotFoundError when out of range.
   */
  field(index: number): SchemaField {
    const found = Number.isInteger(index) ? this.fields[index] : undefined;
    if (found === undefined) {
      throw new ColumnNotFoundError(index, this.fieldNames());
    }
    return found;
  }

  /**
   * New schema with only the fields named in `names`, in the order of `names`.
   */
  select(names: readonly string[]): TableSchema {
    if (names.length === 0) {
      return TableSchema.empty();
    }

    const byName = new Map(this.fields.map(f => [f.name, f] as const));
    const missing = names.filter(name => !byName.has(name));
    if (missing.length > 0) {
      throw SchemaError.unknownColumns(missing, this.fieldNames());
    }

    const selected: SchemaField[] = [];
    for (const name of names) {
      const f = byName.get(name);
      if (f !== undefined) selected.push(f);
    }
    return new TableSchema(selected);
  }

  equals(other: TableSchema): boolean {
    return (
      this.fields.length === other.fields.length &&
      this.fields.every((f, i) => {
        const o = other.fields[i];
        return o !== undefined && o.name === f.name && o.dataType === f.dataType;
      })
    );
  }

  toString(): string {
    return this.fields.map(formatField).join(', ');
  }
}
