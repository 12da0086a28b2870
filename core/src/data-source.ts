/**
 * @stratum/core - Data Sources
 *
 * The DataSource contract consumed by Scan, and an in-memory implementation
 * used by the execution context and tests.
 */

import { DataBatch } from './batch.js';
import { SchemaError } from './errors.js';
import type { TableSchema } from './schema.js';
import { BatchStream } from './stream.js';

/**
 * Supplier of a schema and a lazy sequence of batches.
 */
export interface DataSource {
  /** Schema of the batches this source produces when no projection is applied */
  schema(): TableSchema;

  /**
   * Scan the source, emitting only the named columns in the given order.
   * An empty projection emits all columns in schema order.
   */
  scan(projection: readonly string[]): BatchStream;

  /** Short name shown in EXPLAIN output */
  readonly name?: string;
}

/**
 * DataSource over batches already held in memory.
 *
 * When no schema is given it is taken from the first batch. Every batch must
 * carry a schema equal to the source's.
 *
 * @example
 * ```typescript
 * const source = new InMemoryDataSource([batch]);
 * const stream = source.scan(['first_name']);
 * ```
 */
export class InMemoryDataSource implements DataSource {
  readonly name = 'InMemoryDataSource';
  private readonly batches: readonly DataBatch[];
  private readonly sourceSchema: TableSchema;

  constructor(batches: readonly DataBatch[], schema?: TableSchema) {
    const resolved = schema ?? batches[0]?.schema;
    if (resolved === undefined) {
      throw new SchemaError('Cannot infer schema: no batches and no schema were provided');
    }
    batches.forEach((batch, i) => {
      if (!batch.schema.equals(resolved)) {
        throw new SchemaError(
          `Batch ${i} has schema [${batch.schema.toString()}], expected [${resolved.toString()}]`,
          undefined,
          { batch: i }
        );
      }
    });
    this.batches = Object.freeze([...batches]);
    this.sourceSchema = resolved;
  }

  schema(): TableSchema {
    return this.sourceSchema;
  }

  scan(projection: readonly string[]): BatchStream {
    const all = BatchStream.fromIterable(this.batches);
    if (projection.length === 0) {
      return all;
    }

    const projected = this.sourceSchema.select(projection);
    const indices = projection.map(name => this.sourceSchema.indexOf(name));
    return BatchStream.map(all, batch =>
      new DataBatch(projected, indices.map(i => batch.column(i)))
    );
  }
}
