/**
 * @stratum/core - Batch Streams
 *
 * Explicit pull-based streaming of DataBatches between operators.
 *
 * A BatchStream is single-pass and single-consumer. `hasNext()` pulls at
 * most one batch ahead from its source and holds it as the in-flight batch;
 * `next()` hands that batch over. Nothing is buffered beyond that one batch,
 * and no work happens until the consumer asks for it.
 *
 * @example
 * ```typescript
 * const stream = plan.execute();
 * while (stream.hasNext()) {
 *   const batch = stream.next();
 *   console.log(batch.rowCount());
 * }
 *
 * // or, equivalently (once)
 * for (const batch of plan.execute()) { ... }
 * ```
 */

import type { DataBatch } from './batch.js';
import { StreamError } from './errors.js';

/**
 * Produces the next batch, or `undefined` once the source is exhausted.
 */
export type BatchPull = () => DataBatch | undefined;

/**
 * Hooks invoked while a stream is consumed.
 */
export interface StreamObserver {
  onBatch?(batch: DataBatch): void;
  onEnd?(): void;
  onError?(error: unknown): void;
}

export class BatchStream implements Iterable<DataBatch> {
  private readonly pull: BatchPull;
  private pending: DataBatch | undefined;
  private done = false;
  private iterated = false;

  constructor(pull: BatchPull) {
    this.pull = pull;
  }

  static empty(): BatchStream {
    return new BatchStream(() => undefined);
  }

  /**
   * Stream over an iterable. The iterable is only read as batches are pulled.
   */
  static fromIterable(batches: Iterable<DataBatch>): BatchStream {
    let iterator: Iterator<DataBatch> | undefined;
    return new BatchStream(() => {
      iterator ??= batches[Symbol.iterator]();
      const result = iterator.next();
      return result.done ? undefined : result.value;
    });
  }

  /**
   * Stream applying `transform` to every batch pulled from `input`.
   */
  static map(input: BatchStream, transform: (batch: DataBatch) => DataBatch): BatchStream {
    return new BatchStream(() => (input.hasNext() ? transform(input.next()) : undefined));
  }

  /**
   * Stream that reports progress to `observer` as `input` is consumed.
   * `onEnd` fires once, when the consumer finds the input exhausted.
   */
  static observe(input: BatchStream, observer: StreamObserver): BatchStream {
    return new BatchStream(() => {
      let batch: DataBatch | undefined;
      try {
        batch = input.hasNext() ? input.next() : undefined;
      } catch (error) {
        observer.onError?.(error);
        throw error;
      }
      if (batch === undefined) {
        observer.onEnd?.();
      } else {
        observer.onBatch?.(batch);
      }
      return batch;
    });
  }

  hasNext(): boolean {
    if (this.pending !== undefined) return true;
    if (this.done) return false;
    const batch = this.pull();
    if (batch === undefined) {
      this.done = true;
      return false;
    }
    this.pending = batch;
    return true;
  }

  /**
   * @throws StreamError when the stream is exhausted
   */
  next(): DataBatch {
    if (!this.hasNext()) {
      throw StreamError.exhausted();
    }
    const batch = this.pending;
    this.pending = undefined;
    if (batch === undefined) {
      throw StreamError.exhausted();
    }
    return batch;
  }

  /**
   * Drain the remaining batches into an array.
   */
  toArray(): DataBatch[] {
    const batches: DataBatch[] = [];
    while (this.hasNext()) {
      batches.push(this.next());
    }
    return batches;
  }

  [Symbol.iterator](): Iterator<DataBatch> {
    if (this.iterated) {
      throw StreamError.alreadyConsumed();
    }
    this.iterated = true;
    return {
      next: (): IteratorResult<DataBatch> =>
        this.hasNext() ? { done: false, value: this.next() } : { done: true, value: undefined },
    };
  }
}
