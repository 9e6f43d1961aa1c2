/**
 * Scratch buffer pooling for the reverse pass.
 *
 * Size-bucketed pool of Float64Array accumulators. The reverse pass borrows one node-length
 * buffer per call and hands it back when the gradients have been gathered, so training loops
 * over a fixed structure stop allocating after the first step. Reused buffers are zero-filled.
 */

import { config } from '../config';

/**
 * Buckets map array length -> stack of arrays. Acquire pops and zero-fills, or allocates a new
 * array when empty. Release pushes back up to the per-bucket cap.
 *
 * Note: not thread-safe; intended for typical single-threaded JS execution.
 */
class ScratchBufferPool {
  /** Buckets keyed by length, storing reusable arrays. */
  private buckets: Map<number, Float64Array[]> = new Map();
  /** Count of arrays created since last clear(), for diagnostics. */
  private created = 0;
  /** Count of successful reuses since last clear(), for diagnostics. */
  private reused = 0;

  /** Zeroed buffer of the requested length. */
  acquire(size: number): Float64Array {
    const bucket = this.buckets.get(size);
    const arr = bucket?.pop();
    if (arr) {
      this.reused++;
      arr.fill(0);
      return arr;
    }
    this.created++;
    return new Float64Array(size);
  }

  /**
   * Return a buffer to the pool. Dropped when its bucket already holds
   * `config.poolMaxPerBucket` arrays.
   */
  release(array: Float64Array): void {
    const size = array.length;
    let bucket = this.buckets.get(size);
    if (!bucket) {
      bucket = [];
      this.buckets.set(size, bucket);
    }
    const cap = config.poolMaxPerBucket ?? Number.POSITIVE_INFINITY;
    if (bucket.length < Math.max(0, cap)) bucket.push(array);
  }

  /** Clear all buckets and reset counters. */
  clear(): void {
    this.buckets.clear();
    this.created = 0;
    this.reused = 0;
  }

  stats(): { created: number; reused: number; bucketCount: number } {
    return {
      created: this.created,
      reused: this.reused,
      bucketCount: this.buckets.size,
    };
  }

  /** Retained count for a size bucket. */
  bucketSize(size: number): number {
    return this.buckets.get(size)?.length ?? 0;
  }
}

/** Shared singleton instance. */
export const scratchBufferPool = new ScratchBufferPool();
