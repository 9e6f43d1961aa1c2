/**
 * Weight selectors map a logical `(input i, output j)` pair of a weight matrix onto the flat
 * parameter buffer shared by every matrix of a network.
 *
 * - {@link BaseWeights}: an allocated block. Entry (i, j) lives at `base + i + inputs * j`
 *   (input-major, one column of `inputs` entries per output). Trainable.
 * - {@link FixedWeights}: every entry reads the same constant and gradients are discarded.
 *
 * Several connections may share one selector (tied weights); their gradients then accumulate
 * into the same slots.
 */
export interface WeightSelector {
  /** Tag of the builder that issued the selector. */
  readonly session: symbol;
  /** Width of the source layer this selector accepts. */
  readonly inputs: number;
  /** Width of the destination layer this selector produces. */
  readonly outputs: number;
  /** Weight for `(i, j)` read from `weights`. */
  read(weights: ArrayLike<number>, i: number, j: number): number;
  /** Add `delta` to the gradient slot of `(i, j)`; no-op for non-trainable selectors. */
  accumulate(gradient: Float64Array, i: number, j: number, delta: number): void;
}

export class BaseWeights implements WeightSelector {
  constructor(
    readonly session: symbol,
    /** First slot of the block in the parameter buffer. */
    readonly base: number,
    readonly inputs: number,
    readonly outputs: number
  ) {}

  /** Number of parameter slots the block occupies. */
  get count(): number {
    return this.inputs * this.outputs;
  }

  addressOf(i: number, j: number): number {
    return this.base + i + this.inputs * j;
  }

  read(weights: ArrayLike<number>, i: number, j: number): number {
    return weights[this.addressOf(i, j)];
  }

  accumulate(gradient: Float64Array, i: number, j: number, delta: number): void {
    gradient[this.addressOf(i, j)] += delta;
  }
}

export class FixedWeights implements WeightSelector {
  constructor(
    readonly session: symbol,
    readonly inputs: number,
    readonly outputs: number,
    readonly value: number
  ) {}

  read(): number {
    return this.value;
  }

  accumulate(): void {}
}
