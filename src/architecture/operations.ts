import type { ActivationFunction } from '../methods/activation';
import type { SamplingFunction } from '../methods/random';
import type { WeightSelector } from './weightSelector';

/**
 * Operations making up a network, executed in list order on the forward pass and in reverse
 * order on the backward pass. Spans are given as node indices; `end` bounds are inclusive.
 */

/** Accumulate `Σ_i out[source + i] * w(i, j)` into `out[target + j]`. */
export interface WeightPatchOperation {
  readonly type: 'weightPatch';
  readonly source: number;
  readonly target: number;
  readonly selector: WeightSelector;
}

/** Replace `out[start..end]` by the activation result and record local derivatives. */
export interface ActivationOperation {
  readonly type: 'activation';
  readonly start: number;
  readonly end: number;
  readonly activation: ActivationFunction;
}

/** Stochastic transform of `out[start..end]` and its derivatives. Stochastic sessions only. */
export interface RandomizationOperation {
  readonly type: 'randomization';
  readonly start: number;
  readonly end: number;
  readonly sampler: SamplingFunction;
}

/** `out[target + k] = softmax(out[source..source + width - 1])[k]`. */
export interface SoftMaxOperation {
  readonly type: 'softMax';
  readonly source: number;
  readonly target: number;
  readonly width: number;
}

/** `out[target + k] = Σ_s out[s + k]` over `sources`. */
export interface PointwiseSumOperation {
  readonly type: 'pointwiseSum';
  readonly target: number;
  readonly width: number;
  readonly sources: readonly number[];
}

/** `out[target + k] = Π_s out[s + k]` over `sources`. */
export interface PointwiseProductOperation {
  readonly type: 'pointwiseProduct';
  readonly target: number;
  readonly width: number;
  readonly sources: readonly number[];
}

/** `out[target + k] = fn(out[source + k])` with derivative recorded from `fn`. */
export interface PointwiseUnaryOperation {
  readonly type: 'pointwiseUnary';
  readonly source: number;
  readonly target: number;
  readonly width: number;
  readonly fn: UnaryRule;
}

/** Scalar map returning `[value, derivative]`. */
export type UnaryRule = (x: number) => readonly [number, number];

export type DeterministicOperation =
  | WeightPatchOperation
  | ActivationOperation
  | SoftMaxOperation
  | PointwiseSumOperation
  | PointwiseProductOperation
  | PointwiseUnaryOperation;

/**
 * Operation set of a session; randomization only exists when `Stochastic` is `true`.
 */
export type NetworkOperation<Stochastic extends boolean = boolean> =
  | DeterministicOperation
  | (Stochastic extends true ? RandomizationOperation : never);
