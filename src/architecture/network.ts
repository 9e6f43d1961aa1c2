import type { NetworkOperation } from './operations';
import type { ParameterBuffer } from './weights';
import type { RandomGenerator } from '../methods/random';
import type FeedForward from './feedForward';
import {
  feedForward as _feedForward,
  stochasticFeedForward as _stochasticFeedForward,
} from './network/network.activate';

/**
 * Finalized, immutable network: node count, parameter count, the ordered input and output node
 * lists and the ordered operation list.
 *
 * Invariants established by {@link NetworkBuilder}:
 *  - node 0 is the bias node; every other node is a declared input or is written by exactly one
 *    operation before any later operation reads it;
 *  - every parameter slot addressed by a weight selector lies in `[0, weightCount)`.
 *
 * A structure is reused across any number of evaluations. `Stochastic` records, at the type
 * level, whether the structure may contain randomization operations; deterministic evaluation
 * is only offered for `NetworkStructure<false>`.
 */
export default class NetworkStructure<Stochastic extends boolean = boolean> {
  readonly inputNodes: readonly number[];
  readonly outputNodes: readonly number[];
  readonly operations: readonly NetworkOperation<Stochastic>[];

  constructor(
    readonly nodeCount: number,
    readonly weightCount: number,
    inputNodes: readonly number[],
    outputNodes: readonly number[],
    operations: readonly NetworkOperation<Stochastic>[],
    readonly stochastic: Stochastic
  ) {
    this.inputNodes = Object.freeze(inputNodes.slice());
    this.outputNodes = Object.freeze(outputNodes.slice());
    this.operations = Object.freeze(operations.slice());
  }

  get inputCount(): number {
    return this.inputNodes.length;
  }

  get outputCount(): number {
    return this.outputNodes.length;
  }

  /** Deterministic forward pass (see {@link _feedForward}). */
  feedForward(
    this: NetworkStructure<false>,
    weights: ParameterBuffer,
    inputs: ArrayLike<number>
  ): FeedForward {
    return _feedForward(this, weights, inputs);
  }

  /** Forward pass drawing from `generator` for randomization operations. */
  stochasticFeedForward(
    weights: ParameterBuffer,
    inputs: ArrayLike<number>,
    generator: RandomGenerator
  ): [FeedForward, RandomGenerator] {
    return _stochasticFeedForward(this, weights, inputs, generator);
  }

  /** One-line summary used in diagnostics. */
  toString(): string {
    return `NetworkStructure(nodes=${this.nodeCount}, weights=${this.weightCount}, inputs=${this.inputCount}, outputs=${this.outputCount}, operations=${this.operations.length})`;
  }
}

export { NetworkStructure };

/** Total number of nodes, bias included. */
export function structureNodes(structure: NetworkStructure): number {
  return structure.nodeCount;
}

/** Number of trainable parameter slots. */
export function structureBaseWeights(structure: NetworkStructure): number {
  return structure.weightCount;
}
