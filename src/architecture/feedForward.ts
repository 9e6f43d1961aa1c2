import type NetworkStructure from './network';
import type { InputSensitivity, ParameterBuffer, WeightGradient } from './weights';
import { backPropagate as _backPropagate } from './network/network.backprop';

/**
 * Snapshot of one forward evaluation: every node's output and the local derivative recorded for
 * it, plus the structure and parameters the pass used. Created by the forward pass and never
 * modified afterwards; the node buffers are owned exclusively by this result.
 */
export default class FeedForward {
  constructor(
    readonly structure: NetworkStructure,
    /** Parameter buffer as passed by the caller. */
    readonly weights: ParameterBuffer,
    private readonly outputs: Float64Array,
    private readonly derivatives: Float64Array,
    /** Parameters actually read, exactly `structure.weightCount` long. */
    private readonly effectiveWeights: ArrayLike<number>
  ) {}

  /** Value of declared output `index`; 0 when `index` is outside the output list. */
  getOutput(index: number): number {
    const outputNodes = this.structure.outputNodes;
    if (!Number.isInteger(index) || index < 0 || index >= outputNodes.length) return 0;
    return this.outputs[outputNodes[index]];
  }

  /** Values of all declared outputs, in declaration order. */
  getOutputs(): number[] {
    return this.structure.outputNodes.map((node) => this.outputs[node]);
  }

  /** Read-only view of every node's output (index 0 is the bias). */
  get nodeOutputs(): ArrayLike<number> {
    return this.outputs;
  }

  /** Read-only view of the local derivative recorded for every node. */
  get nodeDerivatives(): ArrayLike<number> {
    return this.derivatives;
  }

  get weightValues(): ArrayLike<number> {
    return this.effectiveWeights;
  }

  /**
   * Reverse pass from per-output errors (aligned with the declared outputs).
   * @see backPropagate in network.backprop
   */
  backPropagate(errors: ArrayLike<number>): [WeightGradient, InputSensitivity] {
    return _backPropagate(this, errors);
  }
}

export { FeedForward };

/** Free-function form of {@link FeedForward.getOutput}. */
export function getOutput(result: FeedForward, index: number): number {
  return result.getOutput(index);
}

/** Free-function form of {@link FeedForward.getOutputs}. */
export function getOutputs(result: FeedForward): number[] {
  return result.getOutputs();
}
