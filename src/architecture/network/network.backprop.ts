import type FeedForward from '../feedForward';
import { InputSensitivity, WeightGradient } from '../weights';
import { scratchBufferPool } from '../scratchBufferPool';
import { config } from '../../config';
import { warnOnce } from '../../utils/warnings';
import { gather, scatter } from './network.io';

/**
 * Reverse pass over a {@link FeedForward} result.
 *
 * The caller supplies one error value per declared output (typically d(loss)/d(output); for
 * squared error `output - target`). Errors are scattered into a node-length accumulator, then
 * the operation list is replayed from last to first. Only weight patches carry gradient:
 *
 *   e_j            = acc[dst + j] * derivative[dst + j]
 *   grad[w(i, j)] += out[src + i] * e_j
 *   acc[src + i]  += w(i, j) * e_j
 *
 * Activation, randomization, softmax and pointwise operations are gradient-opaque: error that
 * reaches their spans is not forwarded to their sources. Gradient therefore only flows along
 * paths made of weight patches, with each destination's activation derivative applied at the
 * patch that feeds it.
 *
 * The accumulator is borrowed from {@link scratchBufferPool} and returned before exit.
 */

/** Any nonzero error on `[start, start + width)`. */
function hasError(acc: Float64Array, start: number, width: number): boolean {
  for (let k = start; k < start + width; k++) if (acc[k] !== 0) return true;
  return false;
}

/**
 * @param result Forward result to differentiate; not modified.
 * @param errors Errors aligned with `structure.outputNodes` (padded with 0 / truncated).
 * @returns Weight gradient (length `weightCount`) and input sensitivity (length `inputCount`).
 */
export function backPropagate(
  result: FeedForward,
  errors: ArrayLike<number>
): [WeightGradient, InputSensitivity] {
  const structure = result.structure;
  const out = result.nodeOutputs;
  const der = result.nodeDerivatives;
  const weights = result.weightValues;
  const acc = scratchBufferPool.acquire(structure.nodeCount);
  try {
    scatter(acc, structure.outputNodes, errors, 'error');
    const grad = new Float64Array(structure.weightCount);
    const ops = structure.operations;
    for (let index = ops.length - 1; index >= 0; index--) {
      const op = ops[index];
      if (op.type !== 'weightPatch') {
        if (config.warnings && op.type !== 'activation' && op.type !== 'randomization') {
          if (hasError(acc, op.target, op.width)) {
            warnOnce(
              `opaque-${op.type}`,
              `Error reached a '${op.type}' operation during backPropagate; it is not propagated to its sources.`
            );
          }
        }
        continue;
      }
      const { source, target, selector } = op;
      for (let j = 0; j < selector.outputs; j++) {
        const e = acc[target + j] * der[target + j];
        for (let i = 0; i < selector.inputs; i++) {
          selector.accumulate(grad, i, j, out[source + i] * e);
          acc[source + i] = acc[source + i] + selector.read(weights, i, j) * e;
        }
      }
    }
    return [
      new WeightGradient(grad),
      new InputSensitivity(gather(acc, structure.inputNodes)),
    ];
  } finally {
    scratchBufferPool.release(acc);
  }
}
