import type NetworkStructure from '../network';
import type { NetworkOperation } from '../operations';
import FeedForward from '../feedForward';
import type { ParameterBuffer } from '../weights';
import { DagpropError, SizeMismatchError } from '../errors';
import { applyActivation, softmax } from '../../methods/activation';
import { prefetch, type RandomGenerator } from '../../methods/random';
import { config } from '../../config';
import { scatter } from './network.io';

/**
 * Forward evaluation of a {@link NetworkStructure}.
 *
 * Every call allocates a fresh pair of node buffers (outputs, local derivatives) of length
 * `nodeCount`. Both start at 0 except the bias slot, which is 1 in both. Inputs are scattered
 * onto the declared input nodes, then the operation list runs strictly in order:
 *
 *  - weightPatch   : for each output j, `Σ_i out[src + i] * w(i, j)` is ADDED to `out[dst + j]`,
 *                    so several parents feeding one layer accumulate.
 *  - activation    : the span is replaced by the activation values; derivatives are recorded.
 *  - randomization : each node of the span is passed through the sampler, threading the generator.
 *                    One sample per node is fetched in bulk before the span starts.
 *  - softMax / pointwiseSum / pointwiseProduct / pointwiseUnary : write a fresh target span and
 *                    its local derivatives from one or more source spans. A product of several
 *                    sources records 0: its partials differ per source.
 *
 * Input vectors shorter than the declared input list leave the remaining inputs at 0; longer
 * vectors are truncated. Both raise a one-time warning when `config.warnings` is on.
 */

/**
 * Parameters as the pass will read them.
 * @throws SizeMismatchError on a length mismatch while `config.strictWeightCount` is set.
 */
function resolveWeights(
  structure: NetworkStructure,
  weights: ParameterBuffer
): ArrayLike<number> {
  if (weights.length === structure.weightCount) return weights.values;
  if (config.strictWeightCount) {
    throw new SizeMismatchError(
      'Parameter buffer length does not match the structure weight count',
      structure.weightCount,
      weights.length
    );
  }
  return weights.resized(structure.weightCount);
}

function step(
  op: NetworkOperation,
  out: Float64Array,
  der: Float64Array,
  weights: ArrayLike<number>,
  generator: RandomGenerator | undefined
): RandomGenerator | undefined {
  switch (op.type) {
    case 'weightPatch': {
      const { source, target, selector } = op;
      for (let j = 0; j < selector.outputs; j++) {
        let sum = 0;
        for (let i = 0; i < selector.inputs; i++) {
          sum += out[source + i] * selector.read(weights, i, j);
        }
        out[target + j] = sum + out[target + j];
      }
      return generator;
    }
    case 'activation': {
      const raw = Array.from(out.subarray(op.start, op.end + 1));
      const results = applyActivation(op.activation, raw);
      for (let k = 0; k < results.length; k++) {
        out[op.start + k] = results[k][0];
        der[op.start + k] = results[k][1];
      }
      return generator;
    }
    case 'randomization': {
      if (generator === undefined) {
        throw new DagpropError(
          'Randomization operation reached during deterministic evaluation; use stochasticFeedForward.'
        );
      }
      let gen = prefetch(generator, op.end - op.start + 1);
      for (let n = op.start; n <= op.end; n++) {
        const [value, derivative, next] = op.sampler(gen, out[n], der[n]);
        out[n] = value;
        der[n] = derivative;
        gen = next;
      }
      return gen;
    }
    case 'softMax': {
      const raw = Array.from(out.subarray(op.source, op.source + op.width));
      const results = softmax(raw);
      for (let k = 0; k < results.length; k++) {
        out[op.target + k] = results[k][0];
        der[op.target + k] = results[k][1];
      }
      return generator;
    }
    case 'pointwiseSum': {
      for (let k = 0; k < op.width; k++) {
        let sum = 0;
        for (const s of op.sources) sum += out[s + k];
        out[op.target + k] = sum;
        der[op.target + k] = 1;
      }
      return generator;
    }
    case 'pointwiseProduct': {
      for (let k = 0; k < op.width; k++) {
        let product = 1;
        for (const s of op.sources) product *= out[s + k];
        out[op.target + k] = product;
        // one slot cannot hold a partial per factor
        der[op.target + k] = op.sources.length === 1 ? 1 : 0;
      }
      return generator;
    }
    case 'pointwiseUnary': {
      for (let k = 0; k < op.width; k++) {
        const [value, derivative] = op.fn(out[op.source + k]);
        out[op.target + k] = value;
        der[op.target + k] = derivative;
      }
      return generator;
    }
  }
}

function run(
  structure: NetworkStructure,
  weights: ParameterBuffer,
  inputs: ArrayLike<number>,
  generator: RandomGenerator | undefined
): [FeedForward, RandomGenerator | undefined] {
  const effective = resolveWeights(structure, weights);
  const out = new Float64Array(structure.nodeCount);
  const der = new Float64Array(structure.nodeCount);
  // bias convention
  out[0] = 1;
  der[0] = 1;
  scatter(out, structure.inputNodes, inputs, 'input');
  let gen = generator;
  for (const op of structure.operations) gen = step(op, out, der, effective, gen);
  return [new FeedForward(structure, weights, out, der, effective), gen];
}

/**
 * Evaluate a deterministic structure once.
 *
 * @param structure Finalized, non-stochastic network.
 * @param weights Parameters; length must equal `structure.weightCount` unless
 *   `config.strictWeightCount` is off.
 * @param inputs Values for the declared inputs, in order.
 * @example
 * const result = feedForward(structure, packWeights([0.5, -1]), [2, 3]);
 * result.getOutput(0); // -2
 */
export function feedForward(
  structure: NetworkStructure<false>,
  weights: ParameterBuffer,
  inputs: ArrayLike<number>
): FeedForward {
  return run(structure, weights, inputs, undefined)[0];
}

/**
 * Evaluate a structure that may contain randomization operations.
 * @returns The result and the generator after every draw made by the pass.
 */
export function stochasticFeedForward(
  structure: NetworkStructure,
  weights: ParameterBuffer,
  inputs: ArrayLike<number>,
  generator: RandomGenerator
): [FeedForward, RandomGenerator] {
  const [result, next] = run(structure, weights, inputs, generator);
  return [result, next ?? generator];
}
