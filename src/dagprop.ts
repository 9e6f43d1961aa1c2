/**
 * dagprop: directed-acyclic neural networks over a flat parameter vector.
 *
 *   const [structure] = buildNetwork((b) => { ... });
 *   const [weights, gen] = initialWeights(structure, seededGenerator('init'), [-0.1, 0.1]);
 *   const result = feedForward(structure, weights, inputs);
 *   const [gradient, sensitivity] = backPropagate(result, errors);
 *   const next = applyDelta(-learningRate, weights, gradient);
 */
export { config } from './config';
export type { DagpropConfig } from './config';

export { AppendSequence } from './architecture/appendSequence';
export { LayerHandle, layerSize, BIAS_NODE } from './architecture/layer';
export { BaseWeights, FixedWeights } from './architecture/weightSelector';
export type { WeightSelector } from './architecture/weightSelector';
export type {
  NetworkOperation,
  DeterministicOperation,
  WeightPatchOperation,
  ActivationOperation,
  RandomizationOperation,
  SoftMaxOperation,
  PointwiseSumOperation,
  PointwiseProductOperation,
  PointwiseUnaryOperation,
  UnaryRule,
} from './architecture/operations';
export {
  NetworkBuilder,
  buildNetwork,
  buildStochasticNetwork,
} from './architecture/builder';
export {
  NetworkStructure,
  structureNodes,
  structureBaseWeights,
} from './architecture/network';
export { FeedForward, getOutput, getOutputs } from './architecture/feedForward';
export {
  feedForward,
  stochasticFeedForward,
} from './architecture/network/network.activate';
export { backPropagate } from './architecture/network/network.backprop';
export {
  ParameterBuffer,
  WeightGradient,
  InputSensitivity,
  packWeights,
  unpackWeights,
  serializeWeights,
  deserializeWeights,
  parseWeights,
  combineUpdates,
  applyDelta,
  inputError,
  initialWeights,
  initialWeightsForCount,
} from './architecture/weights';
export { scratchBufferPool } from './architecture/scratchBufferPool';
export {
  DagpropError,
  ShapeMismatchError,
  SizeMismatchError,
  SessionMismatchError,
  BuilderFinalizedError,
} from './architecture/errors';

export {
  Activation,
  ScalarActivation,
  pointwise,
  softmax,
} from './methods/activation';
export type {
  ActivationFunction,
  ActivationResult,
  ScalarRule,
} from './methods/activation';
export {
  seededGenerator,
  uniform,
  drawMany,
  prefetch,
  bernoulliSampler,
  dropoutSampler,
} from './methods/random';
export type { RandomGenerator, SamplingFunction } from './methods/random';
