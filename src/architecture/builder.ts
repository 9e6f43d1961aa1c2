import { AppendSequence } from './appendSequence';
import { BIAS_NODE, LayerHandle } from './layer';
import NetworkStructure from './network';
import type {
  NetworkOperation,
  PointwiseProductOperation,
  PointwiseSumOperation,
  UnaryRule,
  WeightPatchOperation,
} from './operations';
import { BaseWeights, FixedWeights, type WeightSelector } from './weightSelector';
import {
  BuilderFinalizedError,
  SessionMismatchError,
  ShapeMismatchError,
} from './errors';
import type { ActivationFunction } from '../methods/activation';
import type { SamplingFunction } from '../methods/random';

/**
 * Network construction session.
 *
 * A builder accumulates the node count (starting at 1: node 0 is the bias), the parameter count
 * (starting at 0) and three append sequences: input nodes, output nodes and operations. Every
 * allocation returns a handle tagged with this session; handles and selectors from another
 * session are rejected, and since handles only ever cover already-allocated nodes, operations
 * can only read nodes produced before them. The resulting operation list is therefore in
 * topological order by construction.
 *
 * Layer construction is all-or-nothing: when `standardLayer` (or any combinator) returns
 * `undefined`, counts and sequences are exactly as before the call.
 *
 * The `Stochastic` parameter is a static capability: `stochasticLayer` only type-checks on a
 * `NetworkBuilder<true>`.
 *
 * @example
 * const [structure, output] = buildNetwork((b) => {
 *   const input = b.addInputs(2);
 *   const w = b.addBaseWeights(2, 1);
 *   const out = b.standardLayer([[input, w]], Activation.identity);
 *   if (out) b.addOutputs(out);
 *   return out;
 * });
 */
export class NetworkBuilder<Stochastic extends boolean = false> {
  /** Tag stamped on every handle and selector minted here. */
  readonly session: symbol = Symbol('dagprop.session');
  readonly stochastic: Stochastic;

  private nodeCount = 1;
  private weightCount = 0;
  private inputs = AppendSequence.empty<number>();
  private outputs = AppendSequence.empty<number>();
  private operations = AppendSequence.empty<NetworkOperation<Stochastic>>();
  private finalized = false;

  constructor(options: { stochastic: Stochastic }) {
    this.stochastic = options.stochastic;
  }

  /** Builder for deterministic networks. */
  static create(): NetworkBuilder<false> {
    return new NetworkBuilder({ stochastic: false });
  }

  /** Builder whose networks may contain stochastic layers. */
  static createStochastic(): NetworkBuilder<true> {
    return new NetworkBuilder({ stochastic: true });
  }

  /** Nodes allocated so far, bias included. */
  get nodes(): number {
    return this.nodeCount;
  }

  /** Parameter slots reserved so far. */
  get weights(): number {
    return this.weightCount;
  }

  /** Width-1 handle on the bias node (value 1). */
  get bias(): LayerHandle {
    return new LayerHandle(this.session, BIAS_NODE, BIAS_NODE);
  }

  /**
   * Allocate `count` input nodes, appended in order to the input list. `count = 0` yields an
   * empty, valid handle.
   */
  addInputs(count: number): LayerHandle {
    this.assertOpen();
    assertCount(count, 'Input count');
    const layer = this.allocate(count);
    this.inputs = this.inputs.concat(AppendSequence.range(layer.first, count));
    return layer;
  }

  /** Reserve `inputs * outputs` fresh parameter slots. */
  addBaseWeights(inputs: number, outputs: number): BaseWeights {
    this.assertOpen();
    assertCount(inputs, 'Weight block input width');
    assertCount(outputs, 'Weight block output width');
    const selector = new BaseWeights(this.session, this.weightCount, inputs, outputs);
    this.weightCount += selector.count;
    return selector;
  }

  /** Non-trainable selector reading `value` for every entry. */
  fixedWeights(inputs: number, outputs: number, value: number): FixedWeights {
    assertCount(inputs, 'Weight block input width');
    assertCount(outputs, 'Weight block output width');
    return new FixedWeights(this.session, inputs, outputs, value);
  }

  /**
   * New layer fed by every `(parent, selector)` pair, followed by `activation`.
   *
   * Returns `undefined` (builder unchanged) when `parents` is empty, when a parent's width differs
   * from its selector's input width, or when the selectors disagree on output width.
   */
  standardLayer(
    parents: ReadonlyArray<readonly [LayerHandle, WeightSelector]>,
    activation: ActivationFunction
  ): LayerHandle | undefined {
    this.assertOpen();
    if (parents.length === 0) return undefined;
    for (const [layer, selector] of parents) {
      this.assertOwnedLayer(layer);
      this.assertOwnedSelector(selector);
    }
    const width = parents[0][1].outputs;
    const compatible = parents.every(
      ([layer, selector]) => layer.size === selector.inputs && selector.outputs === width
    );
    if (!compatible) return undefined;

    const layer = this.allocate(width);
    const patches = parents.map(
      ([parent, selector]): WeightPatchOperation => ({
        type: 'weightPatch',
        source: parent.first,
        target: layer.first,
        selector,
      })
    );
    this.emit(...patches, {
      type: 'activation',
      start: layer.first,
      end: layer.last,
      activation,
    });
    return layer;
  }

  /**
   * {@link standardLayer} followed by a randomization pass over the new layer.
   * Available on stochastic sessions only.
   */
  stochasticLayer(
    this: NetworkBuilder<true>,
    parents: ReadonlyArray<readonly [LayerHandle, WeightSelector]>,
    activation: ActivationFunction,
    sampler: SamplingFunction
  ): LayerHandle | undefined {
    const layer = this.standardLayer(parents, activation);
    if (layer === undefined) return undefined;
    this.emit({ type: 'randomization', start: layer.first, end: layer.last, sampler });
    return layer;
  }

  /** Softmax of `layer` into a fresh layer of the same width (gradient-opaque). */
  softMaxLayer(layer: LayerHandle): LayerHandle {
    this.assertOpen();
    this.assertOwnedLayer(layer);
    const target = this.allocate(layer.size);
    this.emit({ type: 'softMax', source: layer.first, target: target.first, width: layer.size });
    return target;
  }

  /**
   * Element-wise sum of equally wide layers (gradient-opaque).
   * `undefined` when `layers` is empty or widths differ.
   */
  pointwiseSum(layers: readonly LayerHandle[]): LayerHandle | undefined {
    return this.pointwiseCombine('pointwiseSum', layers);
  }

  /**
   * Element-wise product of equally wide layers (gradient-opaque).
   * `undefined` when `layers` is empty or widths differ.
   */
  pointwiseProduct(layers: readonly LayerHandle[]): LayerHandle | undefined {
    return this.pointwiseCombine('pointwiseProduct', layers);
  }

  /** `fn` applied to each node of `layer`, into a fresh layer (gradient-opaque). */
  pointwiseUnary(layer: LayerHandle, fn: UnaryRule): LayerHandle {
    this.assertOpen();
    this.assertOwnedLayer(layer);
    const target = this.allocate(layer.size);
    this.emit({
      type: 'pointwiseUnary',
      source: layer.first,
      target: target.first,
      width: layer.size,
      fn,
    });
    return target;
  }

  /** Append the layer's nodes, in order, to the output list. Repeats are kept. */
  addOutputs(layer: LayerHandle): void {
    this.assertOpen();
    this.assertOwnedLayer(layer);
    this.outputs = this.outputs.concat(AppendSequence.range(layer.first, layer.size));
  }

  /** Flatten the accumulated sequences into a {@link NetworkStructure} and close the session. */
  finalize(): NetworkStructure<Stochastic> {
    this.assertOpen();
    this.finalized = true;
    return new NetworkStructure<Stochastic>(
      this.nodeCount,
      this.weightCount,
      this.inputs.toArray(),
      this.outputs.toArray(),
      this.operations.toArray(),
      this.stochastic
    );
  }

  private pointwiseCombine(
    type: 'pointwiseSum' | 'pointwiseProduct',
    layers: readonly LayerHandle[]
  ): LayerHandle | undefined {
    this.assertOpen();
    if (layers.length === 0) return undefined;
    for (const layer of layers) this.assertOwnedLayer(layer);
    const width = layers[0].size;
    if (!layers.every((layer) => layer.size === width)) return undefined;
    const target = this.allocate(width);
    const sources = layers.map((layer) => layer.first);
    const op: PointwiseSumOperation | PointwiseProductOperation =
      type === 'pointwiseSum'
        ? { type, target: target.first, width, sources }
        : { type, target: target.first, width, sources };
    this.emit(op);
    return target;
  }

  private allocate(count: number): LayerHandle {
    const first = this.nodeCount;
    this.nodeCount += count;
    return new LayerHandle(this.session, first, first + count - 1);
  }

  private emit(...ops: NetworkOperation<Stochastic>[]): void {
    this.operations = this.operations.concat(AppendSequence.fromArray(ops));
  }

  private assertOpen(): void {
    if (this.finalized) throw new BuilderFinalizedError();
  }

  private assertOwnedLayer(layer: LayerHandle): void {
    if (layer.session !== this.session) {
      throw new SessionMismatchError('Layer handle belongs to a different network builder');
    }
    if (layer.first < 0 || layer.last >= this.nodeCount || layer.size < 0) {
      throw new SessionMismatchError(
        `Layer span [${layer.first}, ${layer.last}] was not allocated by this builder`
      );
    }
  }

  private assertOwnedSelector(selector: WeightSelector): void {
    if (selector.session !== this.session) {
      throw new SessionMismatchError('Weight selector belongs to a different network builder');
    }
    if (
      selector instanceof BaseWeights &&
      (selector.base < 0 || selector.base + selector.count > this.weightCount)
    ) {
      throw new SessionMismatchError(
        `Weight block [${selector.base}, ${selector.base + selector.count}) was not reserved by this builder`
      );
    }
  }
}

function assertCount(value: number, what: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ShapeMismatchError(`${what} must be a non-negative integer, got ${value}`);
  }
}

/**
 * Run `program` against a fresh deterministic builder and finalize it.
 * @returns The structure and whatever `program` returned.
 */
export function buildNetwork<A>(
  program: (builder: NetworkBuilder<false>) => A
): [NetworkStructure<false>, A] {
  const builder = NetworkBuilder.create();
  const value = program(builder);
  return [builder.finalize(), value];
}

/** {@link buildNetwork} for sessions that may add stochastic layers. */
export function buildStochasticNetwork<A>(
  program: (builder: NetworkBuilder<true>) => A
): [NetworkStructure<true>, A] {
  const builder = NetworkBuilder.createStochastic();
  const value = program(builder);
  return [builder.finalize(), value];
}
