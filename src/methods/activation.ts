import { ShapeMismatchError } from '../architecture/errors';

/**
 * Activation functions in the vector form consumed by the forward pass.
 *
 * An {@link ActivationFunction} receives the raw (pre-activation) values of one layer in node
 * order and returns, for each of them, the activated value together with the local derivative
 * d(activated)/d(raw). The reverse pass multiplies incoming error by that stored derivative.
 *
 * Most activations are pointwise: {@link pointwise} lifts a scalar rule written in the
 * `(x, derivate)` style of {@link ScalarActivation} into the vector form. `softmax` is the one
 * built-in that looks at the whole layer.
 *
 * @see {@link https://en.wikipedia.org/wiki/Activation_function}
 */

/** `[activated value, local derivative]` for one node. */
export type ActivationResult = readonly [value: number, derivative: number];

/**
 * Ordered raw values in, ordered `(value, derivative)` pairs out, same length.
 * The function's `name` is used in diagnostics.
 */
export type ActivationFunction = (values: readonly number[]) => ActivationResult[];

/** Scalar rule: the activation of `x`, or its derivative when `derivate` is true. */
export type ScalarRule = (x: number, derivate?: boolean) => number;

/**
 * Scalar activation rules. Each accepts an input value `x` and an optional `derivate` flag
 * returning the derivative with respect to `x` instead of the output.
 */
export class ScalarActivation {
  /** Logistic sigmoid, range (0, 1). */
  static logistic(x: number, derivate: boolean = false): number {
    const fx = 1 / (1 + Math.exp(-x));
    return !derivate ? fx : fx * (1 - fx);
  }

  /** Hyperbolic tangent, range (-1, 1). */
  static tanh(x: number, derivate: boolean = false): number {
    return derivate ? 1 - Math.pow(Math.tanh(x), 2) : Math.tanh(x);
  }

  /** Linear pass-through, f(x) = x. */
  static identity(x: number, derivate: boolean = false): number {
    return derivate ? 1 : x;
  }

  /** Binary step; derivative 0 everywhere. */
  static step(x: number, derivate: boolean = false): number {
    return derivate ? 0 : x > 0 ? 1 : 0;
  }

  /** f(x) = max(0, x). */
  static relu(x: number, derivate: boolean = false): number {
    return derivate ? (x > 0 ? 1 : 0) : x > 0 ? x : 0;
  }

  /** f(x) = x / (1 + |x|). */
  static softsign(x: number, derivate: boolean = false): number {
    const d = 1 + Math.abs(x);
    return derivate ? 1 / Math.pow(d, 2) : x / d;
  }

  static sinusoid(x: number, derivate: boolean = false): number {
    return derivate ? Math.cos(x) : Math.sin(x);
  }

  /** f(x) = exp(-x^2). */
  static gaussian(x: number, derivate: boolean = false): number {
    const d = Math.exp(-Math.pow(x, 2));
    return derivate ? -2 * x * d : d;
  }

  /**
   * Softplus, a smooth ReLU: f(x) = ln(1 + e^x). Derivative is the logistic sigmoid.
   * Large |x| short-circuits to avoid overflow in `exp`.
   */
  static softplus(x: number, derivate: boolean = false): number {
    if (derivate) return 1 / (1 + Math.exp(-x));
    if (x > 30) return x;
    if (x < -30) return Math.exp(x);
    return Math.max(0, x) + Math.log(1 + Math.exp(-Math.abs(x)));
  }
}

/** Lift a scalar rule into an {@link ActivationFunction} named `name`. */
export function pointwise(name: string, rule: ScalarRule): ActivationFunction {
  const fn: ActivationFunction = (values) =>
    values.map((x): ActivationResult => [rule(x, false), rule(x, true)]);
  return Object.defineProperty(fn, 'name', { value: name });
}

/**
 * Softmax over the whole layer (max-shifted for stability). The stored derivative is the
 * diagonal term s(1 - s) of the Jacobian.
 */
export const softmax: ActivationFunction = Object.defineProperty(
  (values: readonly number[]): ActivationResult[] => {
    if (values.length === 0) return [];
    const max = Math.max(...values);
    const exps = values.map((x) => Math.exp(x - max));
    const total = exps.reduce((sum, e) => sum + e, 0);
    return exps.map((e): ActivationResult => {
      const s = e / total;
      return [s, s * (1 - s)];
    });
  },
  'name',
  { value: 'softmax' }
);

/**
 * Built-in vector activations. Custom functions only need to satisfy {@link ActivationFunction}.
 */
export const Activation = {
  identity: pointwise('identity', ScalarActivation.identity),
  logistic: pointwise('logistic', ScalarActivation.logistic),
  tanh: pointwise('tanh', ScalarActivation.tanh),
  relu: pointwise('relu', ScalarActivation.relu),
  softsign: pointwise('softsign', ScalarActivation.softsign),
  sinusoid: pointwise('sinusoid', ScalarActivation.sinusoid),
  gaussian: pointwise('gaussian', ScalarActivation.gaussian),
  step: pointwise('step', ScalarActivation.step),
  softplus: pointwise('softplus', ScalarActivation.softplus),
  softmax,
} as const;

/**
 * Invoke `fn` and check the collaborator honoured the same-length contract.
 * @throws ShapeMismatchError when the result length differs from the input length.
 */
export function applyActivation(
  fn: ActivationFunction,
  values: readonly number[]
): ActivationResult[] {
  const result = fn(values);
  if (result.length !== values.length) {
    throw new ShapeMismatchError(
      `Activation '${fn.name || 'anonymous'}' returned ${result.length} results for ${values.length} inputs`
    );
  }
  return result;
}

export default Activation;
