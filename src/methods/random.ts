import seedrandom from 'seedrandom';

/**
 * Explicit-state randomness for stochastic layers and weight initialization.
 *
 * A {@link RandomGenerator} is an immutable value: drawing returns the sample together with the
 * generator to use next, so a forward pass that consumes randomness is reproducible from the
 * generator it was handed and reports the generator it ended with.
 */

export interface RandomGenerator {
  /** Uniform sample in [0, 1) and the successor generator. */
  next(): readonly [number, RandomGenerator];
  /**
   * Optional bulk path: the next `count` samples and the generator after them, equal to
   * `count` chained `next()` calls. Used through {@link drawMany}.
   */
  draw?(count: number): readonly [number[], RandomGenerator];
}

/**
 * Stochastic transform applied per node after activation:
 * `(generator, value, derivative) -> (newValue, newDerivative, nextGenerator)`.
 */
export type SamplingFunction = (
  generator: RandomGenerator,
  value: number,
  derivative: number
) => readonly [number, number, RandomGenerator];

type PrngState = seedrandom.State.Arc4;

/**
 * seedrandom (ARC4) generator frozen at a captured state. Every draw restores a PRNG from the
 * snapshot and snapshots again afterwards, so bulk draws through `draw(count)` pay that once.
 */
class SeededGenerator implements RandomGenerator {
  constructor(private readonly state: PrngState) {}

  next(): readonly [number, RandomGenerator] {
    const [values, next] = this.draw(1);
    return [values[0], next];
  }

  draw(count: number): readonly [number[], RandomGenerator] {
    const prng = seedrandom('', { state: this.state });
    const values: number[] = [];
    for (let i = 0; i < count; i++) values.push(prng());
    return [values, new SeededGenerator(prng.state())];
  }
}

/**
 * Replays samples drawn ahead of time, then continues with `tail`. Once the buffer is used up
 * the successor is `tail` itself.
 */
class PrefetchedGenerator implements RandomGenerator {
  private constructor(
    private readonly values: readonly number[],
    private readonly index: number,
    private readonly tail: RandomGenerator
  ) {}

  static resume(values: readonly number[], index: number, tail: RandomGenerator): RandomGenerator {
    return index < values.length ? new PrefetchedGenerator(values, index, tail) : tail;
  }

  next(): readonly [number, RandomGenerator] {
    return [this.values[this.index], PrefetchedGenerator.resume(this.values, this.index + 1, this.tail)];
  }

  draw(count: number): readonly [number[], RandomGenerator] {
    const take = Math.min(count, this.values.length - this.index);
    const head = this.values.slice(this.index, this.index + take);
    if (take === count) {
      return [head, PrefetchedGenerator.resume(this.values, this.index + take, this.tail)];
    }
    const [rest, next] = drawMany(this.tail, count - take);
    return [head.concat(rest), next];
  }
}

/** `count` samples in order and the generator after them; bulk path when the generator has one. */
export function drawMany(
  generator: RandomGenerator,
  count: number
): readonly [number[], RandomGenerator] {
  if (generator.draw) return generator.draw(count);
  const values: number[] = [];
  let gen = generator;
  for (let i = 0; i < count; i++) {
    const [u, next] = gen.next();
    values.push(u);
    gen = next;
  }
  return [values, gen];
}

/**
 * Generator yielding the same stream as `generator`, with the first `count` samples fetched in
 * one bulk draw. Samplers that draw once per node then run a whole span off a single restore.
 */
export function prefetch(generator: RandomGenerator, count: number): RandomGenerator {
  if (count <= 0) return generator;
  const [values, tail] = drawMany(generator, count);
  return PrefetchedGenerator.resume(values, 0, tail);
}

/** Reproducible generator: equal seeds give equal sample streams. */
export function seededGenerator(seed: string | number): RandomGenerator {
  const prng = seedrandom(String(seed), { state: true });
  return new SeededGenerator(prng.state());
}

/** Uniform sample in [low, high). */
export function uniform(
  generator: RandomGenerator,
  [low, high]: readonly [number, number]
): readonly [number, RandomGenerator] {
  const [u, next] = generator.next();
  return [low + (high - low) * u, next];
}

/**
 * Treat the activated value as a firing probability: the node outputs 1 with that probability,
 * 0 otherwise. The derivative is left as recorded so gradients flow as if the unit were
 * deterministic (straight-through).
 */
export function bernoulliSampler(): SamplingFunction {
  return (generator, value, derivative) => {
    const [u, next] = generator.next();
    return [u < value ? 1 : 0, derivative, next];
  };
}

/**
 * Inverted dropout: with probability `rate` the node and its derivative become 0, otherwise
 * both are scaled by 1 / (1 - rate).
 */
export function dropoutSampler(rate: number): SamplingFunction {
  if (!(rate >= 0 && rate < 1)) {
    throw new RangeError(`Dropout rate must be in [0, 1), got ${rate}`);
  }
  const scale = 1 / (1 - rate);
  return (generator, value, derivative) => {
    const [u, next] = generator.next();
    return u < rate ? [0, 0, next] : [value * scale, derivative * scale, next];
  };
}
