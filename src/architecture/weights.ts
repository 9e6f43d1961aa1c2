import { SizeMismatchError } from './errors';
import { drawMany, type RandomGenerator } from '../methods/random';

/**
 * Flat numeric buffers exchanged with the evaluation passes.
 *
 *  - {@link ParameterBuffer}: weight values addressed by weight selectors.
 *  - {@link WeightGradient}: d(loss)/d(weight) per parameter slot, output of one reverse pass.
 *  - {@link InputSensitivity}: d(loss)/d(input) per declared input, output of one reverse pass.
 *
 * All three are immutable values backed by a Float64Array they own. "Updating" parameters always
 * produces a new buffer ({@link applyDelta}). Reads past the end return 0, which is how buffers of
 * different lengths are zero-extended when combined.
 *
 * Binary format: `8 * length` bytes, IEEE-754 doubles in the platform's byte order, no header.
 * Text format: `{v1, v2, ..., vn}` with default number rendering.
 */

const NATIVE_LITTLE_ENDIAN = new Uint8Array(new Uint16Array([1]).buffer)[0] === 1;
const BYTES_PER_VALUE = 8;

abstract class FlatBuffer {
  /**
   * @param data Backing store; ownership passes to the buffer, callers must not keep
   *   writing to it.
   */
  constructor(protected readonly data: Float64Array) {}

  get length(): number {
    return this.data.length;
  }

  /** Read-only view for hot loops. */
  get values(): ArrayLike<number> {
    return this.data;
  }

  /** Value at `index`, 0 outside the buffer. */
  get(index: number): number {
    return index >= 0 && index < this.data.length ? this.data[index] : 0;
  }

  toArray(): number[] {
    return Array.from(this.data);
  }

  toString(): string {
    return `{${this.toArray().map(String).join(', ')}}`;
  }
}

export class ParameterBuffer extends FlatBuffer {
  static from(values: ArrayLike<number>): ParameterBuffer {
    return new ParameterBuffer(Float64Array.from(values));
  }

  static zeros(length: number): ParameterBuffer {
    return new ParameterBuffer(new Float64Array(length));
  }

  /** Copy zero-extended or truncated to exactly `length` values. */
  resized(length: number): Float64Array {
    const out = new Float64Array(length);
    out.set(length < this.data.length ? this.data.subarray(0, length) : this.data);
    return out;
  }

  serialize(): Uint8Array {
    const bytes = new Uint8Array(this.data.length * BYTES_PER_VALUE);
    const view = new DataView(bytes.buffer);
    for (let i = 0; i < this.data.length; i++) {
      view.setFloat64(i * BYTES_PER_VALUE, this.data[i], NATIVE_LITTLE_ENDIAN);
    }
    return bytes;
  }

  /**
   * Decode a serialized buffer. The bytes are always copied, so `bytes` may be a view at any
   * offset into a larger allocation.
   * @throws SizeMismatchError when the byte length is not a multiple of 8.
   */
  static deserialize(bytes: Uint8Array): ParameterBuffer {
    if (bytes.byteLength % BYTES_PER_VALUE !== 0) {
      throw new SizeMismatchError(
        'Serialized weights must hold whole 8-byte values',
        bytes.byteLength - (bytes.byteLength % BYTES_PER_VALUE),
        bytes.byteLength
      );
    }
    const count = bytes.byteLength / BYTES_PER_VALUE;
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    const data = new Float64Array(count);
    for (let i = 0; i < count; i++) {
      data[i] = view.getFloat64(i * BYTES_PER_VALUE, NATIVE_LITTLE_ENDIAN);
    }
    return new ParameterBuffer(data);
  }

  /** Parse the `{v1, v2}` text form. */
  static parse(text: string): ParameterBuffer {
    return new ParameterBuffer(Float64Array.from(parseBracedList(text)));
  }
}

export class WeightGradient extends FlatBuffer {
  static from(values: ArrayLike<number>): WeightGradient {
    return new WeightGradient(Float64Array.from(values));
  }

  /** Zero-length gradient; identity of {@link WeightGradient.combine}. */
  static empty(): WeightGradient {
    return new WeightGradient(new Float64Array(0));
  }

  /**
   * Element-wise sum, each operand zero-extended to the longest one.
   * Summation runs in argument order for every slot.
   */
  static combine(...updates: WeightGradient[]): WeightGradient {
    if (updates.length === 0) return WeightGradient.empty();
    if (updates.length === 1) return updates[0];
    const size = Math.max(...updates.map((u) => u.length));
    const out = new Float64Array(size);
    for (const update of updates) {
      for (let i = 0; i < update.data.length; i++) out[i] += update.data[i];
    }
    return new WeightGradient(out);
  }

  /** Multiply every slot by `factor` (e.g. to average a combined batch). */
  scale(factor: number): WeightGradient {
    return new WeightGradient(this.data.map((v) => v * factor));
  }
}

export class InputSensitivity extends FlatBuffer {}

/** Text form parser shared by the buffer types. */
function parseBracedList(text: string): number[] {
  const trimmed = text.trim();
  if (!trimmed.startsWith('{') || !trimmed.endsWith('}')) {
    throw new SyntaxError(`Expected '{v1, v2, ...}', got: ${text}`);
  }
  const body = trimmed.slice(1, -1).trim();
  if (body === '') return [];
  return body.split(',').map((raw) => {
    const token = raw.trim();
    const value = Number(token);
    if (token === '' || (Number.isNaN(value) && token !== 'NaN')) {
      throw new SyntaxError(`Invalid number '${token}' in weight list`);
    }
    return value;
  });
}

/** Ordered values into a parameter buffer. */
export function packWeights(values: readonly number[]): ParameterBuffer {
  return ParameterBuffer.from(values);
}

export function unpackWeights(weights: ParameterBuffer): number[] {
  return weights.toArray();
}

export function serializeWeights(weights: ParameterBuffer): Uint8Array {
  return weights.serialize();
}

export function deserializeWeights(bytes: Uint8Array): ParameterBuffer {
  return ParameterBuffer.deserialize(bytes);
}

export function parseWeights(text: string): ParameterBuffer {
  return ParameterBuffer.parse(text);
}

export function combineUpdates(...updates: WeightGradient[]): WeightGradient {
  return WeightGradient.combine(...updates);
}

/** Ordered sensitivities of the declared inputs. */
export function inputError(sensitivity: InputSensitivity): number[] {
  return sensitivity.toArray();
}

/**
 * `weights[i] + update[i] * learningRate` over the longer of the two, missing entries read as 0.
 * Returns a new buffer; neither operand is modified.
 */
export function applyDelta(
  learningRate: number,
  weights: ParameterBuffer,
  update: WeightGradient
): ParameterBuffer {
  const size = Math.max(weights.length, update.length);
  const out = new Float64Array(size);
  for (let i = 0; i < size; i++) {
    out[i] = weights.get(i) + update.get(i) * learningRate;
  }
  return new ParameterBuffer(out);
}

/**
 * `count` values drawn uniformly from `[low, high)`, in slot order.
 * @returns The buffer and the advanced generator.
 */
export function initialWeightsForCount(
  count: number,
  generator: RandomGenerator,
  range: readonly [number, number]
): [ParameterBuffer, RandomGenerator] {
  const [low, high] = range;
  const [draws, next] = drawMany(generator, count);
  const data = Float64Array.from(draws, (u) => low + (high - low) * u);
  return [new ParameterBuffer(data), next];
}

/** Random initial parameters sized to a structure's weight count. */
export function initialWeights(
  structure: { readonly weightCount: number },
  generator: RandomGenerator,
  range: readonly [number, number]
): [ParameterBuffer, RandomGenerator] {
  return initialWeightsForCount(structure.weightCount, generator, range);
}
