import {
  applyDelta,
  combineUpdates,
  deserializeWeights,
  drawMany,
  initialWeightsForCount,
  packWeights,
  ParameterBuffer,
  parseWeights,
  seededGenerator,
  serializeWeights,
  SizeMismatchError,
  unpackWeights,
  WeightGradient,
  type RandomGenerator,
} from '../../src/dagprop';

/** Replays a fixed list of draws. */
class ScriptedGenerator implements RandomGenerator {
  constructor(private readonly draws: readonly number[], private readonly index = 0) {}
  next(): readonly [number, RandomGenerator] {
    return [this.draws[this.index], new ScriptedGenerator(this.draws, this.index + 1)];
  }
}

describe('Weight buffers', () => {
  describe('packWeights() / unpackWeights()', () => {
    it('preserves order', () => {
      // Arrange
      const values = [3, -1, 0.5];
      // Act
      const unpacked = unpackWeights(packWeights(values));
      // Assert
      expect(unpacked).toEqual([3, -1, 0.5]);
    });
    it('copies the source array', () => {
      // Arrange
      const values = [1, 2];
      const buffer = packWeights(values);
      // Act
      values[0] = 99;
      // Assert
      expect(buffer.get(0)).toBe(1);
    });
    it('get() reads 0 past the end', () => {
      // Arrange
      const buffer = packWeights([1]);
      // Act
      const value = buffer.get(10);
      // Assert
      expect(value).toBe(0);
    });
  });

  describe('combineUpdates()', () => {
    it('zero-extends the shorter operand', () => {
      // Arrange
      const a = WeightGradient.from([1, 2, 3]);
      const b = WeightGradient.from([10, 20]);
      // Act
      const combined = combineUpdates(a, b);
      // Assert
      expect(combined.toArray()).toEqual([11, 22, 3]);
    });
    it('treats the empty gradient as identity', () => {
      // Arrange
      const a = WeightGradient.from([1, 2]);
      // Act
      const combined = combineUpdates(WeightGradient.empty(), a);
      // Assert
      expect(combined.toArray()).toEqual([1, 2]);
    });
    it('returns an empty gradient for no operands', () => {
      // Act
      const combined = combineUpdates();
      // Assert
      expect(combined.length).toBe(0);
    });
    describe('Scenario: operands of different lengths', () => {
      const a = WeightGradient.from([1, 2, 3]);
      const b = WeightGradient.from([10, 20]);
      const c = WeightGradient.from([0.5]);
      it('is commutative', () => {
        // Act
        const ab = combineUpdates(a, b).toArray();
        const ba = combineUpdates(b, a).toArray();
        // Assert
        expect(ab).toEqual(ba);
      });
      it('is associative', () => {
        // Act
        const left = combineUpdates(combineUpdates(a, b), c).toArray();
        const right = combineUpdates(a, combineUpdates(b, c)).toArray();
        // Assert
        expect(left).toEqual(right);
      });
      it('sums slot by slot over the longest operand', () => {
        // Act
        const combined = combineUpdates(a, b, c).toArray();
        // Assert
        expect(combined).toEqual([11.5, 22, 3]);
      });
    });
    it('scale() multiplies every slot', () => {
      // Arrange
      const gradient = WeightGradient.from([2, -4]);
      // Act
      const scaled = gradient.scale(0.5);
      // Assert
      expect(scaled.toArray()).toEqual([1, -2]);
    });
  });

  describe('applyDelta()', () => {
    it('adds the scaled update over the longer length', () => {
      // Arrange
      const weights = packWeights([1, 1]);
      const update = WeightGradient.from([0.5, 0.25, 3]);
      // Act
      const next = applyDelta(2, weights, update);
      // Assert
      expect(next.toArray()).toEqual([2, 1.5, 6]);
    });
    it('leaves the weights unchanged at learning rate 0', () => {
      // Arrange
      const weights = packWeights([0.25, -0.5]);
      // Act
      const next = applyDelta(0, weights, WeightGradient.from([7, 8]));
      // Assert
      expect(next.toArray()).toEqual([0.25, -0.5]);
    });
    it('does not modify its operands', () => {
      // Arrange
      const weights = packWeights([1]);
      // Act
      applyDelta(1, weights, WeightGradient.from([1]));
      // Assert
      expect(weights.toArray()).toEqual([1]);
    });
  });

  describe('Binary form', () => {
    it('uses 8 bytes per value', () => {
      // Act
      const bytes = serializeWeights(packWeights([1, -2.5, 3]));
      // Assert
      expect(bytes.byteLength).toBe(24);
    });
    it('writes doubles in platform byte order', () => {
      // Arrange
      const bytes = serializeWeights(packWeights([1.5]));
      // Act
      const value = new Float64Array(bytes.buffer)[0];
      // Assert
      expect(value).toBe(1.5);
    });
    it('decodes what it encodes', () => {
      // Arrange
      const bytes = serializeWeights(packWeights([1, -2.5, Number.MAX_VALUE]));
      // Act
      const decoded = deserializeWeights(bytes);
      // Assert
      expect(decoded.toArray()).toEqual([1, -2.5, Number.MAX_VALUE]);
    });
    it('decodes a view at a nonzero offset', () => {
      // Arrange
      const padded = new Uint8Array(16);
      padded.set(serializeWeights(packWeights([3])), 8);
      // Act
      const decoded = deserializeWeights(padded.subarray(8));
      // Assert
      expect(decoded.toArray()).toEqual([3]);
    });
    it('decodes zero bytes to an empty buffer', () => {
      // Act
      const decoded = deserializeWeights(new Uint8Array(0));
      // Assert
      expect(decoded.length).toBe(0);
    });
    it('rejects a length that is not a multiple of 8', () => {
      // Arrange
      const bytes = new Uint8Array(7);
      // Act / Assert
      expect(() => deserializeWeights(bytes)).toThrow(SizeMismatchError);
    });
  });

  describe('Text form', () => {
    it('renders values in braces', () => {
      // Act
      const text = packWeights([1, 2.5, -3]).toString();
      // Assert
      expect(text).toBe('{1, 2.5, -3}');
    });
    it('renders an empty buffer as {}', () => {
      // Act
      const text = ParameterBuffer.zeros(0).toString();
      // Assert
      expect(text).toBe('{}');
    });
    it('parses its own rendering', () => {
      // Act
      const parsed = parseWeights('{1, 2.5, -3}');
      // Assert
      expect(parsed.toArray()).toEqual([1, 2.5, -3]);
    });
    it('rejects text without braces', () => {
      // Act / Assert
      expect(() => parseWeights('1, 2')).toThrow(SyntaxError);
    });
    it('rejects a non-numeric entry', () => {
      // Act / Assert
      expect(() => parseWeights('{1, x}')).toThrow("Invalid number 'x' in weight list");
    });
  });

  describe('initialWeightsForCount()', () => {
    it('maps draws into the requested range in slot order', () => {
      // Arrange
      const generator = new ScriptedGenerator([0, 0.5, 0.25]);
      // Act
      const [weights] = initialWeightsForCount(3, generator, [-1, 1]);
      // Assert
      expect(weights.toArray()).toEqual([-1, 0, -0.5]);
    });
    it('returns the generator past the last draw', () => {
      // Arrange
      const generator = new ScriptedGenerator([0, 0.5, 0.25, 0.75]);
      // Act
      const [, next] = initialWeightsForCount(3, generator, [-1, 1]);
      // Assert
      expect(next.next()[0]).toBe(0.75);
    });
    it('matches one uniform draw per slot from the same seed', () => {
      // Arrange
      const [weights] = initialWeightsForCount(4, seededGenerator('test-seed'), [-1, 1]);
      // Act
      const [expected] = drawMany(seededGenerator('test-seed'), 4);
      // Assert
      expect(weights.toArray()).toEqual(expected.map((u) => -1 + 2 * u));
    });
    it('is reproducible from a seed', () => {
      // Act
      const [a] = initialWeightsForCount(5, seededGenerator('test-seed'), [-0.1, 0.1]);
      const [b] = initialWeightsForCount(5, seededGenerator('test-seed'), [-0.1, 0.1]);
      // Assert
      expect(a.toArray()).toEqual(b.toArray());
    });
  });
});
