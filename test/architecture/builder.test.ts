import {
  Activation,
  BuilderFinalizedError,
  buildNetwork,
  buildStochasticNetwork,
  dropoutSampler,
  NetworkBuilder,
  SessionMismatchError,
  ShapeMismatchError,
  structureBaseWeights,
  structureNodes,
} from '../../src/dagprop';
import { requireLayer } from '../utils/test-helpers';

describe('NetworkBuilder', () => {
  describe('Scenario: inputs only', () => {
    it('counts the bias plus every input node', () => {
      // Arrange
      const [structure] = buildNetwork((b) => b.addInputs(3));
      // Act
      const nodes = structureNodes(structure);
      // Assert
      expect(nodes).toBe(4);
    });
    it('declares inputs 1..n in order', () => {
      // Arrange
      const [structure] = buildNetwork((b) => b.addInputs(3));
      // Act
      const inputs = structure.inputNodes;
      // Assert
      expect(inputs).toEqual([1, 2, 3]);
    });
    it('returns the handle produced by the program', () => {
      // Arrange / Act
      const [, handle] = buildNetwork((b) => b.addInputs(3));
      // Assert
      expect([handle.first, handle.last, handle.size]).toEqual([1, 3, 3]);
    });
    it('treats addInputs(0) as an empty, valid span', () => {
      // Arrange
      const builder = NetworkBuilder.create();
      // Act
      const empty = builder.addInputs(0);
      // Assert
      expect([empty.size, builder.nodes]).toEqual([0, 1]);
    });
    it('rejects non-integer input counts', () => {
      // Arrange
      const builder = NetworkBuilder.create();
      // Act / Assert
      expect(() => builder.addInputs(1.5)).toThrow(ShapeMismatchError);
    });
  });

  describe('Scenario: weight allocation', () => {
    it('places consecutive blocks back to back', () => {
      // Arrange
      const builder = NetworkBuilder.create();
      builder.addBaseWeights(2, 3);
      // Act
      const second = builder.addBaseWeights(1, 1);
      // Assert
      expect([second.base, builder.weights]).toEqual([6, 7]);
    });
    it('addresses entry (i, j) at base + i + inputs * j', () => {
      // Arrange
      const builder = NetworkBuilder.create();
      builder.addBaseWeights(1, 1);
      const block = builder.addBaseWeights(3, 2);
      // Act
      const address = block.addressOf(2, 1);
      // Assert
      expect(address).toBe(1 + 2 + 3 * 1);
    });
    it('fixed selectors reserve no parameter slots', () => {
      // Arrange
      const builder = NetworkBuilder.create();
      // Act
      builder.fixedWeights(4, 4, 0.5);
      // Assert
      expect(builder.weights).toBe(0);
    });
  });

  describe('standardLayer()', () => {
    it('returns undefined for an empty parent list', () => {
      // Arrange
      const builder = NetworkBuilder.create();
      // Act
      const layer = builder.standardLayer([], Activation.identity);
      // Assert
      expect(layer).toBeUndefined();
    });
    describe('when a parent width differs from its selector input width', () => {
      const setup = () => {
        const builder = NetworkBuilder.create();
        const input = builder.addInputs(2);
        const w = builder.addBaseWeights(3, 1);
        return { builder, input, w };
      };
      it('returns undefined', () => {
        // Arrange
        const { builder, input, w } = setup();
        // Act
        const layer = builder.standardLayer([[input, w]], Activation.identity);
        // Assert
        expect(layer).toBeUndefined();
      });
      it('leaves node and weight counts unchanged', () => {
        // Arrange
        const { builder, input, w } = setup();
        const before = [builder.nodes, builder.weights];
        // Act
        builder.standardLayer([[input, w]], Activation.identity);
        // Assert
        expect([builder.nodes, builder.weights]).toEqual(before);
      });
      it('emits no operations', () => {
        // Arrange
        const { builder, input, w } = setup();
        builder.standardLayer([[input, w]], Activation.identity);
        // Act
        const structure = builder.finalize();
        // Assert
        expect(structure.operations).toHaveLength(0);
      });
    });
    it('returns undefined when selectors disagree on output width', () => {
      // Arrange
      const builder = NetworkBuilder.create();
      const a = builder.addInputs(1);
      const b = builder.addInputs(1);
      // Act
      const layer = builder.standardLayer(
        [
          [a, builder.addBaseWeights(1, 2)],
          [b, builder.addBaseWeights(1, 3)],
        ],
        Activation.identity
      );
      // Assert
      expect(layer).toBeUndefined();
    });
    it('emits one patch per parent followed by one activation', () => {
      // Arrange
      const builder = NetworkBuilder.create();
      const input = builder.addInputs(2);
      builder.standardLayer(
        [
          [input, builder.addBaseWeights(2, 2)],
          [builder.bias, builder.addBaseWeights(1, 2)],
        ],
        Activation.tanh
      );
      // Act
      const structure = builder.finalize();
      // Assert
      expect(structure.operations.map((op) => op.type)).toEqual([
        'weightPatch',
        'weightPatch',
        'activation',
      ]);
    });
    it('targets the freshly allocated span from every patch', () => {
      // Arrange
      const builder = NetworkBuilder.create();
      const input = builder.addInputs(2);
      const layer = requireLayer(
        builder.standardLayer(
          [
            [input, builder.addBaseWeights(2, 2)],
            [builder.bias, builder.addBaseWeights(1, 2)],
          ],
          Activation.tanh
        )
      );
      // Act
      const targets = builder
        .finalize()
        .operations.flatMap((op) => (op.type === 'weightPatch' ? [op.target] : []));
      // Assert
      expect(targets).toEqual([layer.first, layer.first]);
    });
  });

  describe('stochasticLayer()', () => {
    it('appends a randomization after the activation', () => {
      // Arrange
      const [structure] = buildStochasticNetwork((b) => {
        const input = b.addInputs(1);
        b.stochasticLayer([[input, b.addBaseWeights(1, 2)]], Activation.logistic, dropoutSampler(0.5));
      });
      // Act
      const types = structure.operations.map((op) => op.type);
      // Assert
      expect(types).toEqual(['weightPatch', 'activation', 'randomization']);
    });
    it('adds nothing when the underlying layer fails', () => {
      // Arrange
      const [structure] = buildStochasticNetwork((b) => {
        const input = b.addInputs(1);
        b.stochasticLayer([[input, b.addBaseWeights(2, 2)]], Activation.logistic, dropoutSampler(0.5));
      });
      // Act
      const count = structure.operations.length;
      // Assert
      expect(count).toBe(0);
    });
    it('marks the structure as stochastic', () => {
      // Arrange / Act
      const [structure] = buildStochasticNetwork((b) => b.addInputs(1));
      // Assert
      expect(structure.stochastic).toBe(true);
    });
  });

  describe('pointwise combinators', () => {
    it('pointwiseSum returns undefined for layers of different widths', () => {
      // Arrange
      const builder = NetworkBuilder.create();
      const a = builder.addInputs(2);
      const b = builder.addInputs(3);
      // Act
      const sum = builder.pointwiseSum([a, b]);
      // Assert
      expect(sum).toBeUndefined();
    });
    it('pointwiseProduct returns undefined for an empty list', () => {
      // Arrange
      const builder = NetworkBuilder.create();
      // Act
      const product = builder.pointwiseProduct([]);
      // Assert
      expect(product).toBeUndefined();
    });
    it('softMaxLayer allocates a span as wide as its source', () => {
      // Arrange
      const builder = NetworkBuilder.create();
      const input = builder.addInputs(4);
      // Act
      const soft = builder.softMaxLayer(input);
      // Assert
      expect([soft.first, soft.size]).toEqual([5, 4]);
    });
  });

  describe('addOutputs()', () => {
    it('keeps duplicate entries when a span is marked twice', () => {
      // Arrange
      const [structure] = buildNetwork((b) => {
        const input = b.addInputs(2);
        b.addOutputs(input);
        b.addOutputs(input);
      });
      // Act
      const outputs = structure.outputNodes;
      // Assert
      expect(outputs).toEqual([1, 2, 1, 2]);
    });
    it('accepts the bias handle', () => {
      // Arrange
      const [structure] = buildNetwork((b) => b.addOutputs(b.bias));
      // Act
      const outputs = structure.outputNodes;
      // Assert
      expect(outputs).toEqual([0]);
    });
  });

  describe('Scenario: session isolation', () => {
    it('rejects a layer handle from another builder', () => {
      // Arrange
      const other = NetworkBuilder.create();
      const foreign = other.addInputs(1);
      const builder = NetworkBuilder.create();
      builder.addInputs(1);
      // Act / Assert
      expect(() => builder.addOutputs(foreign)).toThrow(SessionMismatchError);
    });
    it('rejects a weight selector from another builder', () => {
      // Arrange
      const other = NetworkBuilder.create();
      const foreign = other.addBaseWeights(1, 1);
      const builder = NetworkBuilder.create();
      const input = builder.addInputs(1);
      // Act / Assert
      expect(() => builder.standardLayer([[input, foreign]], Activation.identity)).toThrow(
        SessionMismatchError
      );
    });
  });

  describe('Scenario: finalization', () => {
    it('reports node and weight totals', () => {
      // Arrange
      const builder = NetworkBuilder.create();
      const input = builder.addInputs(2);
      builder.standardLayer([[input, builder.addBaseWeights(2, 3)]], Activation.relu);
      // Act
      const structure = builder.finalize();
      // Assert
      expect([structureNodes(structure), structureBaseWeights(structure)]).toEqual([6, 6]);
    });
    it('refuses further construction', () => {
      // Arrange
      const builder = NetworkBuilder.create();
      builder.finalize();
      // Act / Assert
      expect(() => builder.addInputs(1)).toThrow(BuilderFinalizedError);
    });
    it('freezes the operation list', () => {
      // Arrange
      const [structure] = buildNetwork((b) => b.addInputs(1));
      // Act / Assert
      expect(Object.isFrozen(structure.operations)).toBe(true);
    });
  });
});
