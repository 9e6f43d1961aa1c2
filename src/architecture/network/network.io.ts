import { warnOnce } from '../../utils/warnings';

/**
 * Positional transfer between caller vectors and declared node lists, shared by the forward
 * pass (inputs) and the reverse pass (output errors).
 */

/**
 * Copy `values` onto `nodes` positionally. Missing values leave their nodes untouched, surplus
 * values are ignored; either case warns once.
 */
export function scatter(
  target: Float64Array,
  nodes: readonly number[],
  values: ArrayLike<number>,
  what: 'input' | 'error'
): void {
  if (values.length !== nodes.length) {
    warnOnce(
      `${what}-length`,
      `Received ${values.length} ${what} values for ${nodes.length} declared ${what === 'input' ? 'inputs' : 'outputs'}; ${
        values.length < nodes.length ? 'missing entries read as 0' : 'extra entries are ignored'
      }.`
    );
  }
  const count = Math.min(values.length, nodes.length);
  for (let k = 0; k < count; k++) target[nodes[k]] = values[k];
}

/** Values of `source` at `nodes`, in order. */
export function gather(source: ArrayLike<number>, nodes: readonly number[]): Float64Array {
  const out = new Float64Array(nodes.length);
  for (let k = 0; k < nodes.length; k++) out[k] = source[nodes[k]];
  return out;
}
