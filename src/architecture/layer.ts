/**
 * Handle on a contiguous span of node indices allocated together by one builder session.
 *
 * Handles are only minted by {@link NetworkBuilder}; the builder checks the `session` tag of every
 * handle it receives so a layer from one construction cannot leak into another. An empty span
 * (`last === first - 1`) is valid and has size 0.
 */
export class LayerHandle {
  constructor(
    /** Tag of the builder that allocated the span. */
    readonly session: symbol,
    /** First node index (inclusive). */
    readonly first: number,
    /** Last node index (inclusive). */
    readonly last: number
  ) {}

  /** Number of nodes in the span. */
  get size(): number {
    return this.last - this.first + 1;
  }
}

/** Width of a layer handle. */
export function layerSize(layer: LayerHandle): number {
  return layer.size;
}

/** Index of the bias node, permanently valued 1. */
export const BIAS_NODE = 0;
