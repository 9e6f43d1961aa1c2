/**
 * Error kinds raised by the builder, the evaluation passes and the buffer codecs.
 *
 * Layer construction with an empty parent list or incompatible widths is NOT an error: those
 * calls return `undefined` and leave the builder untouched. Everything below is a caller
 * precondition violation.
 */

/** Common base so callers can catch every library failure with one `instanceof`. */
export class DagpropError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Widths or counts that cannot describe a valid span, selector or activation result. */
export class ShapeMismatchError extends DagpropError {}

/** A buffer whose length does not match what the receiving operation declares. */
export class SizeMismatchError extends DagpropError {
  constructor(
    message: string,
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(`${message} (expected ${expected}, got ${actual})`);
  }
}

/** A layer handle or weight selector presented to a builder that did not create it. */
export class SessionMismatchError extends DagpropError {}

/** Any mutation attempted on a builder after `finalize()`. */
export class BuilderFinalizedError extends DagpropError {
  constructor() {
    super('Network builder already finalized; start a new builder to add operations.');
  }
}
