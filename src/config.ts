/**
 * Global dagprop configuration contract & default instance.
 *
 * A central `config` object offers one documented surface for end-users (and tests) to tweak
 * library behaviour without digging through scattered constants.
 *
 * USAGE PATTERN
 * ------------
 *   import { config } from 'dagprop';
 *   config.warnings = true;            // surface padding / truncation guidance
 *   config.strictWeightCount = false;  // read short parameter buffers as zero-extended
 *
 * Values are read at call time, so changes apply to the next build / evaluation.
 *
 * DESIGN NOTES
 * ------------
 * - Plain serializable object: no setters, no proxies.
 * - Optional flags default to the conservative behaviour.
 */
export interface DagpropConfig {
  /**
   * Emit guidance to `console.warn` (each distinct warning once per process).
   * Covers input / error vectors whose length differs from the declared node lists and
   * gradient-opaque operations met during a reverse pass.
   * Default: false
   */
  warnings: boolean;

  /**
   * Reject parameter buffers whose length differs from the structure's weight count when a
   * forward pass starts. When disabled, a short buffer reads as zero beyond its end and a long
   * buffer is unused beyond the declared count.
   * Default: true
   */
  strictWeightCount: boolean;

  /**
   * Hard cap for scratch buffers retained per length bucket by the reverse-pass pool.
   * `undefined` = unlimited reuse.
   */
  poolMaxPerBucket?: number;
}

/**
 * Singleton mutable configuration object consumed throughout the library.
 * Modify properties directly; do NOT reassign the binding (imports retain reference).
 */
export const config: DagpropConfig = {
  warnings: false, // console guidance
  strictWeightCount: true, // SizeMismatchError on parameter length drift
  // poolMaxPerBucket: 8,    // example memory cap override
};
