/**
 * Configuration options for a `Tracer`.
 *
 * @example
 * ```ts
 * import { Tracer } from "errtrace";
 *
 * // A library that wraps errtrace adds one call frame of its own.
 * const tracer = new Tracer({ skipDepth: 3 });
 * ```
 */
export interface TracerConfig {
  /**
   * Expected number of frames. Bounds the first capture; deeper stacks are
   * captured again in full.
   */
  frameCapacity?: number;
  /**
   * Number of frames dropped at the head of every capture.
   */
  skipDepth?: number;
  /**
   * Flag to enable warnings about the tracer's own failures.
   */
  enableInternalLogging?: boolean;
}

/**
 * A `TracerConfig` with every field resolved.
 */
export type ResolvedTracerConfig = Readonly<Required<TracerConfig>>;
