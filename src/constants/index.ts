/**
 * Default capacity of a captured frame sequence.
 * A hint only: deeper stacks are still captured in full.
 */
export const DEFAULT_FRAME_CAPACITY = 20;

/**
 * Number of frames dropped at the head of a capture, so that the first
 * recorded frame is the call site of a `Tracer` operation rather than the
 * tracer's own internals.
 */
export const DEFAULT_FRAME_SKIP_COUNT = 2;

/**
 * Function name recorded for frames V8 prints without one.
 */
export const ANONYMOUS_FUNCTION = "<anonymous>";

/**
 * Prefix for the library's own console output.
 */
export const LOG_PREFIX = "[errtrace]";
