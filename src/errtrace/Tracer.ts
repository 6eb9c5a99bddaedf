import {
  DEFAULT_FRAME_CAPACITY,
  DEFAULT_FRAME_SKIP_COUNT,
  LOG_PREFIX,
} from "@/constants";
import {
  captureFrames,
  findTracedCause,
  formatError,
  getStackTrace,
  hasStackTrace,
  toError,
} from "@/helpers";
import type {
  ResolvedTracerConfig,
  StackFrame,
  TraceableError,
  TracerConfig,
} from "@/types";
import { TracedError } from "./TracedError";

const assertCount = (field: keyof TracerConfig, value: number): number => {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(
      `Invalid tracer config: ${field} must be a non-negative integer, got ${value}`
    );
  }

  return value;
};

/**
 * Attaches stack traces to errors.
 *
 * Every operation is bound to its tracer, so methods can be passed around or
 * destructured without adding a call frame.
 *
 * @example
 * ```ts
 * import { Tracer } from "errtrace";
 *
 * // Skips the extra frame of a helper that calls wrap() on the user's behalf.
 * const tracer = new Tracer({ skipDepth: 3 });
 * export const rethrow = (err: unknown): never => {
 *   throw tracer.wrap(err);
 * };
 * ```
 */
class Tracer {
  private readonly config: ResolvedTracerConfig;

  constructor(config: TracerConfig = {}) {
    this.config = this.configure(config);

    this.newError = this.newError.bind(this);
    this.errorf = this.errorf.bind(this);
    this.wrap = this.wrap.bind(this);
    this.unwrap = this.unwrap.bind(this);
    this.customError = this.customError.bind(this);
    this.stackTrace = this.stackTrace.bind(this);
  }

  /**
   * Resolves the configuration against the process-wide defaults.
   * The result is frozen: changing a default later has no effect on this
   * tracer.
   * @private
   */
  private configure(config: TracerConfig): ResolvedTracerConfig {
    return Object.freeze({
      frameCapacity: assertCount(
        "frameCapacity",
        config.frameCapacity ?? DEFAULT_FRAME_CAPACITY
      ),
      skipDepth: assertCount(
        "skipDepth",
        config.skipDepth ?? DEFAULT_FRAME_SKIP_COUNT
      ),
      enableInternalLogging: config.enableInternalLogging ?? false,
    });
  }

  /**
   * Returns the configuration this tracer was built with.
   */
  getConfig(): ResolvedTracerConfig {
    return this.config;
  }

  /**
   * Creates an error with a formatted message and a fresh stack trace.
   * Formatting follows `util.format`, plus `%w` for a wrapped error.
   */
  newError(message: string, ...args: unknown[]): TracedError {
    return this.trace(formatError(message, args));
  }

  /**
   * Same as `newError`.
   */
  errorf(format: string, ...args: unknown[]): TracedError {
    return this.trace(formatError(format, args));
  }

  /**
   * Adds a stack trace to an error.
   *
   * - `null` and `undefined` give `null`.
   * - An error that already carries a trace is returned unchanged.
   * - An error whose `cause` chain holds a traced error reuses that trace.
   * - Anything else is traced at this call site.
   */
  wrap(err: Error): TraceableError;
  wrap(err: null | undefined): null;
  wrap(err: unknown): TraceableError | null;
  wrap(err: unknown): TraceableError | null {
    if (err === null || err === undefined) {
      return null;
    }

    if (hasStackTrace(err)) {
      return err;
    }

    const error = toError(err);
    const tracedCause = findTracedCause(error);

    if (tracedCause) {
      return new TracedError(error, tracedCause.stackTrace());
    }

    return this.trace(error);
  }

  /**
   * Returns the original error of a traced error, `null` for `null` or
   * `undefined`, and any other value unchanged.
   */
  unwrap(err: null | undefined): null;
  unwrap(err: Error): Error;
  unwrap(err: unknown): unknown;
  unwrap(err: unknown): unknown {
    if (err === null || err === undefined) {
      return null;
    }

    return hasStackTrace(err) ? err.unwrap() : err;
  }

  /**
   * Creates a traced error from frames computed elsewhere. Nothing is
   * captured.
   */
  customError(err: Error, frames: readonly StackFrame[]): TracedError {
    return new TracedError(err, frames);
  }

  /**
   * Returns the stack trace of an error, or an empty array when it has none.
   */
  stackTrace(err: unknown): readonly StackFrame[] {
    return getStackTrace(err);
  }

  /**
   * Captures the caller's stack. Must be called directly from a public
   * operation: the skip depth counts this frame and the operation's.
   * @private
   */
  private trace(err: Error): TracedError {
    const frames = captureFrames(
      this.config.skipDepth,
      this.config.frameCapacity,
      {
        onUnavailable: (reason) => {
          if (this.config.enableInternalLogging) {
            console.warn(`${LOG_PREFIX} Stack capture unavailable: ${reason}`);
          }
        },
      }
    );

    return new TracedError(err, frames);
  }
}

/**
 * Tracer built from the default frame capacity and skip depth.
 */
export const DefaultTracer = new Tracer();

export const { newError, errorf, wrap, unwrap, customError, stackTrace } =
  DefaultTracer;

export { Tracer };
