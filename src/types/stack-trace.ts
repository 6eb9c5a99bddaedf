/**
 * Plain record of a single call site in a stack trace.
 */
export interface FrameData {
  /** Function name as reported by the runtime, e.g. `Server.handle`. */
  func: string;
  /** Source file path, or the runtime's placeholder such as `<anonymous>`. */
  path: string;
  /** 1-based line number, `0` when the runtime reports none. */
  line: number;
}

/**
 * A call site that can render itself as `"<path>:<line> <func>()"`.
 */
export interface StackFrame extends Readonly<FrameData> {
  describe(): string;
}

/**
 * Capability of an error that carries its own stack trace.
 *
 * Any object exposing these members is treated as already traced,
 * whatever its class.
 */
export interface TraceableError extends Error {
  /**
   * Frames captured when the error was created or first wrapped,
   * innermost first.
   */
  stackTrace(): readonly StackFrame[];
  /**
   * The original error the trace was attached to.
   */
  unwrap(): Error;
}
