import type { FrameData, StackFrame, TraceableError } from "@/types";
import { Frame } from "./Frame";

/**
 * Renders frames the way V8 prints a stack, so that uncaught traced errors
 * show where they were first traced rather than where they were wrapped.
 */
const renderStack = (err: Error, frames: readonly StackFrame[]): string => {
  const header = err.message ? `${err.name}: ${err.message}` : err.name;
  const lines = frames.map(
    (frame) => `    at ${frame.func} (${frame.path}:${frame.line})`
  );

  return [header, ...lines].join("\n");
};

/**
 * An error paired with the stack trace captured when it entered the library.
 *
 * The message is the original error's message, byte for byte, and the
 * original error is kept as `cause`. The frames are copied into a frozen
 * array of `Frame`s, so the trace cannot change once the error exists.
 */
export class TracedError extends Error implements TraceableError {
  private readonly err: Error;
  private readonly frames: readonly StackFrame[];

  constructor(err: Error, frames: readonly StackFrame[]) {
    super(err.message, { cause: err });
    this.name = "TracedError";
    this.err = err;
    this.frames = Object.freeze(frames.map((frame) => Frame.from(frame)));
    this.stack = renderStack(err, this.frames);
  }

  /**
   * Returns the original error.
   */
  unwrap(): Error {
    return this.err;
  }

  /**
   * Returns the stack trace of the error, innermost frame first.
   */
  stackTrace(): readonly StackFrame[] {
    return this.frames;
  }

  toJSON(): { name: string; message: string; frames: FrameData[] } {
    return {
      name: this.name,
      message: this.message,
      frames: this.frames.map(({ func, path, line }) => ({ func, path, line })),
    };
  }
}
