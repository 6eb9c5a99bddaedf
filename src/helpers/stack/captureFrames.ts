import type { Frame } from "@/errtrace/Frame";
import { parseStackLine } from "./parseStackLine";

/**
 * Frames between the caller of `captureFrames` and V8: `captureFrames`
 * itself and `readStack`.
 */
const INTERNAL_FRAME_COUNT = 2;

export interface CaptureOptions {
  /**
   * Called when the runtime cannot produce a V8 stack at all.
   */
  onUnavailable?: (reason: string) => void;
}

/**
 * Reads the current stack as text, omitting every frame from
 * `captureFrames` upwards. `Error.stackTraceLimit` is restored before
 * returning.
 */
const readStack = (limit: number): unknown => {
  const previousLimit = Error.stackTraceLimit;
  const holder: { stack?: unknown } = {};

  try {
    Error.stackTraceLimit = limit;
    Error.captureStackTrace(holder, captureFrames);
  } finally {
    Error.stackTraceLimit = previousLimit;
  }

  return holder.stack;
};

const toStackLines = (stack: string): string[] => {
  const lines = stack.split("\n");
  const firstFrame = lines.findIndex((line) => parseStackLine(line) !== null);

  return firstFrame === -1 ? [] : lines.slice(firstFrame);
};

/**
 * Captures the active call stack as frames, innermost first.
 *
 * The first recorded frame is the caller of `captureFrames` when
 * `skipDepth` is `0`; each extra level of `skipDepth` drops one more frame
 * from the head. `capacityHint` bounds the first capture only: when that
 * capture comes back full the stack is read again without a limit.
 *
 * Never throws. A runtime without V8 stack traces yields an empty array, and
 * the walk stops at the first line that is not a frame.
 */
export function captureFrames(
  skipDepth: number,
  capacityHint: number,
  options: CaptureOptions = {}
): Frame[] {
  if (typeof Error.captureStackTrace !== "function") {
    options.onUnavailable?.("Error.captureStackTrace is not supported");
    return [];
  }

  const wanted = skipDepth + capacityHint;
  let stack = readStack(wanted + INTERNAL_FRAME_COUNT);

  if (typeof stack !== "string") {
    options.onUnavailable?.("Error.prepareStackTrace did not return a string");
    return [];
  }

  let lines = toStackLines(stack);

  if (lines.length >= wanted) {
    stack = readStack(Infinity);
    lines = typeof stack === "string" ? toStackLines(stack) : lines;
  }

  const frames: Frame[] = [];

  for (const line of lines.slice(skipDepth)) {
    const frame = parseStackLine(line);
    if (!frame) break;

    frames.push(frame);
  }

  return frames;
}
