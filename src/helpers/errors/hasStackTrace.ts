import type { StackFrame, TraceableError } from "@/types";

/**
 * Checks whether a value carries its own stack trace, whatever its class.
 * @param {unknown} value - Any thrown or returned value.
 * @returns {boolean} True when the value exposes `stackTrace()` and `unwrap()`.
 */
export const hasStackTrace = (value: unknown): value is TraceableError => {
  if (typeof value !== "object" || value === null) return false;

  return (
    "stackTrace" in value &&
    typeof value.stackTrace === "function" &&
    "unwrap" in value &&
    typeof value.unwrap === "function" &&
    "message" in value &&
    typeof value.message === "string"
  );
};

/**
 * Returns the frames of a traced error, or an empty array for anything else.
 */
export const getStackTrace = (err: unknown): readonly StackFrame[] => {
  return hasStackTrace(err) ? err.stackTrace() : [];
};
