import type { TraceableError } from "@/types";
import { hasStackTrace } from "./hasStackTrace";

// A throwing `cause` getter ends the walk.
const readCause = (value: object): unknown => {
  try {
    return "cause" in value ? value.cause : undefined;
  } catch {
    return undefined;
  }
};

/**
 * Follows the `cause` chain of an error one layer at a time and returns the
 * first link that already carries a stack trace.
 *
 * The error itself is not checked, only its causes. Cycles end the walk.
 */
export const findTracedCause = (err: Error): TraceableError | undefined => {
  const seen = new WeakSet<object>([err]);
  let current = readCause(err);

  while (typeof current === "object" && current !== null) {
    if (seen.has(current)) return undefined;
    if (hasStackTrace(current)) return current;

    seen.add(current);
    current = readCause(current);
  }

  return undefined;
};
