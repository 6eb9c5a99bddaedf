import { getStackTrace, toError } from "@/helpers";

/**
 * Formats an error as its message followed by one line per frame,
 * `"<path>:<line> <func>()"`. Values without a trace give the message alone.
 */
export const sprint = (err: unknown): string => {
  if (err === null || err === undefined) return "";

  const lines = [toError(err).message];

  for (const frame of getStackTrace(err)) {
    lines.push(frame.describe());
  }

  return lines.join("\n");
};

/**
 * Writes `sprint(err)` to the console's error stream.
 */
export const print = (err: unknown): void => {
  console.error(sprint(err));
};
