import { fileURLToPath } from "node:url";
import { ANONYMOUS_FUNCTION } from "@/constants";
import { Frame } from "@/errtrace/Frame";

const FRAME_PREFIX = /^\s*at\s+/;
const CALL_WITH_LOCATION = /^(.*?) \((.*)\)$/;
const LOCATION_WITH_COLUMN = /^(.*):(\d+):(\d+)$/;
const LOCATION_WITH_LINE = /^(.*):(\d+)$/;

/**
 * Splits a V8 location such as `/app/server.js:42:13` into path and line.
 * Locations without a line (`<anonymous>`, `native`) keep their text as the
 * path and get line `0`.
 */
const parseLocation = (location: string): { path: string; line: number } => {
  const match =
    location.match(LOCATION_WITH_COLUMN) ?? location.match(LOCATION_WITH_LINE);

  if (!match) {
    return { path: location, line: 0 };
  }

  const [, path = "", line = "0"] = match;

  return { path, line: Number(line) };
};

const toFilePath = (path: string): string => {
  if (!path.startsWith("file://")) return path;

  try {
    return fileURLToPath(path);
  } catch {
    return path;
  }
};

/**
 * Parses one line of a V8 stack trace into a frame.
 *
 * @example
 * ```ts
 * parseStackLine("    at Server.handle (/app/server.js:42:13)");
 * // Frame { func: "Server.handle", path: "/app/server.js", line: 42 }
 * ```
 *
 * @returns The frame, or `null` when the line is not a frame line.
 */
export const parseStackLine = (stackLine: string): Frame | null => {
  if (!FRAME_PREFIX.test(stackLine)) return null;

  let body = stackLine.replace(FRAME_PREFIX, "").trim();

  if (body.startsWith("async ")) {
    body = body.slice("async ".length);
  }

  let func = ANONYMOUS_FUNCTION;
  let location = body;

  const call = body.match(CALL_WITH_LOCATION);
  if (call) {
    func = call[1] || ANONYMOUS_FUNCTION;
    location = call[2] ?? "";
  }

  const { path, line } = parseLocation(location);

  return new Frame({ func, path: toFilePath(path), line });
};
