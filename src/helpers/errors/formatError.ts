import { format as formatString, types } from "node:util";

const VERB = /%[sdifjoOcw%]/g;

/**
 * Builds a plain error from a printf-style format, the way `util.format`
 * renders it.
 *
 * `%w` takes an error argument: it is rendered by its message and the first
 * such error becomes the `cause` of the result. Without arguments the format
 * is used as the message verbatim.
 *
 * @example
 * ```ts
 * formatError("read %s: %w", ["config.json", new Error("disk full")]);
 * // Error("read config.json: disk full", { cause: <the disk full error> })
 * ```
 */
export const formatError = (format: string, args: readonly unknown[]): Error => {
  if (args.length === 0) {
    return new Error(format);
  }

  const formatArgs = [...args];
  const causes: Error[] = [];
  let argIndex = 0;

  const normalized = format.replace(VERB, (verb) => {
    if (verb === "%%") return verb;

    const index = argIndex++;
    if (verb !== "%w" || index >= formatArgs.length) return verb;

    const arg = formatArgs[index];
    if (types.isNativeError(arg) || arg instanceof Error) {
      causes.push(arg);
      formatArgs[index] = arg.message;
    }

    return "%s";
  });

  const message = formatString(normalized, ...formatArgs);
  const [cause] = causes;

  return cause ? new Error(message, { cause }) : new Error(message);
};
