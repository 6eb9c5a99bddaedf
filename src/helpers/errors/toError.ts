import { types } from "node:util";
import { safeStringify } from "../safety/safeStringify";

/**
 * Normalizes any thrown value into an `Error`.
 *
 * Errors are returned as they are, including errors from another realm
 * (a `vm` context). Anything else becomes an `Error` whose
 * message is the value's text and whose `cause` is the value itself.
 */
export const toError = (value: unknown): Error => {
  if (types.isNativeError(value) || value instanceof Error) return value;

  const message =
    typeof value === "object" && value !== null
      ? safeStringify(value)
      : String(value);

  return new Error(message, { cause: value });
};
