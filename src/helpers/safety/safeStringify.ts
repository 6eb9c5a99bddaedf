import { hasStackTrace } from "../errors/hasStackTrace";

type Serialized =
  | null
  | string
  | number
  | boolean
  | Serialized[]
  | { [key: string]: Serialized };

/**
 * Safely stringifies a value for use in an error message, handling circular
 * references, special types and non-serializable values.
 * @param {unknown} value - The value to stringify.
 * @param {number} [maxDepth=5] - Maximum depth to traverse objects.
 * @returns {string} The JSON string.
 */
export const safeStringify = (value: unknown, maxDepth = 5): string => {
  const seen = new WeakSet<object>();

  const process = (val: unknown, currentDepth: number): Serialized => {
    if (val === null) return null;
    if (val === undefined) return "[undefined]";
    if (typeof val === "bigint") return `${val}n`;
    if (typeof val === "symbol") return val.toString();
    if (typeof val === "function") {
      return `[Function: ${val.name || "anonymous"}]`;
    }
    if (typeof val !== "object") return val;

    if (currentDepth >= maxDepth) {
      return "[Max Depth]";
    }

    if (seen.has(val)) {
      return "[Circular]";
    }
    seen.add(val);

    if (val instanceof Error) {
      return {
        __type: hasStackTrace(val) ? "TracedError" : "Error",
        name: val.name,
        message: val.message,
      };
    }

    if (val instanceof Date) {
      return val.toISOString();
    }

    if (val instanceof RegExp) {
      return val.toString();
    }

    if (val instanceof Map) {
      const obj: { [key: string]: Serialized } = {};
      val.forEach((v, k) => {
        obj[String(k)] = process(v, currentDepth + 1);
      });
      return obj;
    }

    if (val instanceof Set) {
      return Array.from(val).map((v) => process(v, currentDepth + 1));
    }

    if (Array.isArray(val)) {
      return val.map((item) => process(item, currentDepth + 1));
    }

    const result: { [key: string]: Serialized } = {};
    for (const [key, entry] of Object.entries(val)) {
      result[key] = process(entry, currentDepth + 1);
    }

    return result;
  };

  try {
    return JSON.stringify(process(value, 0));
  } catch (error) {
    return JSON.stringify({
      __error: "Stringification failed",
      message: error instanceof Error ? error.message : String(error),
    });
  }
};
