export * from "./errors";
export * from "./safety/safeStringify";
export * from "./stack";
