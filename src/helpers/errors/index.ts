export * from "./findTracedCause";
export * from "./formatError";
export * from "./hasStackTrace";
export * from "./toError";
