export * from "./Frame";
export * from "./TracedError";
export * from "./Tracer";
export * from "./print";
