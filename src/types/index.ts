export * from "./stack-trace";
export * from "./config";
