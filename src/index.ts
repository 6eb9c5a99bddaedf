export * from "./errtrace";
export * from "./constants";
export * from "./helpers/errors/hasStackTrace";
export * from "./helpers/stack";
export type * from "./types";
