export * from "./captureFrames";
export * from "./parseStackLine";
