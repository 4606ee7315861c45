export * from "./types";
export * from "./errors";
export * from "./pagination";
export * from "./projector";
