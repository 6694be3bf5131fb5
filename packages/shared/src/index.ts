export * from "./types/analysis.js";
export * from "./types/api.js";
export * from "./types/graph.js";
export * from "./types/upload.js";
export * from "./store.js";
