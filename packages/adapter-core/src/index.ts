export * from "./types.js";
export * from "./events.js";
export * from "./adapter.js";
export * from "./errors.js";
