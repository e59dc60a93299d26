export * from "./types.js";
export * from "./errors.js";
export * from "./interfaces.js";
export * from "./registry.js";
export * from "./config.js";
