export * from "./types.js";
export * from "./constants.js";
export * from "./errors.js";
export * from "./parse.js";
export * from "./indicator.js";
