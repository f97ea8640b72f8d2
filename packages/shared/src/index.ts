// @postwatch/shared — configuration, logging, errors, domain types and clients
export * from "./types.js";
export * from "./errors.js";
export * from "./config.js";
export * from "./logger.js";
export * from "./source/index.js";
export * from "./summarizer/index.js";
export * from "./notifier/index.js";
export * from "./state/index.js";
