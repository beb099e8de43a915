export * from "./log.js";
export * from "./audit-logger.js";
