export * from "./errors.js";
export * from "./gateway-config.js";
export { loadConfig, parseConfig } from "./load-config.js";
