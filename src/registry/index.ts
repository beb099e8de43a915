export * from "./provider-descriptor.js";
export * from "./capability-registry.js";
export * from "./endpoint.js";
