// Public API surface for provider-bridge
export * from "./types/index.js";
export * from "./config/index.js";
export * from "./registry/index.js";
export * from "./credentials/index.js";
export * from "./transport/index.js";
export * from "./providers/index.js";
export * from "./handlers/index.js";
export * from "./dispatcher/index.js";
export * from "./observability/index.js";
export * from "./gateway.js";
