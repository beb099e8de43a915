export * from "./canonical-request.js";
export * from "./canonical-response.js";
export * from "./canonical-error.js";
export * from "./fine-tune.js";
