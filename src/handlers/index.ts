export * from "./canonical-stream.js";
export * from "./fine-tune-validation.js";
export * from "./provider-handler.js";
