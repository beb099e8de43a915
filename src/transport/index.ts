export * from "./transport.js";
export * from "./sse.js";
export * from "./fetch-transport.js";
export * from "./in-memory-transport.js";
