export * from "./credentials.js";
export * from "./credential-providers.js";
