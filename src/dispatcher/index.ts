export * from "./dispatcher.js";
