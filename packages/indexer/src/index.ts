export * from "./openai.js";
export * from "./runtime.js";
export * from "./program.js";
