export * from "./log.js";
export * from "./memory.js";
export * from "./record.js";
export * from "./state.js";
export * from "./store.js";
export * from "./topics.js";
export * from "./validate.js";
