export * from "./errors.js";
export * from "./http.js";
export * from "./peer.js";
export * from "./source.js";
export * from "./submission.js";
export * from "./sync.js";
export * from "./transport.js";
