export * from "./server.js";
export * from "./websocket.js";
