export * from "./bundle.js";
export * from "./file.js";
