export * from "./base64url.js";
export * from "./canonical.js";
export * from "./drop.js";
export * from "./errors.js";
export * from "./identity.js";
export * from "./keys.js";
export * from "./role.js";
export { concatBytes, bytesEqual } from "./internal/bytes.js";
export { assertArray, assertBytes, assertMap, assertString, get, mapGet, optional, toInteger } from "./internal/fields.js";
