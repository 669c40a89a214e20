import { IntegrityError } from "./errors.js";

const BASE64URL_RE = /^[A-Za-z0-9_-]*$/;

export function base64urlEncode(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("base64url");
}

export function base64urlDecode(input: string): Uint8Array {
  if (!BASE64URL_RE.test(input) || input.length % 4 === 1) throw new IntegrityError(`invalid base64url: ${input}`);
  return new Uint8Array(Buffer.from(input, "base64url"));
}
