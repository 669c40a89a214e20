import type { PatchdropError, PatchdropErrorCode } from "@patchdrop/auth";
import {
  AuthorizationError,
  ConflictError,
  IntegrityError,
  TransportError,
  errorMessage,
  isPatchdropError,
} from "@patchdrop/auth";

export type WireErrorCode = PatchdropErrorCode | "internal";

/** Error as it travels in an HTTP body or a peer message. */
export type WireError = {
  code: WireErrorCode;
  message: string;
  retriable?: boolean;
  role?: string;
  required?: number;
  got?: number;
};

export function toWireError(err: unknown): WireError {
  if (!isPatchdropError(err)) return { code: "internal", message: errorMessage(err) };
  const out: WireError = { code: err.code, message: err.message };
  if (err instanceof TransportError) out.retriable = err.retriable;
  if (err instanceof AuthorizationError) {
    if (err.role !== undefined) out.role = err.role;
    if (err.required !== undefined) out.required = err.required;
    if (err.got !== undefined) out.got = err.got;
  }
  return out;
}

export function fromWireError(wire: WireError, opts: { status?: number; url?: string } = {}): PatchdropError {
  switch (wire.code) {
    case "integrity":
      return new IntegrityError(wire.message);
    case "authorization":
      return new AuthorizationError(wire.message, { role: wire.role, required: wire.required, got: wire.got });
    case "conflict":
      return new ConflictError(wire.message, { attempts: 0 });
    case "transport":
      return new TransportError(wire.message, { retriable: wire.retriable ?? true, ...opts });
    case "internal":
      return new TransportError(`remote failure: ${wire.message}`, { retriable: true, ...opts });
  }
}

export function httpStatusOf(err: unknown): number {
  if (!isPatchdropError(err)) return 500;
  switch (err.code) {
    case "integrity":
      return 400;
    case "authorization":
      return 403;
    case "conflict":
      return 409;
    case "transport":
      return err instanceof TransportError && err.status !== undefined ? err.status : 502;
  }
}

const WIRE_CODES: readonly string[] = ["integrity", "authorization", "conflict", "transport", "internal"];

function isWireErrorCode(val: unknown): val is WireErrorCode {
  return typeof val === "string" && WIRE_CODES.includes(val);
}

function isObject(val: unknown): val is Record<string, unknown> {
  return typeof val === "object" && val !== null && !Array.isArray(val);
}

function numberField(obj: Record<string, unknown>, key: string): number | undefined {
  const val = obj[key];
  return typeof val === "number" ? val : undefined;
}

/**
 * Error for a failed HTTP response. A `{ error: WireError }` body keeps the
 * server's classification; otherwise the status decides.
 */
export function errorFromResponse(status: number, body: unknown, url: string): PatchdropError {
  const wire = isObject(body) && isObject(body.error) ? body.error : undefined;
  const message = wire && typeof wire.message === "string" ? wire.message : `${url} responded ${status}`;
  const code = wire?.code;
  if (wire && isWireErrorCode(code) && code !== "internal" && code !== "transport") {
    return fromWireError(
      {
        code,
        message,
        role: typeof wire.role === "string" ? wire.role : undefined,
        required: numberField(wire, "required"),
        got: numberField(wire, "got"),
      },
      { status, url }
    );
  }
  if (status === 400) return new IntegrityError(message);
  if (status === 403) return new AuthorizationError(message);
  if (status === 409) return new ConflictError(message, { attempts: 0 });
  const retriable = status === 408 || status === 429 || status >= 500;
  return new TransportError(message, { retriable, status, url });
}
