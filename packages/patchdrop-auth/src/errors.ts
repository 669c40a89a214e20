export type PatchdropErrorCode = "integrity" | "authorization" | "conflict" | "transport";

export abstract class PatchdropError extends Error {
  abstract readonly code: PatchdropErrorCode;

  constructor(message: string, opts: { cause?: unknown } = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = new.target.name;
  }
}

/** Malformed data: hash mismatch, broken reference, bad encoding. Never retried. */
export class IntegrityError extends PatchdropError {
  readonly code = "integrity" as const;
}

export class AuthorizationError extends PatchdropError {
  readonly code = "authorization" as const;
  readonly role?: string;
  readonly required?: number;
  readonly got?: number;

  constructor(message: string, opts: { role?: string; required?: number; got?: number; cause?: unknown } = {}) {
    super(message, opts);
    this.role = opts.role;
    this.required = opts.required;
    this.got = opts.got;
  }
}

/** A compare-and-swap on a ref kept losing after `attempts` tries. */
export class ConflictError extends PatchdropError {
  readonly code = "conflict" as const;
  readonly attempts: number;
  readonly ref?: string;

  constructor(message: string, opts: { attempts: number; ref?: string; cause?: unknown }) {
    super(message, opts);
    this.attempts = opts.attempts;
    this.ref = opts.ref;
  }
}

export class TransportError extends PatchdropError {
  readonly code = "transport" as const;
  readonly retriable: boolean;
  readonly status?: number;
  readonly url?: string;

  constructor(message: string, opts: { retriable?: boolean; status?: number; url?: string; cause?: unknown } = {}) {
    super(message, opts);
    this.retriable = opts.retriable ?? true;
    this.status = opts.status;
    this.url = opts.url;
  }
}

export function isPatchdropError(err: unknown): err is PatchdropError {
  return err instanceof PatchdropError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
