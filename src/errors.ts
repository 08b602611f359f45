export type CliErrorCode =
  | "INVALID_USAGE"
  | "NETWORK"
  | "REMOTE_API"
  | "NOT_FOUND"
  | "INTERNAL"
  | "INTERRUPTED";

export class CliError extends Error {
  readonly code: CliErrorCode;
  readonly hint?: string;
  readonly details?: unknown;

  constructor(code: CliErrorCode, message: string, opts?: { hint?: string; details?: unknown }) {
    super(message);
    this.name = "CliError";
    this.code = code;
    this.hint = opts?.hint;
    this.details = opts?.details;
  }
}

export class UsageError extends CliError {
  constructor(message: string, opts?: { hint?: string }) {
    super("INVALID_USAGE", message, opts);
    this.name = "UsageError";
  }
}

/** The API host could not be reached, the request timed out, or it was aborted. */
export class TransportError extends CliError {
  constructor(message: string, opts?: { hint?: string; cause?: unknown; interrupted?: boolean }) {
    super(opts?.interrupted ? "INTERRUPTED" : "NETWORK", message, {
      hint: opts?.hint,
      details: opts?.cause === undefined ? undefined : describeCause(opts.cause)
    });
    this.name = "TransportError";
  }
}

/** The API host answered with a non-2xx status. */
export class RemoteError extends CliError {
  readonly status: number;
  readonly body: string;

  constructor(status: number, statusText: string, body: string) {
    const suffix = body ? ` - ${body}` : "";
    super("REMOTE_API", `HSS API error: HTTP ${status}${statusText ? ` ${statusText}` : ""}${suffix}`, {
      details: { status, body }
    });
    this.name = "RemoteError";
    this.status = status;
    this.body = body;
  }
}

// undici hides the socket error (ECONNREFUSED, ENOTFOUND) under `cause`.
export function describeCause(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  const inner = err.cause;
  if (inner instanceof Error && inner.message && inner.message !== err.message) {
    return `${err.message}: ${inner.message}`;
  }
  return err.message;
}

const EXIT_CODE_BY_ERROR: Record<CliErrorCode, number> = {
  INVALID_USAGE: 2,
  NETWORK: 4,
  REMOTE_API: 5,
  NOT_FOUND: 6,
  INTERNAL: 1,
  INTERRUPTED: 130
};

export function exitCodeForError(err: CliError): number {
  return EXIT_CODE_BY_ERROR[err.code] ?? 1;
}

export function toCliError(err: unknown): CliError {
  if (err instanceof CliError) return err;
  if (err instanceof Error) {
    return new CliError("INTERNAL", err.message);
  }
  return new CliError("INTERNAL", String(err));
}

type JsonErrorPayload = {
  ok: false;
  error: { code: CliErrorCode; message: string; hint?: string; status?: number; body?: string };
};

export function toJsonErrorPayload(err: CliError): JsonErrorPayload {
  const payload: JsonErrorPayload = {
    ok: false,
    error: {
      code: err.code,
      message: err.message
    }
  };
  if (err.hint) payload.error.hint = err.hint;
  if (err instanceof RemoteError) {
    payload.error.status = err.status;
    payload.error.body = err.body;
  }
  return payload;
}
