export type ErrorCode =
  | "fetch_failed"
  | "extract_failed"
  | "install_failed"
  | "clone_failed"
  | "command_failed"
  | "missing_prerequisite"
  | "integrity_mismatch"
  | "missing_output"
  | "invalid_manifest";

export class ProvisioningError extends Error {
  readonly code: ErrorCode;
  /** Tail of the failing tool's stderr, when there was one. */
  readonly stderr?: string;

  constructor(code: ErrorCode, message: string, opts: { stderr?: string; cause?: unknown } = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "ProvisioningError";
    this.code = code;
    this.stderr = opts.stderr;
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}

/** Keeps a thrown ProvisioningError as is; wraps anything else under `fallback`. */
export function toProvisioningError(e: unknown, fallback: ErrorCode): ProvisioningError {
  if (e instanceof ProvisioningError) return e;
  return new ProvisioningError(fallback, errorMessage(e), { cause: e });
}

export function tail(text: string, lines = 20): string {
  const all = text.trimEnd().split("\n");
  return all.slice(-lines).join("\n");
}
