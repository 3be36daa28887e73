export type ScanErrorCode =
  | "validation_failed"
  | "not_found"
  | "invalid_state"
  | "persistence_failed"
  | "dispatch_failed"
  | "identifier_allocation_failed"
  | "backpressure";

export type ScanErrorContext = {
  scanId?: string;
  status?: string;
  field?: string;
  attempts?: number;
};

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

export const unwrapCause = (reason: unknown): unknown =>
  reason instanceof Error ? reason.cause ?? reason : reason;

export class ScanServiceError extends Error {
  readonly code: ScanErrorCode;
  readonly retryable: boolean;
  readonly context: ScanErrorContext;
  readonly cause?: unknown;

  constructor(args: {
    code: ScanErrorCode;
    message: string;
    retryable: boolean;
    context?: ScanErrorContext;
    cause?: unknown;
  }) {
    super(args.message);
    this.name = "ScanServiceError";
    this.code = args.code;
    this.retryable = args.retryable;
    this.context = args.context ?? {};
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Malformed or missing input. Never mutates state. */
export class ValidationError extends ScanServiceError {
  constructor(message: string, context: ScanErrorContext = {}) {
    super({ code: "validation_failed", message, retryable: false, context });
    this.name = "ValidationError";
  }
}

export class NotFoundError extends ScanServiceError {
  constructor(scanId: string) {
    super({ code: "not_found", message: `Scan ${scanId} not found`, retryable: false, context: { scanId } });
    this.name = "NotFoundError";
  }
}

/** A submission against a scan that can no longer accept it (a terminal scan). */
export class InvalidStateError extends ScanServiceError {
  constructor(scanId: string, status: string, message?: string) {
    super({
      code: "invalid_state",
      message: message ?? `Scan ${scanId} is ${status} and no longer accepts results`,
      retryable: false,
      context: { scanId, status }
    });
    this.name = "InvalidStateError";
  }
}

export class PersistenceError extends ScanServiceError {
  constructor(message: string, context: ScanErrorContext = {}, cause?: unknown) {
    super({ code: "persistence_failed", message, retryable: true, context, cause });
    this.name = "PersistenceError";
  }
}

/**
 * The scan was stored but its dispatch message could not be published.
 * The scan stays PENDING until the reconciler republishes it.
 */
export class DispatchError extends ScanServiceError {
  constructor(scanId: string, attempts: number, cause?: unknown) {
    super({
      code: "dispatch_failed",
      message: `Failed to queue scan ${scanId} after ${attempts} attempts: ${toErrorMessage(cause)}`,
      retryable: true,
      context: { scanId, attempts },
      cause
    });
    this.name = "DispatchError";
  }
}

export class IdentifierAllocationError extends ScanServiceError {
  constructor(cause?: unknown) {
    super({
      code: "identifier_allocation_failed",
      message: `Failed to allocate scan id: ${toErrorMessage(cause)}`,
      retryable: true,
      cause
    });
    this.name = "IdentifierAllocationError";
  }
}

export class BackpressureError extends ScanServiceError {
  constructor(pending: number, limit: number) {
    super({
      code: "backpressure",
      message: `Too many pending scans (${pending} >= ${limit}), retry later`,
      retryable: true
    });
    this.name = "BackpressureError";
  }
}
