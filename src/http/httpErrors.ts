import { ScanServiceError, ValidationError, type ScanErrorCode } from "../core/errors";

export type RouteName = "submit_scan" | "submit_result" | "get_scan";

export type ErrorBody = {
  error: {
    code: string;
    message: string;
    retryable: boolean;
  };
};

const statusByCode: Record<ScanErrorCode, number> = {
  validation_failed: 400,
  not_found: 404,
  invalid_state: 409,
  backpressure: 503,
  persistence_failed: 500,
  dispatch_failed: 500,
  identifier_allocation_failed: 500
};

// Server-side failures are reported without driver or broker details.
const publicMessageByCode: Partial<Record<ScanErrorCode, string>> = {
  persistence_failed: "Failed to store scan data",
  dispatch_failed: "Failed to queue scan",
  identifier_allocation_failed: "Failed to generate scan ID"
};

export const toHttpError = (err: unknown, route?: RouteName): { status: number; body: ErrorBody } => {
  if (!(err instanceof ScanServiceError)) {
    return {
      status: 500,
      body: { error: { code: "internal_error", message: "Internal Server Error", retryable: true } }
    };
  }

  // Workers posting results for an unknown scan get a client error, not a missing route.
  const status = err.code === "not_found" && route === "submit_result" ? 400 : statusByCode[err.code];

  return {
    status,
    body: {
      error: {
        code: err.code,
        message: publicMessageByCode[err.code] ?? err.message,
        retryable: err.retryable
      }
    }
  };
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

/**
 * Maps failures raised by express before a route runs (body parsing, path decoding)
 * to a ValidationError; anything else is passed through.
 */
export const fromRequestError = (err: unknown): unknown => {
  if (!isRecord(err)) return err;

  if (err.type === "entity.parse.failed") {
    return new ValidationError("Request body must be valid JSON");
  }
  if (err.type === "entity.too.large") {
    return new ValidationError(`Request body exceeds ${String(err.limit)} bytes`);
  }

  const status = typeof err.status === "number" ? err.status : undefined;
  if (status != null && status >= 400 && status < 500 && err instanceof Error) {
    return new ValidationError(err.message);
  }
  return err;
};
