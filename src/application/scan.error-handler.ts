import {
  PersistenceError,
  ScanServiceError,
  toErrorMessage,
  unwrapCause,
  type ScanErrorContext
} from "../core/errors";

export const wrapStoreFailure = (reason: unknown, action: string, context: ScanErrorContext = {}): ScanServiceError => {
  if (reason instanceof ScanServiceError) return reason;
  const scope = context.scanId != null ? ` for scan ${context.scanId}` : "";
  return new PersistenceError(`Store failed to ${action}${scope}: ${toErrorMessage(reason)}`, context, unwrapCause(reason));
};

/**
 * Runs a store call, turning driver failures into a retryable PersistenceError.
 */
export const guardStore = async <T>(
  action: string,
  context: ScanErrorContext,
  fn: () => Promise<T>
): Promise<T> => {
  try {
    return await fn();
  } catch (error) {
    throw wrapStoreFailure(error, action, context);
  }
};
