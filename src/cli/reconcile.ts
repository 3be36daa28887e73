import { runReconcile } from "../composition/root";
import { isDebugMode } from "../shared/config/env";

type ErrorContext = Partial<{
  scanId: string;
  status: string;
  field: string;
  attempts: number;
}>;

type CliErrorEnvelope = {
  event: "reconcile.failed";
  name: string;
  message: string;
  code?: string;
  retryable?: boolean;
  context?: ErrorContext;
  stack?: string;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

const extractContext = (value: unknown): ErrorContext | undefined => {
  if (!isRecord(value)) return undefined;

  const context: ErrorContext = {};
  if (typeof value.scanId === "string") context.scanId = value.scanId;
  if (typeof value.status === "string") context.status = value.status;
  if (typeof value.field === "string") context.field = value.field;
  if (typeof value.attempts === "number" && Number.isFinite(value.attempts)) context.attempts = value.attempts;

  return Object.keys(context).length > 0 ? context : undefined;
};

export const buildCliErrorEnvelope = (err: unknown, includeStack: boolean): CliErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord = isRecord(err) ? err : {};

  const envelope: CliErrorEnvelope = {
    event: "reconcile.failed",
    name: error.name || "Error",
    message: error.message
  };

  if (typeof errorRecord.code === "string") {
    envelope.code = errorRecord.code;
  }
  if (typeof errorRecord.retryable === "boolean") {
    envelope.retryable = errorRecord.retryable;
  }

  const context = extractContext(errorRecord.context);
  if (context) {
    envelope.context = context;
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

export const executeReconcileCli = async (): Promise<void> => {
  try {
    await runReconcile();
  } catch (err) {
    const envelope = buildCliErrorEnvelope(err, isDebugMode());
    // eslint-disable-next-line no-console
    console.error(JSON.stringify(envelope));
    process.exit(1);
  }
};

if (require.main === module) {
  void executeReconcileCli();
}
