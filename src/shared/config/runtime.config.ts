import {
  defaultScanServiceConfig,
  scanServiceCaps,
  validateScanServiceConfig,
  type ScanServiceConfig
} from "../../application/scan-service.config";

export const runtimeCaps = {
  publishTimeoutMs: { min: 100, max: 60_000 }
} as const;

export type RuntimeConfig = {
  publishTimeoutMs: number;
  serviceConfig: ScanServiceConfig;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const defaults = defaultScanServiceConfig;
  const serviceConfig = validateScanServiceConfig({
    publishRetries: parseOptionalIntInRange(env, "PUBLISH_RETRIES", scanServiceCaps.publishRetries) ?? defaults.publishRetries,
    publishMinDelayMs:
      parseOptionalIntInRange(env, "PUBLISH_MIN_DELAY_MS", scanServiceCaps.publishMinDelayMs) ?? defaults.publishMinDelayMs,
    publishMaxDelayMs:
      parseOptionalIntInRange(env, "PUBLISH_MAX_DELAY_MS", scanServiceCaps.publishMaxDelayMs) ?? defaults.publishMaxDelayMs,
    ingestMaxAttempts:
      parseOptionalIntInRange(env, "INGEST_MAX_ATTEMPTS", scanServiceCaps.ingestMaxAttempts) ?? defaults.ingestMaxAttempts,
    maxPendingScans: parseOptionalIntInRange(env, "DISPATCH_MAX_PENDING", scanServiceCaps.maxPendingScans),
    redispatchAfterMs:
      parseOptionalIntInRange(env, "RECONCILE_REDISPATCH_AFTER_MS", scanServiceCaps.redispatchAfterMs) ??
      defaults.redispatchAfterMs,
    abandonAfterMs:
      parseOptionalIntInRange(env, "RECONCILE_ABANDON_AFTER_MS", scanServiceCaps.abandonAfterMs) ?? defaults.abandonAfterMs,
    reconcileIntervalMs:
      parseOptionalIntInRange(env, "RECONCILE_INTERVAL_MS", scanServiceCaps.reconcileIntervalMs) ??
      defaults.reconcileIntervalMs,
    reconcileConcurrency:
      parseOptionalIntInRange(env, "RECONCILE_CONCURRENCY", scanServiceCaps.reconcileConcurrency) ??
      defaults.reconcileConcurrency,
    reconcileBatchSize:
      parseOptionalIntInRange(env, "RECONCILE_BATCH_SIZE", scanServiceCaps.reconcileBatchSize) ??
      defaults.reconcileBatchSize
  });

  const publishTimeoutMs =
    parseOptionalIntInRange(env, "PUBLISH_TIMEOUT_MS", runtimeCaps.publishTimeoutMs) ?? 5000;

  return { publishTimeoutMs, serviceConfig };
};
