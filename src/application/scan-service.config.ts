export type ScanServiceConfig = {
  publishRetries: number;
  publishMinDelayMs: number;
  publishMaxDelayMs: number;
  ingestMaxAttempts: number;
  maxPendingScans?: number;
  redispatchAfterMs: number;
  abandonAfterMs: number;
  reconcileIntervalMs: number;
  reconcileConcurrency: number;
  reconcileBatchSize: number;
};

export type ScanServiceConfigInput = Partial<ScanServiceConfig>;

export const defaultScanServiceConfig: ScanServiceConfig = {
  publishRetries: 3,
  publishMinDelayMs: 200,
  publishMaxDelayMs: 5000,
  ingestMaxAttempts: 5,
  redispatchAfterMs: 60_000,
  abandonAfterMs: 86_400_000,
  reconcileIntervalMs: 30_000,
  reconcileConcurrency: 5,
  reconcileBatchSize: 100
};

export const scanServiceCaps = {
  publishRetries: { min: 0, max: 10 },
  publishMinDelayMs: { min: 10, max: 10_000 },
  publishMaxDelayMs: { min: 10, max: 60_000 },
  ingestMaxAttempts: { min: 1, max: 20 },
  maxPendingScans: { min: 1, max: 1_000_000 },
  redispatchAfterMs: { min: 1000, max: 86_400_000 },
  abandonAfterMs: { min: 60_000, max: 604_800_000 },
  reconcileIntervalMs: { min: 0, max: 3_600_000 },
  reconcileConcurrency: { min: 1, max: 50 },
  reconcileBatchSize: { min: 1, max: 1000 }
} as const;

const assertIntegerInRange = (name: string, value: number, range: { min: number; max: number }) => {
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${range.min}..${range.max}]`);
  }
};

export const validateScanServiceConfig = (config: ScanServiceConfig): ScanServiceConfig => {
  assertIntegerInRange("publishRetries", config.publishRetries, scanServiceCaps.publishRetries);
  assertIntegerInRange("publishMinDelayMs", config.publishMinDelayMs, scanServiceCaps.publishMinDelayMs);
  assertIntegerInRange("publishMaxDelayMs", config.publishMaxDelayMs, scanServiceCaps.publishMaxDelayMs);
  assertIntegerInRange("ingestMaxAttempts", config.ingestMaxAttempts, scanServiceCaps.ingestMaxAttempts);
  if (config.maxPendingScans != null) {
    assertIntegerInRange("maxPendingScans", config.maxPendingScans, scanServiceCaps.maxPendingScans);
  }
  assertIntegerInRange("redispatchAfterMs", config.redispatchAfterMs, scanServiceCaps.redispatchAfterMs);
  assertIntegerInRange("abandonAfterMs", config.abandonAfterMs, scanServiceCaps.abandonAfterMs);
  assertIntegerInRange("reconcileIntervalMs", config.reconcileIntervalMs, scanServiceCaps.reconcileIntervalMs);
  assertIntegerInRange("reconcileConcurrency", config.reconcileConcurrency, scanServiceCaps.reconcileConcurrency);
  assertIntegerInRange("reconcileBatchSize", config.reconcileBatchSize, scanServiceCaps.reconcileBatchSize);

  if (config.publishMinDelayMs > config.publishMaxDelayMs) {
    throw new Error(
      `publishMinDelayMs=${config.publishMinDelayMs} must not exceed publishMaxDelayMs=${config.publishMaxDelayMs}`
    );
  }
  if (config.abandonAfterMs <= config.redispatchAfterMs) {
    throw new Error(
      `abandonAfterMs=${config.abandonAfterMs} must be greater than redispatchAfterMs=${config.redispatchAfterMs}`
    );
  }
  return config;
};

export const resolveScanServiceConfig = (input: ScanServiceConfigInput = {}): ScanServiceConfig =>
  validateScanServiceConfig({ ...defaultScanServiceConfig, ...input });
