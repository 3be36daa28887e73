import { defaultScanServiceConfig, resolveScanServiceConfig } from "../../src/application/scan-service.config";
import { loadRuntimeConfigFromEnv } from "../../src/shared/config/runtime.config";

describe("runtime config caps", () => {
  it("uses defaults when nothing is set", () => {
    expect(loadRuntimeConfigFromEnv({})).toEqual({
      publishTimeoutMs: 5000,
      serviceConfig: { ...defaultScanServiceConfig, maxPendingScans: undefined }
    });
  });

  it("accepts boundary values within allowed caps", () => {
    const runtime = loadRuntimeConfigFromEnv({
      PUBLISH_RETRIES: "10",
      PUBLISH_MIN_DELAY_MS: "10",
      PUBLISH_MAX_DELAY_MS: "60000",
      INGEST_MAX_ATTEMPTS: "20",
      DISPATCH_MAX_PENDING: "1",
      RECONCILE_REDISPATCH_AFTER_MS: "1000",
      RECONCILE_ABANDON_AFTER_MS: "604800000",
      RECONCILE_INTERVAL_MS: "0",
      RECONCILE_CONCURRENCY: "50",
      RECONCILE_BATCH_SIZE: "1000",
      PUBLISH_TIMEOUT_MS: "60000"
    });

    expect(runtime).toEqual({
      publishTimeoutMs: 60000,
      serviceConfig: {
        publishRetries: 10,
        publishMinDelayMs: 10,
        publishMaxDelayMs: 60000,
        ingestMaxAttempts: 20,
        maxPendingScans: 1,
        redispatchAfterMs: 1000,
        abandonAfterMs: 604800000,
        reconcileIntervalMs: 0,
        reconcileConcurrency: 50,
        reconcileBatchSize: 1000
      }
    });
  });

  it.each([
    { env: { PUBLISH_RETRIES: "11" }, message: "PUBLISH_RETRIES=11 is out of allowed range [0..10]" },
    { env: { INGEST_MAX_ATTEMPTS: "0" }, message: "INGEST_MAX_ATTEMPTS=0 is out of allowed range [1..20]" },
    { env: { DISPATCH_MAX_PENDING: "1.5" }, message: "DISPATCH_MAX_PENDING=1.5 is out of allowed range [1..1000000]" },
    { env: { RECONCILE_CONCURRENCY: "51" }, message: "RECONCILE_CONCURRENCY=51 is out of allowed range [1..50]" },
    { env: { PUBLISH_TIMEOUT_MS: "99" }, message: "PUBLISH_TIMEOUT_MS=99 is out of allowed range [100..60000]" },
    { env: { RECONCILE_BATCH_SIZE: "abc" }, message: "RECONCILE_BATCH_SIZE=abc is out of allowed range [1..1000]" },
    {
      env: { PUBLISH_MIN_DELAY_MS: "3000", PUBLISH_MAX_DELAY_MS: "2000" },
      message: "publishMinDelayMs=3000 must not exceed publishMaxDelayMs=2000"
    },
    {
      env: { RECONCILE_REDISPATCH_AFTER_MS: "120000", RECONCILE_ABANDON_AFTER_MS: "60000" },
      message: "abandonAfterMs=60000 must be greater than redispatchAfterMs=120000"
    }
  ])("rejects out-of-range config: $message", ({ env, message }) => {
    expect(() => loadRuntimeConfigFromEnv(env)).toThrow(message);
  });

  it("validates programmatic overrides with the same caps", () => {
    expect(() => resolveScanServiceConfig({ reconcileConcurrency: 0 })).toThrow(
      "reconcileConcurrency=0 is out of allowed range [1..50]"
    );
    expect(resolveScanServiceConfig({ publishRetries: 0 }).publishRetries).toBe(0);
  });
});
