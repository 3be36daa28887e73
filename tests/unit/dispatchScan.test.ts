import { dispatchScan } from "../../src/application/dispatch-scan/dispatchScan.usecase";
import {
  BackpressureError,
  DispatchError,
  IdentifierAllocationError,
  PersistenceError,
  ValidationError
} from "../../src/core/errors";
import { FakeScanQueue } from "../support/FakeScanQueue";
import { InMemoryScanRepository } from "../support/InMemoryScanRepository";
import { scanIdA, scanIdB } from "../support/fixtures";

const now = new Date("2026-03-01T10:00:00.000Z");

const setup = () => {
  const repo = new InMemoryScanRepository();
  const queue = new FakeScanQueue();
  const sleeps: number[] = [];
  const deps = {
    repo,
    queue,
    generateId: () => scanIdA,
    now: () => now,
    randomFn: () => 0,
    sleepFn: async (ms: number) => {
      sleeps.push(ms);
    }
  };
  return { repo, queue, sleeps, deps };
};

describe("dispatchScan", () => {
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("stores a PENDING scan and then publishes its dispatch message", async () => {
    const { repo, queue, deps } = setup();

    await expect(dispatchScan(deps, "https://example.com")).resolves.toEqual({ scanId: scanIdA, status: "PENDING" });

    expect(repo.scans.get(scanIdA)).toEqual({
      _id: scanIdA,
      target: "https://example.com",
      status: "PENDING",
      createdAt: now,
      dispatchedAt: now,
      results: []
    });
    expect(queue.published).toEqual([{ id: scanIdA, target: "https://example.com" }]);
    expect(logSpy).toHaveBeenCalledWith(JSON.stringify({ event: "dispatch.accepted", scanId: scanIdA, attempts: 1 }));
  });

  it("publishes nothing when the store write fails", async () => {
    const { repo, queue, deps } = setup();
    jest.spyOn(repo, "create").mockRejectedValue(new Error("connection reset"));

    const error = await dispatchScan(deps, "https://example.com").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(PersistenceError);
    expect(error).toMatchObject({
      message: `Store failed to create scan for scan ${scanIdA}: connection reset`,
      retryable: true
    });
    expect(queue.publishCalls).toBe(0);
  });

  it("retries a rejected publish with backoff and then succeeds", async () => {
    const { repo, queue, sleeps, deps } = setup();
    queue.failNext(2);

    await dispatchScan(deps, "https://example.com");

    expect(queue.publishCalls).toBe(3);
    expect(sleeps).toEqual([200, 400]);
    expect(repo.scans.get(scanIdA)?.dispatchedAt).toEqual(now);
    expect(warnSpy).toHaveBeenCalledTimes(2);
    expect(JSON.parse(String(warnSpy.mock.calls[0][0]))).toEqual({
      event: "dispatch.publish_retry",
      scanId: scanIdA,
      attempt: 1,
      maxAttempts: 4,
      delayMs: 200,
      reason: "queue unavailable"
    });
  });

  it("reports divergence when publishing never succeeds and leaves the scan undispatched", async () => {
    const { repo, queue, deps } = setup();
    queue.failNext(10);

    const error = await dispatchScan({ ...deps, config: { publishRetries: 1 } }, "https://example.com").catch(
      (err: unknown) => err
    );

    expect(error).toBeInstanceOf(DispatchError);
    expect(error).toMatchObject({
      code: "dispatch_failed",
      message: `Failed to queue scan ${scanIdA} after 2 attempts: queue unavailable`,
      context: { scanId: scanIdA, attempts: 2 }
    });
    expect(queue.publishCalls).toBe(2);

    const stored = repo.scans.get(scanIdA);
    expect(stored?.status).toBe("PENDING");
    expect(stored?.dispatchedAt).toBeUndefined();
    expect(JSON.parse(String(errorSpy.mock.calls[0][0]))).toEqual({
      event: "dispatch.divergence",
      scanId: scanIdA,
      attempts: 2,
      reason: "queue unavailable"
    });
  });

  it("still accepts the scan when marking it dispatched fails", async () => {
    const { repo, queue, deps } = setup();
    jest.spyOn(repo, "markDispatched").mockRejectedValue(new Error("write timeout"));

    await expect(dispatchScan(deps, "https://example.com")).resolves.toEqual({ scanId: scanIdA, status: "PENDING" });
    expect(queue.published).toHaveLength(1);
    expect(warnSpy).toHaveBeenCalledWith(
      JSON.stringify({ event: "dispatch.mark_failed", scanId: scanIdA, reason: "write timeout" })
    );
  });

  it("fails without storing anything when no id can be allocated", async () => {
    const { repo, queue, deps } = setup();
    const generateId = () => {
      throw new Error("entropy exhausted");
    };

    await expect(dispatchScan({ ...deps, generateId }, "https://example.com")).rejects.toBeInstanceOf(
      IdentifierAllocationError
    );
    expect(repo.scans.size).toBe(0);
    expect(queue.publishCalls).toBe(0);
  });

  it("rejects a blank target before touching the store", async () => {
    const { repo, deps } = setup();
    await expect(dispatchScan(deps, "   ")).rejects.toBeInstanceOf(ValidationError);
    expect(repo.scans.size).toBe(0);
  });

  it("applies backpressure once the pending limit is reached", async () => {
    const { repo, queue, deps } = setup();
    repo.seed({ _id: scanIdB });

    const error = await dispatchScan({ ...deps, config: { maxPendingScans: 1 } }, "https://example.com").catch(
      (err: unknown) => err
    );

    expect(error).toBeInstanceOf(BackpressureError);
    expect(error).toMatchObject({ code: "backpressure", retryable: true });
    expect(repo.scans.has(scanIdA)).toBe(false);
    expect(queue.publishCalls).toBe(0);
  });

  it("gives concurrent submissions distinct ids", async () => {
    const repo = new InMemoryScanRepository();
    const queue = new FakeScanQueue();

    const accepted = await Promise.all(
      Array.from({ length: 20 }, (_, i) => dispatchScan({ repo, queue }, `https://example.com/${i}`))
    );

    expect(new Set(accepted.map((a) => a.scanId)).size).toBe(20);
    expect(repo.scans.size).toBe(20);
    expect(queue.published).toHaveLength(20);
  });
});
