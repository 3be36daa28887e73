import {
  BackpressureError,
  DispatchError,
  IdentifierAllocationError,
  ValidationError,
  toErrorMessage
} from "../../core/errors";
import { generateScanId, type ScanIdGenerator } from "../../core/scan/scanId";
import type { ScanDispatchMessage } from "../../core/scan/scan.types";
import type { ScanQueue } from "../../ports/ScanQueue";
import type { ScanRepository } from "../../ports/ScanRepository";
import { retry } from "../../shared/retry/retry";
import { guardStore } from "../scan.error-handler";
import { resolveScanServiceConfig, type ScanServiceConfigInput } from "../scan-service.config";

export type DispatchScanDeps = {
  repo: ScanRepository;
  queue: ScanQueue;
  config?: ScanServiceConfigInput;
  generateId?: ScanIdGenerator;
  now?: () => Date;
  randomFn?: () => number;
  sleepFn?: (ms: number) => Promise<void>;
};

export type DispatchScanResult = {
  scanId: string;
  status: "PENDING";
};

const allocateScanId = (generateId: ScanIdGenerator): string => {
  try {
    return generateId();
  } catch (error) {
    throw new IdentifierAllocationError(error);
  }
};

/**
 * Admits a new scan: stores it as PENDING, then publishes its dispatch message.
 * The message is only published once the store write has completed.
 */
export const dispatchScan = async (deps: DispatchScanDeps, target: string): Promise<DispatchScanResult> => {
  const { repo, queue } = deps;
  const config = resolveScanServiceConfig(deps.config);
  const now = deps.now ?? (() => new Date());

  if (target.trim() === "") {
    throw new ValidationError("target is required and must be a non-empty string", { field: "target" });
  }

  if (config.maxPendingScans != null) {
    const limit = config.maxPendingScans;
    const pending = await guardStore("count pending scans", {}, () => repo.countByStatus("PENDING"));
    if (pending >= limit) {
      throw new BackpressureError(pending, limit);
    }
  }

  const scanId = allocateScanId(deps.generateId ?? generateScanId);

  await guardStore("create scan", { scanId }, () =>
    repo.create({
      _id: scanId,
      target,
      status: "PENDING",
      createdAt: now(),
      results: []
    })
  );

  const message: ScanDispatchMessage = { id: scanId, target };
  let attempts = 0;
  try {
    await retry(
      async (attempt) => {
        attempts = attempt;
        await queue.publish(message);
      },
      {
        retries: config.publishRetries,
        minDelayMs: config.publishMinDelayMs,
        maxDelayMs: config.publishMaxDelayMs,
        randomFn: deps.randomFn,
        sleepFn: deps.sleepFn,
        onRetry: ({ attempt, maxAttempts, delayMs, error }) => {
          // eslint-disable-next-line no-console
          console.warn(JSON.stringify({
            event: "dispatch.publish_retry",
            scanId,
            attempt,
            maxAttempts,
            delayMs,
            reason: toErrorMessage(error)
          }));
        },
        onGiveUp: ({ attempt, error }) => {
          // Stored but never queued: the reconciler picks it up as an undispatched PENDING scan.
          // eslint-disable-next-line no-console
          console.error(JSON.stringify({
            event: "dispatch.divergence",
            scanId,
            attempts: attempt,
            reason: toErrorMessage(error)
          }));
        }
      }
    );
  } catch (error) {
    throw new DispatchError(scanId, attempts, error);
  }

  try {
    await repo.markDispatched(scanId, now());
  } catch (error) {
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({
      event: "dispatch.mark_failed",
      scanId,
      reason: toErrorMessage(error)
    }));
  }

  console.log(JSON.stringify({ event: "dispatch.accepted", scanId, attempts }));
  return { scanId, status: "PENDING" };
};
