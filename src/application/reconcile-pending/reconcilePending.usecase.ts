import { toErrorMessage } from "../../core/errors";
import type { ScanDoc } from "../../core/scan/scan.types";
import type { ScanQueue } from "../../ports/ScanQueue";
import type { ScanRepository } from "../../ports/ScanRepository";
import { settleWithConcurrency } from "../../shared/concurrency/limiter";
import { ingestResultSubmission } from "../ingest-results/ingestResults.usecase";
import { guardStore } from "../scan.error-handler";
import { resolveScanServiceConfig, type ScanServiceConfigInput } from "../scan-service.config";

export type ReconcileDeps = {
  repo: ScanRepository;
  queue: ScanQueue;
  config?: ScanServiceConfigInput;
  now?: () => Date;
};

export type ReconcileSummary = {
  abandoned: number;
  abandonFailed: number;
  redispatched: number;
  redispatchFailed: number;
};

const countSettled = (results: PromiseSettledResult<boolean>[]) => ({
  ok: results.filter((r) => r.status === "fulfilled" && r.value).length,
  failed: results.filter((r) => r.status === "rejected").length
});

/**
 * Repairs PENDING scans the workers never picked up:
 * - scans older than the abandon deadline are finalized as FAILED,
 * - scans whose dispatch message was never accepted are published again.
 */
export const reconcilePendingScans = async (deps: ReconcileDeps): Promise<ReconcileSummary> => {
  const { repo, queue } = deps;
  const config = resolveScanServiceConfig(deps.config);
  const now = (deps.now ?? (() => new Date()))();

  const expired = await guardStore("find expired pending scans", {}, () =>
    repo.findStalePending({
      createdBefore: new Date(now.getTime() - config.abandonAfterMs),
      undispatchedOnly: false,
      limit: config.reconcileBatchSize
    })
  );

  const abandonResults = await settleWithConcurrency(expired, config.reconcileConcurrency, async (scan) => {
    const outcome = await ingestResultSubmission(
      { repo, config, now: () => now },
      { kind: "terminal", scanId: scan._id, status: "FAILED", completedAt: now, results: [] }
    );
    return outcome.kind === "finalized";
  });
  logRejections("reconcile.abandon_failed", expired, abandonResults);

  const undispatched = await guardStore("find undispatched scans", {}, () =>
    repo.findStalePending({
      createdBefore: new Date(now.getTime() - config.redispatchAfterMs),
      undispatchedOnly: true,
      limit: config.reconcileBatchSize
    })
  );

  const redispatchResults = await settleWithConcurrency(undispatched, config.reconcileConcurrency, async (scan) => {
    await queue.publish({ id: scan._id, target: scan.target });
    await repo.markDispatched(scan._id, now);
    return true;
  });
  logRejections("reconcile.redispatch_failed", undispatched, redispatchResults);

  const abandoned = countSettled(abandonResults);
  const redispatched = countSettled(redispatchResults);
  const summary: ReconcileSummary = {
    abandoned: abandoned.ok,
    abandonFailed: abandoned.failed,
    redispatched: redispatched.ok,
    redispatchFailed: redispatched.failed
  };

  console.log(JSON.stringify({ event: "reconcile.completed", ...summary }));
  return summary;
};

const logRejections = (event: string, scans: ScanDoc[], results: PromiseSettledResult<boolean>[]) => {
  results.forEach((result, index) => {
    if (result.status !== "rejected") return;
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({
      event,
      scanId: scans[index]?._id,
      reason: toErrorMessage(result.reason)
    }));
  });
};
