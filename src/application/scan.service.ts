import type { ResultSubmission } from "../core/scan/scan.types";
import type { ScanQueue } from "../ports/ScanQueue";
import type { ScanRepository } from "../ports/ScanRepository";
import { dispatchScan, type DispatchScanResult } from "./dispatch-scan/dispatchScan.usecase";
import { ingestResultSubmission, type IngestOutcome } from "./ingest-results/ingestResults.usecase";
import { getScan } from "./query-scan/getScan.usecase";
import type { ScanView } from "./query-scan/scanView";
import { reconcilePendingScans, type ReconcileSummary } from "./reconcile-pending/reconcilePending.usecase";
import { resolveScanServiceConfig, type ScanServiceConfig, type ScanServiceConfigInput } from "./scan-service.config";

export interface ScanService {
  submitScan(target: string): Promise<DispatchScanResult>;
  submitResult(submission: ResultSubmission): Promise<IngestOutcome>;
  getScan(scanId: string): Promise<ScanView>;
  reconcile(): Promise<ReconcileSummary>;
}

export const createScanService = (deps: {
  repo: ScanRepository;
  queue: ScanQueue;
  config?: ScanServiceConfigInput;
  now?: () => Date;
}): ScanService => {
  const { repo, queue, now } = deps;
  const config: ScanServiceConfig = resolveScanServiceConfig(deps.config);

  return {
    submitScan: (target) => dispatchScan({ repo, queue, config, now }, target),
    submitResult: (submission) => ingestResultSubmission({ repo, config, now }, submission),
    getScan: (scanId) => getScan({ repo }, scanId),
    reconcile: () => reconcilePendingScans({ repo, queue, config, now })
  };
};
