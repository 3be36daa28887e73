import { InvalidStateError, NotFoundError, PersistenceError } from "../../core/errors";
import type {
  ProgressSubmission,
  ResultSubmission,
  ScanDoc,
  ScanResultDoc,
  ScanStatus,
  TerminalScanStatus,
  TerminalSubmission
} from "../../core/scan/scan.types";
import {
  hasRecordedTest,
  isTerminalStatus,
  pickUnrecordedResults,
  planFinalize,
  planProgress,
  type ScanTransition
} from "../../core/scan/scanStateMachine";
import type { ScanRepository } from "../../ports/ScanRepository";
import { guardStore } from "../scan.error-handler";
import { resolveScanServiceConfig, type ScanServiceConfigInput } from "../scan-service.config";

export type IngestResultsDeps = {
  repo: ScanRepository;
  config?: ScanServiceConfigInput;
  now?: () => Date;
};

export type IngestOutcome =
  | { kind: "recorded"; scanId: string; status: ScanStatus; resultIds: number[] }
  | { kind: "duplicate"; scanId: string; status: ScanStatus }
  | { kind: "finalized"; scanId: string; status: TerminalScanStatus; resultIds: number[] }
  | { kind: "already_finalized"; scanId: string; status: TerminalScanStatus };

type IngestContext = {
  repo: ScanRepository;
  maxAttempts: number;
  now: () => Date;
};

const loadScan = async (repo: ScanRepository, scanId: string): Promise<ScanDoc> => {
  const scan = await guardStore("load scan", { scanId }, () => repo.findById(scanId));
  if (!scan) throw new NotFoundError(scanId);
  return scan;
};

const reserveResultIds = async (repo: ScanRepository, scanId: string, count: number): Promise<number[]> => {
  if (count <= 0) return [];
  return guardStore("allocate result ids", { scanId }, () => repo.allocateResultIds(count));
};

const applyTransition = async (
  repo: ScanRepository,
  scanId: string,
  transition: ScanTransition,
  attempt: number
): Promise<boolean> => {
  const applied = await guardStore("apply transition", { scanId }, () => repo.applyTransition(scanId, transition));

  if (!applied) {
    // eslint-disable-next-line no-console
    console.warn(JSON.stringify({
      event: "ingest.conflict",
      scanId,
      attempt,
      expectedStatus: transition.expectedStatus
    }));
    return false;
  }

  if (transition.status !== transition.expectedStatus) {
    console.log(JSON.stringify({
      event: "ingest.transition",
      scanId,
      from: transition.expectedStatus,
      to: transition.status,
      appended: transition.append.length
    }));
  }
  return true;
};

const conflictExhausted = (scanId: string, attempts: number) =>
  new PersistenceError(
    `Gave up updating scan ${scanId} after ${attempts} conflicting attempts`,
    { scanId, attempts }
  );

const recordProgress = async (ctx: IngestContext, submission: ProgressSubmission): Promise<IngestOutcome> => {
  const { repo } = ctx;
  const { scanId, result: input } = submission;
  let reservedId: number | undefined;

  for (let attempt = 1; attempt <= ctx.maxAttempts; attempt += 1) {
    const scan = await loadScan(repo, scanId);
    if (isTerminalStatus(scan.status)) {
      throw new InvalidStateError(scanId, scan.status);
    }

    if (hasRecordedTest(scan, input.testId)) {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({ event: "ingest.duplicate_result", scanId, testId: input.testId }));
      return { kind: "duplicate", scanId, status: scan.status };
    }

    const resultId = reservedId ?? (await reserveResultIds(repo, scanId, 1))[0];
    reservedId = resultId;
    const transition = planProgress(scan, { id: resultId, ...input }, ctx.now());

    if (await applyTransition(repo, scanId, transition, attempt)) {
      return { kind: "recorded", scanId, status: transition.status, resultIds: [resultId] };
    }
  }

  throw conflictExhausted(scanId, ctx.maxAttempts);
};

const finalizeScan = async (ctx: IngestContext, submission: TerminalSubmission): Promise<IngestOutcome> => {
  const { repo } = ctx;
  const { scanId } = submission;
  let reserved: number[] = [];

  for (let attempt = 1; attempt <= ctx.maxAttempts; attempt += 1) {
    const scan = await loadScan(repo, scanId);
    if (isTerminalStatus(scan.status)) {
      console.log(JSON.stringify({ event: "ingest.finalize_repeated", scanId, status: scan.status }));
      return { kind: "already_finalized", scanId, status: scan.status };
    }

    const fresh = pickUnrecordedResults(scan, submission.results);
    if (reserved.length < fresh.length) {
      reserved = reserved.concat(await reserveResultIds(repo, scanId, fresh.length - reserved.length));
    }
    const docs: ScanResultDoc[] = fresh.map((result, index) => ({ id: reserved[index], ...result }));

    const transition = planFinalize(
      scan,
      { status: submission.status, startedAt: submission.startedAt, completedAt: submission.completedAt },
      docs,
      ctx.now()
    );
    if (transition == null) {
      return { kind: "already_finalized", scanId, status: submission.status };
    }

    if (await applyTransition(repo, scanId, transition, attempt)) {
      return {
        kind: "finalized",
        scanId,
        status: submission.status,
        resultIds: docs.map((doc) => doc.id)
      };
    }
  }

  throw conflictExhausted(scanId, ctx.maxAttempts);
};

/**
 * Applies a worker submission to its scan. Every write is conditioned on the status the
 * change was planned against; on a conflict the scan is re-read and the change re-planned.
 */
export const ingestResultSubmission = async (
  deps: IngestResultsDeps,
  submission: ResultSubmission
): Promise<IngestOutcome> => {
  const config = resolveScanServiceConfig(deps.config);
  const ctx: IngestContext = {
    repo: deps.repo,
    maxAttempts: config.ingestMaxAttempts,
    now: deps.now ?? (() => new Date())
  };

  return submission.kind === "progress" ? recordProgress(ctx, submission) : finalizeScan(ctx, submission);
};
