import { InvalidStateError } from "../errors";
import type {
  ScanDoc,
  ScanResultDoc,
  ScanStatus,
  TerminalScanStatus
} from "./scan.types";

/**
 * Status lifecycle of a scan:
 *
 *   PENDING --progress--> RUNNING
 *   PENDING --terminal--> COMPLETED | FAILED
 *   RUNNING --terminal--> COMPLETED | FAILED
 *
 * COMPLETED and FAILED are absorbing.
 */
const allowedTransitions: Record<ScanStatus, readonly ScanStatus[]> = {
  PENDING: ["RUNNING", "COMPLETED", "FAILED"],
  RUNNING: ["COMPLETED", "FAILED"],
  COMPLETED: [],
  FAILED: []
};

export const isTerminalStatus = (status: ScanStatus): status is TerminalScanStatus =>
  status === "COMPLETED" || status === "FAILED";

export const canTransition = (from: ScanStatus, to: ScanStatus): boolean =>
  allowedTransitions[from].includes(to);

/**
 * A single conditional write against one scan. The store applies it only while the
 * scan is still in `expectedStatus` and none of the appended test ids is recorded yet.
 */
export type ScanTransition = {
  expectedStatus: ScanStatus;
  status: ScanStatus;
  startedAt?: Date;
  completedAt?: Date;
  append: ScanResultDoc[];
};

export type TerminalSignal = {
  status: TerminalScanStatus;
  startedAt?: Date;
  completedAt?: Date;
};

export const hasRecordedTest = (scan: Pick<ScanDoc, "results">, testId: string): boolean =>
  scan.results.some((result) => result.testId === testId);

/**
 * Drops results whose test id is already recorded on the scan, and repeats inside the
 * batch itself (first occurrence wins).
 */
export const pickUnrecordedResults = <T extends { testId: string }>(
  scan: Pick<ScanDoc, "results">,
  candidates: T[]
): T[] => {
  const seen = new Set(scan.results.map((result) => result.testId));
  const picked: T[] = [];
  for (const candidate of candidates) {
    if (seen.has(candidate.testId)) continue;
    seen.add(candidate.testId);
    picked.push(candidate);
  }
  return picked;
};

export const planProgress = (scan: ScanDoc, result: ScanResultDoc, now: Date): ScanTransition => {
  if (isTerminalStatus(scan.status)) {
    throw new InvalidStateError(scan._id, scan.status);
  }

  if (scan.status === "PENDING") {
    return {
      expectedStatus: "PENDING",
      status: "RUNNING",
      startedAt: now,
      append: [result]
    };
  }

  return {
    expectedStatus: scan.status,
    status: scan.status,
    append: [result]
  };
};

const latest = (a: Date, b: Date): Date => (b.getTime() > a.getTime() ? b : a);

/**
 * Returns null when the scan is already terminal: finalize is idempotent and a repeated
 * signal must leave `completedAt` untouched.
 *
 * `completedAt` is never earlier than the effective `startedAt` (stored, or planned from
 * the signal); a worker clock behind the server's is clamped forward.
 */
export const planFinalize = (
  scan: ScanDoc,
  signal: TerminalSignal,
  results: ScanResultDoc[],
  now: Date
): ScanTransition | null => {
  if (isTerminalStatus(scan.status)) return null;

  if (!canTransition(scan.status, signal.status)) {
    throw new InvalidStateError(
      scan._id,
      scan.status,
      `Scan ${scan._id} cannot move from ${scan.status} to ${signal.status}`
    );
  }

  const reportedCompletedAt = signal.completedAt ?? now;
  const startedAt = scan.startedAt ?? signal.startedAt ?? reportedCompletedAt;
  const transition: ScanTransition = {
    expectedStatus: scan.status,
    status: signal.status,
    completedAt: latest(startedAt, reportedCompletedAt),
    append: results
  };

  if (scan.startedAt == null) {
    transition.startedAt = startedAt;
  }

  return transition;
};
