import type { ScanDoc, ScanResultDoc, ScanResultMetadata, ScanStatus, Severity } from "../../core/scan/scan.types";

export type ScanResultView = {
  id: number;
  job_id: string;
  test_id: string;
  test_name: string;
  category: string;
  severity: Severity;
  passed: boolean;
  message: string;
  reference: string;
  remediation: string;
  metadata: ScanResultMetadata | null;
};

export type ScanView = {
  id: string;
  target: string;
  status: ScanStatus;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
  results: ScanResultView[];
};

const toIso = (value: Date | undefined): string | null => (value ? value.toISOString() : null);

const toResultView = (scanId: string, result: ScanResultDoc): ScanResultView => ({
  id: result.id,
  job_id: scanId,
  test_id: result.testId,
  test_name: result.testName,
  category: result.category,
  severity: result.severity,
  passed: result.passed,
  message: result.message,
  reference: result.reference,
  remediation: result.remediation,
  metadata: result.metadata ?? null
});

export const toScanView = (scan: ScanDoc): ScanView => ({
  id: scan._id,
  target: scan.target,
  status: scan.status,
  created_at: scan.createdAt.toISOString(),
  started_at: toIso(scan.startedAt),
  completed_at: toIso(scan.completedAt),
  results: scan.results.map((result) => toResultView(scan._id, result))
});
