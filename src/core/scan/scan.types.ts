export const scanStatuses = ["PENDING", "RUNNING", "COMPLETED", "FAILED"] as const;
export type ScanStatus = (typeof scanStatuses)[number];

export const terminalScanStatuses = ["COMPLETED", "FAILED"] as const;
export type TerminalScanStatus = (typeof terminalScanStatuses)[number];

export const severities = ["critical", "high", "medium", "low", "info"] as const;
export type Severity = (typeof severities)[number];

export type ScanResultMetadata = Record<string, unknown>;

/** One check outcome, as stored inside its owning scan. */
export type ScanResultDoc = {
  id: number;            // store-assigned sequence
  testId: string;
  testName: string;
  category: string;
  severity: Severity;
  passed: boolean;
  message: string;
  reference: string;
  remediation: string;
  metadata?: ScanResultMetadata;
};

export type ScanDoc = {
  _id: string;           // UUIDv7
  target: string;
  status: ScanStatus;
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
  dispatchedAt?: Date;
  results: ScanResultDoc[];
};

/** A result as submitted, before the store assigns its id. */
export type ScanResultInput = Omit<ScanResultDoc, "id">;

export type ProgressSubmission = {
  kind: "progress";
  scanId: string;
  result: ScanResultInput;
};

export type TerminalSubmission = {
  kind: "terminal";
  scanId: string;
  status: TerminalScanStatus;
  startedAt?: Date;
  completedAt?: Date;
  results: ScanResultInput[];
};

export type ResultSubmission = ProgressSubmission | TerminalSubmission;

export type ScanDispatchMessage = {
  id: string;
  target: string;
};
