import { ValidationError } from "../errors";
import { isScanId } from "./scanId";
import { isPassingThreatLevel, severityFromThreatLevel } from "./threatLevel";
import {
  severities,
  terminalScanStatuses,
  type ResultSubmission,
  type ScanResultInput,
  type ScanResultMetadata,
  type Severity,
  type TerminalScanStatus
} from "./scan.types";

export const maxTargetLength = 2048;

type RawRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is RawRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const requireRecord = (value: unknown, what: string): RawRecord => {
  if (!isRecord(value)) {
    throw new ValidationError(`${what} must be a JSON object`);
  }
  return value;
};

const requireString = (raw: RawRecord, field: string, label = field): string => {
  const value = raw[field];
  if (typeof value !== "string" || value.trim() === "") {
    throw new ValidationError(`${label} is required and must be a non-empty string`, { field: label });
  }
  return value.trim();
};

const optionalString = (raw: RawRecord, field: string, label = field): string => {
  const value = raw[field];
  if (value == null) return "";
  if (typeof value !== "string") {
    throw new ValidationError(`${label} must be a string`, { field: label });
  }
  return value;
};

const optionalDate = (raw: RawRecord, field: string): Date | undefined => {
  const value = raw[field];
  if (value == null) return undefined;
  if (typeof value !== "string") {
    throw new ValidationError(`${field} must be an ISO-8601 timestamp`, { field });
  }
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    throw new ValidationError(`${field} must be an ISO-8601 timestamp. Received: ${value}`, { field });
  }
  return parsed;
};

const isSeverity = (value: string): value is Severity => severities.some((severity) => severity === value);

const isTerminalStatusValue = (value: unknown): value is TerminalScanStatus =>
  typeof value === "string" && terminalScanStatuses.some((status) => status === value);

export const parseScanId = (value: unknown, field = "id"): string => {
  if (typeof value !== "string" || !isScanId(value.trim())) {
    throw new ValidationError(`${field} must be a valid UUID`, { field });
  }
  return value.trim().toLowerCase();
};

export const parseScanRequest = (body: unknown): { target: string } => {
  const raw = requireRecord(body, "Request body");
  const target = requireString(raw, "target");

  if (target.length > maxTargetLength) {
    throw new ValidationError(`target must be at most ${maxTargetLength} characters`, { field: "target" });
  }

  let parsed: URL;
  try {
    parsed = new URL(target);
  } catch {
    throw new ValidationError(`target must be a valid absolute http/https URL. Received: ${target}`, {
      field: "target"
    });
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ValidationError(`target must use http or https scheme. Received: ${target}`, { field: "target" });
  }

  return { target };
};

const parseSeverity = (raw: RawRecord, prefix: string, threatLevel: string | undefined): Severity => {
  const value = raw.severity;
  if (value == null) {
    const derived = threatLevel != null ? severityFromThreatLevel(threatLevel) : undefined;
    if (derived == null) {
      throw new ValidationError(`${prefix}severity is required`, { field: `${prefix}severity` });
    }
    return derived;
  }

  const normalized = typeof value === "string" ? value.trim().toLowerCase() : "";
  if (!isSeverity(normalized)) {
    throw new ValidationError(`${prefix}severity must be one of ${severities.join(", ")}`, {
      field: `${prefix}severity`
    });
  }
  return normalized;
};

const parsePassed = (raw: RawRecord, prefix: string, threatLevel: string | undefined): boolean => {
  const value = raw.passed;
  if (typeof value === "boolean") return value;
  if (value != null) {
    throw new ValidationError(`${prefix}passed must be a boolean`, { field: `${prefix}passed` });
  }
  if (threatLevel == null) {
    throw new ValidationError(`${prefix}passed or ${prefix}threat_level is required`, { field: `${prefix}passed` });
  }
  return isPassingThreatLevel(threatLevel);
};

const parseMetadata = (raw: RawRecord, prefix: string): ScanResultMetadata | undefined => {
  const value = raw.metadata;
  if (value == null) return undefined;
  if (!isRecord(value)) {
    throw new ValidationError(`${prefix}metadata must be a JSON object`, { field: `${prefix}metadata` });
  }
  return value;
};

export const parseResultItem = (value: unknown, prefix = ""): ScanResultInput => {
  const raw = requireRecord(value, prefix === "" ? "Result" : prefix.replace(/\.$/, ""));

  const threatLevelRaw = raw.threat_level;
  if (threatLevelRaw != null && (typeof threatLevelRaw !== "string" || threatLevelRaw.trim() === "")) {
    throw new ValidationError(`${prefix}threat_level must be a non-empty string`, { field: `${prefix}threat_level` });
  }
  const threatLevel = typeof threatLevelRaw === "string" ? threatLevelRaw : undefined;

  const testNameField = raw.test_name == null && raw.name != null ? "name" : "test_name";
  const result: ScanResultInput = {
    testId: requireString(raw, "test_id", `${prefix}test_id`),
    testName: requireString(raw, testNameField, `${prefix}test_name`),
    category: requireString(raw, "category", `${prefix}category`),
    severity: parseSeverity(raw, prefix, threatLevel),
    passed: parsePassed(raw, prefix, threatLevel),
    message: optionalString(raw, "message", `${prefix}message`),
    reference: optionalString(raw, "reference", `${prefix}reference`),
    remediation: optionalString(raw, "remediation", `${prefix}remediation`)
  };

  const metadata = parseMetadata(raw, prefix);
  if (metadata !== undefined) {
    result.metadata = metadata;
  }
  return result;
};

/**
 * A body carrying `status` is a terminal signal; anything else is a single progress result.
 */
export const parseResultSubmission = (body: unknown): ResultSubmission => {
  const raw = requireRecord(body, "Request body");
  const idField = raw.job_id == null && raw.scan_id != null ? "scan_id" : "job_id";
  const scanId = parseScanId(raw[idField], idField);

  const status = raw.status;
  if (status == null) {
    return { kind: "progress", scanId, result: parseResultItem(raw) };
  }

  if (!isTerminalStatusValue(status)) {
    throw new ValidationError(`status must be one of ${terminalScanStatuses.join(", ")}`, { field: "status" });
  }

  const startedAt = optionalDate(raw, "started_at");
  const completedAt = optionalDate(raw, "completed_at");
  if (startedAt && completedAt && completedAt.getTime() < startedAt.getTime()) {
    throw new ValidationError("completed_at must not be earlier than started_at", { field: "completed_at" });
  }

  const rawResults = raw.results ?? [];
  if (!Array.isArray(rawResults)) {
    throw new ValidationError("results must be an array", { field: "results" });
  }

  return {
    kind: "terminal",
    scanId,
    status,
    startedAt,
    completedAt,
    results: rawResults.map((item, index) => parseResultItem(item, `results[${index}].`))
  };
};
