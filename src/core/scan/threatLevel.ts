import type { Severity } from "./scan.types";

/**
 * Outcome policy for workers that report a qualitative threat level instead of a
 * pass/fail flag. Only "none" and "info" count as passing; every other level is a
 * failing finding.
 */
const passingLevels: ReadonlySet<string> = new Set(["none", "info"]);

const severityByLevel: ReadonlyMap<string, Severity> = new Map([
  ["none", "info"],
  ["info", "info"],
  ["low", "low"],
  ["medium", "medium"],
  ["high", "high"],
  ["critical", "critical"]
]);

const normalizeLevel = (level: string): string => level.trim().toLowerCase();

export const isPassingThreatLevel = (level: string): boolean => passingLevels.has(normalizeLevel(level));

export const severityFromThreatLevel = (level: string): Severity | undefined =>
  severityByLevel.get(normalizeLevel(level));
