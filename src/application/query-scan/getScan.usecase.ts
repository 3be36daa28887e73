import { NotFoundError } from "../../core/errors";
import { parseScanId } from "../../core/scan/submission.parsers";
import type { ScanRepository } from "../../ports/ScanRepository";
import { guardStore } from "../scan.error-handler";
import { toScanView, type ScanView } from "./scanView";

/**
 * Reads a scan with its results in arrival order. Results live inside the scan document,
 * so one read always sees status, timestamps and results from the same write.
 */
export const getScan = async (deps: { repo: ScanRepository }, rawScanId: string): Promise<ScanView> => {
  const scanId = parseScanId(rawScanId);
  const scan = await guardStore("load scan", { scanId }, () => deps.repo.findById(scanId));
  if (!scan) throw new NotFoundError(scanId);
  return toScanView(scan);
};
