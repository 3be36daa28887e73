import type { ScanDoc, ScanStatus } from "../core/scan/scan.types";
import type { ScanTransition } from "../core/scan/scanStateMachine";

export type StalePendingQuery = {
  createdBefore: Date;
  undispatchedOnly: boolean;
  limit: number;
};

/**
 * Durable scan store. Implementations must apply `applyTransition` as one atomic
 * conditional write on a single scan: status, timestamps and appended results all land
 * together or not at all.
 */
export interface ScanRepository {
  create(scan: ScanDoc): Promise<void>;
  findById(scanId: string): Promise<ScanDoc | null>;
  /**
   * Returns false when the scan is missing, is no longer in `transition.expectedStatus`,
   * or already records one of the appended test ids.
   */
  applyTransition(scanId: string, transition: ScanTransition): Promise<boolean>;
  /** Reserves `count` consecutive result ids. */
  allocateResultIds(count: number): Promise<number[]>;
  markDispatched(scanId: string, at: Date): Promise<void>;
  countByStatus(status: ScanStatus): Promise<number>;
  findStalePending(query: StalePendingQuery): Promise<ScanDoc[]>;
}
