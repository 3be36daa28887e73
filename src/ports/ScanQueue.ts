import type { ScanDispatchMessage } from "../core/scan/scan.types";

export interface ScanQueue {
  /** Resolves once the queue has durably accepted the message. */
  publish(message: ScanDispatchMessage): Promise<void>;
}
