import { Queue, type JobsOptions } from "bullmq";
import IORedis from "ioredis";
import type { ScanDispatchMessage } from "../../core/scan/scan.types";
import type { ScanQueue } from "../../ports/ScanQueue";

export const scanJobName = "scan";

/**
 * Jobs are keyed by scan id: publishing a scan that is still queued is collapsed by
 * BullMQ instead of creating a second job. Completed jobs are dropped, failed ones kept
 * for inspection.
 */
export const buildScanJobOptions = (message: ScanDispatchMessage): JobsOptions => ({
  jobId: message.id,
  removeOnComplete: true,
  removeOnFail: false
});

export class BullMqScanQueue implements ScanQueue {
  private connection?: IORedis;
  private queue?: Queue<ScanDispatchMessage>;

  constructor(
    private readonly redisUrl: string,
    private readonly queueName = "scan_queue",
    private readonly publishTimeoutMs = 5000
  ) {}

  private getQueue(): Queue<ScanDispatchMessage> {
    if (this.queue) return this.queue;

    this.connection = new IORedis(this.redisUrl, {
      enableOfflineQueue: false,
      connectTimeout: this.publishTimeoutMs
    });
    this.queue = new Queue<ScanDispatchMessage>(this.queueName, { connection: this.connection });
    return this.queue;
  }

  /** Bounded by `publishTimeoutMs`: `add` does not settle while Redis is unreachable. */
  async publish(message: ScanDispatchMessage): Promise<void> {
    const queue = this.getQueue();
    const pending = queue.add(scanJobName, { id: message.id, target: message.target }, buildScanJobOptions(message));

    await new Promise<void>((resolve, reject) => {
      const timeout = setTimeout(() => {
        reject(new Error(`Queue publish timeout after ${this.publishTimeoutMs}ms`));
      }, this.publishTimeoutMs);

      void pending.then(
        () => {
          clearTimeout(timeout);
          resolve();
        },
        (error: unknown) => {
          clearTimeout(timeout);
          reject(error);
        }
      );
    });
  }

  async close(): Promise<void> {
    await this.queue?.close();
    await this.connection?.quit();
    this.queue = undefined;
    this.connection = undefined;
  }
}
