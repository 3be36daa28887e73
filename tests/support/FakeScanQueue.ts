import type { ScanDispatchMessage } from "../../src/core/scan/scan.types";
import type { ScanQueue } from "../../src/ports/ScanQueue";

export class FakeScanQueue implements ScanQueue {
  readonly published: ScanDispatchMessage[] = [];
  publishCalls = 0;
  private failures: Error[] = [];

  /** The next `count` publish calls reject with `error`. */
  failNext(count: number, error = new Error("queue unavailable")): void {
    for (let i = 0; i < count; i += 1) this.failures.push(error);
  }

  async publish(message: ScanDispatchMessage): Promise<void> {
    this.publishCalls += 1;
    const failure = this.failures.shift();
    if (failure) throw failure;
    this.published.push({ ...message });
  }
}
