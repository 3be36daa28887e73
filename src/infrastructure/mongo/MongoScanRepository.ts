import { MongoClient, type Collection, type Filter, type UpdateFilter } from "mongodb";
import type { ScanDoc, ScanStatus } from "../../core/scan/scan.types";
import type { ScanTransition } from "../../core/scan/scanStateMachine";
import type { ScanRepository, StalePendingQuery } from "../../ports/ScanRepository";
import { mongoIndexes } from "./mongo.indexes";

export type CounterDoc = {
  _id: string;
  seq: number;
};

export const resultIdCounterKey = "scan_results";

type Collections = {
  scans: Collection<ScanDoc>;
  counters: Collection<CounterDoc>;
};

/**
 * Builds the conditional write for a transition. Results are embedded in the scan
 * document, so status, timestamps and appended results change in one atomic update.
 */
export const buildTransitionWrite = (
  scanId: string,
  transition: ScanTransition
): { filter: Filter<ScanDoc>; update: UpdateFilter<ScanDoc> } => {
  const filter: Filter<ScanDoc> = { _id: scanId, status: transition.expectedStatus };
  if (transition.append.length > 0) {
    filter["results.testId"] = { $nin: transition.append.map((result) => result.testId) };
  }

  const set: Partial<Pick<ScanDoc, "status" | "startedAt" | "completedAt">> = { status: transition.status };
  if (transition.startedAt) set.startedAt = transition.startedAt;
  if (transition.completedAt) set.completedAt = transition.completedAt;

  const update: UpdateFilter<ScanDoc> =
    transition.append.length > 0
      ? { $set: set, $push: { results: { $each: transition.append } } }
      : { $set: set };

  return { filter, update };
};

export const toResultIdRange = (lastId: number, count: number): number[] => {
  const first = lastId - count + 1;
  return Array.from({ length: count }, (_, index) => first + index);
};

export class MongoScanRepository implements ScanRepository {
  private client?: MongoClient;
  private collections?: Collections;

  constructor(
    private readonly mongoUri: string,
    private readonly dbName = "scans",
    private readonly scansCollectionName = "scans",
    private readonly countersCollectionName = "counters"
  ) {}

  private async getCollections(): Promise<Collections> {
    if (this.collections) return this.collections;

    this.client = new MongoClient(this.mongoUri);
    await this.client.connect();

    const db = this.client.db(this.dbName);
    const scans = db.collection<ScanDoc>(this.scansCollectionName);
    for (const idx of mongoIndexes.scanCollection) {
      await scans.createIndex(idx.keys, idx.options);
    }

    this.collections = { scans, counters: db.collection<CounterDoc>(this.countersCollectionName) };
    return this.collections;
  }

  async create(scan: ScanDoc): Promise<void> {
    const { scans } = await this.getCollections();
    await scans.insertOne(scan);
  }

  async findById(scanId: string): Promise<ScanDoc | null> {
    const { scans } = await this.getCollections();
    return scans.findOne({ _id: scanId });
  }

  async applyTransition(scanId: string, transition: ScanTransition): Promise<boolean> {
    const { scans } = await this.getCollections();
    const { filter, update } = buildTransitionWrite(scanId, transition);
    const res = await scans.updateOne(filter, update);
    return res.matchedCount === 1;
  }

  async allocateResultIds(count: number): Promise<number[]> {
    if (count <= 0) return [];

    const { counters } = await this.getCollections();
    const counter = await counters.findOneAndUpdate(
      { _id: resultIdCounterKey },
      { $inc: { seq: count } },
      { upsert: true, returnDocument: "after" }
    );
    if (!counter) {
      throw new Error(`Result id counter ${resultIdCounterKey} was not returned`);
    }
    return toResultIdRange(counter.seq, count);
  }

  async markDispatched(scanId: string, at: Date): Promise<void> {
    const { scans } = await this.getCollections();
    await scans.updateOne({ _id: scanId }, { $set: { dispatchedAt: at } });
  }

  async countByStatus(status: ScanStatus): Promise<number> {
    const { scans } = await this.getCollections();
    return scans.countDocuments({ status });
  }

  async findStalePending(query: StalePendingQuery): Promise<ScanDoc[]> {
    const { scans } = await this.getCollections();
    const filter: Filter<ScanDoc> = { status: "PENDING", createdAt: { $lt: query.createdBefore } };
    if (query.undispatchedOnly) {
      filter.dispatchedAt = { $exists: false };
    }
    return scans.find(filter).sort({ createdAt: 1 }).limit(query.limit).toArray();
  }

  async close(): Promise<void> {
    await this.client?.close();
    this.client = undefined;
    this.collections = undefined;
  }
}
