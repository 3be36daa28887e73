import type { ScanServiceConfig } from "../application/scan-service.config";
import { createScanService, type ScanService } from "../application/scan.service";
import type { ReconcileSummary } from "../application/reconcile-pending/reconcilePending.usecase";
import { BullMqScanQueue } from "../infrastructure/bullmq/BullMqScanQueue";
import { MongoScanRepository } from "../infrastructure/mongo/MongoScanRepository";
import { loadEnv, type Env } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";

export type ScanApp = {
  env: Env;
  config: ScanServiceConfig;
  service: ScanService;
  close: () => Promise<void>;
};

export const buildScanApp = (processEnv: NodeJS.ProcessEnv = process.env): ScanApp => {
  const env = loadEnv(processEnv);
  const { serviceConfig, publishTimeoutMs } = loadRuntimeConfigFromEnv(processEnv);

  const repo = new MongoScanRepository(env.MONGO_URI, env.MONGO_DB);
  const queue = new BullMqScanQueue(env.REDIS_URL, env.SCAN_QUEUE_NAME, publishTimeoutMs);
  const service = createScanService({ repo, queue, config: serviceConfig });

  return {
    env,
    config: serviceConfig,
    service,
    close: async () => {
      try {
        await queue.close();
      } finally {
        await repo.close();
      }
    }
  };
};

export const runReconcile = async (): Promise<ReconcileSummary> => {
  const app = buildScanApp();
  try {
    return await app.service.reconcile();
  } finally {
    await app.close();
  }
};
