import http from "http";
import type { ScanService } from "./application/scan.service";
import { startReconcileLoop } from "./application/reconcile-pending/reconcile.scheduler";
import { buildScanApp } from "./composition/root";
import { createScanApp } from "./http/scanRoutes";

export const createServer = (service: ScanService) => {
  return http.createServer(createScanApp(service));
};

export const startServer = async (processEnv: NodeJS.ProcessEnv = process.env) => {
  const app = buildScanApp(processEnv);
  const server = createServer(app.service);
  const reconcileLoop = startReconcileLoop(() => app.service.reconcile(), app.config.reconcileIntervalMs);

  await new Promise<void>((resolve) => {
    server.listen(app.env.PORT, () => resolve());
  });
  console.log(JSON.stringify({ event: "server.listening", port: app.env.PORT }));

  const shutdown = async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    await reconcileLoop.stop();
    await app.close();
  };

  return { server, shutdown };
};

if (require.main === module) {
  startServer()
    .then(({ shutdown }) => {
      const onSignal = (signal: NodeJS.Signals) => {
        console.log(JSON.stringify({ event: "server.shutdown", signal }));
        shutdown()
          .then(() => process.exit(0))
          .catch((err: unknown) => {
            // eslint-disable-next-line no-console
            console.error(JSON.stringify({ event: "server.shutdown_failed", message: String(err) }));
            process.exit(1);
          });
      };
      process.once("SIGTERM", onSignal);
      process.once("SIGINT", onSignal);
    })
    .catch((err: unknown) => {
      // eslint-disable-next-line no-console
      console.error(JSON.stringify({ event: "server.start_failed", message: err instanceof Error ? err.message : String(err) }));
      process.exit(1);
    });
}
