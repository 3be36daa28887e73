import express, {
  type ErrorRequestHandler,
  type Express,
  type Request,
  type RequestHandler,
  type Response
} from "express";
import type { ScanService } from "../application/scan.service";
import type { IngestOutcome } from "../application/ingest-results/ingestResults.usecase";
import { parseResultSubmission, parseScanRequest } from "../core/scan/submission.parsers";
import { isDebugMode } from "../shared/config/env";
import { fromRequestError, toHttpError, type RouteName } from "./httpErrors";

export const maxBodySize = "1mb";

const outcomeMessages: Record<IngestOutcome["kind"], string> = {
  recorded: "Result recorded",
  duplicate: "Result already recorded",
  finalized: "Results received and scan updated",
  already_finalized: "Scan already finalized"
};

const sendFailure = (res: Response, err: unknown, route?: RouteName): void => {
  const { status, body } = toHttpError(err, route);
  if (status >= 500) {
    const error = err instanceof Error ? err : new Error(String(err));
    // eslint-disable-next-line no-console
    console.error(JSON.stringify({
      event: "http.request_failed",
      route: route ?? "request",
      status,
      code: body.error.code,
      message: error.message,
      ...(isDebugMode() && error.stack ? { stack: error.stack } : {})
    }));
  }
  res.status(status).json(body);
};

// Express 4 does not route rejected handler promises; failures are answered here.
const handle =
  (route: RouteName, handler: (req: Request, res: Response) => Promise<void>): RequestHandler =>
  (req, res) => {
    void handler(req, res).catch((err: unknown) => sendFailure(res, err, route));
  };

const requestErrorHandler: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
  sendFailure(res, fromRequestError(err));
};

export const createScanApp = (service: ScanService): Express => {
  const app = express();
  app.disable("x-powered-by");
  app.use(express.json({ limit: maxBodySize }));

  app.get("/health", (_req, res) => {
    res.status(200).json({ status: "OK" });
  });

  app.post(
    "/api/scans",
    handle("submit_scan", async (req, res) => {
      const { target } = parseScanRequest(req.body);
      const accepted = await service.submitScan(target);
      res.status(202).json({ scanId: accepted.scanId, status: accepted.status });
    })
  );

  app.post(
    "/api/results",
    handle("submit_result", async (req, res) => {
      const outcome = await service.submitResult(parseResultSubmission(req.body));
      res.status(200).json({ message: outcomeMessages[outcome.kind] });
    })
  );

  app.get(
    "/api/scans/:id",
    handle("get_scan", async (req, res) => {
      res.status(200).json(await service.getScan(req.params.id));
    })
  );

  app.use((_req, res) => {
    res.status(404).json({ error: { code: "route_not_found", message: "Not Found", retryable: false } });
  });
  app.use(requestErrorHandler);

  return app;
};
