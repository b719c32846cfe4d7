import { Router, Request, Response, NextFunction } from "express";
import type { RunCoordinator } from "../coordinator/runCoordinator";
import { AlreadyRunningError, errorMessage } from "../errors";
import { createLogger } from "../observability/logger";
import { toStatusPayload } from "../store/statusStore";
import type { RunStatus } from "../types";

const log = createLogger("routes");

const HEARTBEAT_MS = 15000;

export function createBenchmarkRouter(coordinator: RunCoordinator): Router {
  const router = Router();

  // POST /api/run-benchmark -> start a run in the background; poll /api/status for progress
  router.post("/run-benchmark", (_req: Request, res: Response, next: NextFunction) => {
    try {
      const { runId, done } = coordinator.start();
      void done.then((outcome) => log.info({ runId, outcome }, "run settled"));
      res.status(202).json({ message: "Benchmark started", status: "running", runId });
    } catch (err) {
      if (err instanceof AlreadyRunningError) {
        res.status(409).json({ error: "conflict", detail: err.message });
        return;
      }
      next(err);
    }
  });

  router.get("/status", (_req, res) => {
    res.json(toStatusPayload(coordinator.snapshot()));
  });

  // Same payload as /status, pushed on every change.
  router.get("/events", (req, res) => {
    res.set({
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive"
    });
    res.flushHeaders();

    const send = (status: RunStatus) => {
      res.write(`event: status\n`);
      res.write(`data: ${JSON.stringify(toStatusPayload(status))}\n\n`);
    };

    const unsubscribe = coordinator.store.onChange(send);
    const heartbeat = setInterval(() => {
      res.write(`: keep-alive ${Date.now()}\n\n`);
    }, HEARTBEAT_MS);

    req.on("close", () => {
      clearInterval(heartbeat);
      unsubscribe();
    });

    send(coordinator.snapshot());
  });

  // Cleanup failures are reported but never turn into an error response.
  router.post("/reset", async (_req, res) => {
    try {
      const report = await coordinator.stopAndReset();
      if (report.errors.length > 0) {
        res.json({ message: "Reset completed with errors", errors: report.errors });
        return;
      }
      res.json({ message: "Status reset and cleanup completed" });
    } catch (err) {
      log.error({ err: errorMessage(err) }, "reset failed");
      res.json({ message: `Reset failed: ${errorMessage(err)}` });
    }
  });

  router.get("/check-image", async (_req, res, next) => {
    try {
      res.json(await coordinator.checkArtifact());
    } catch (err) {
      next(err);
    }
  });

  return router;
}
