import express, { Request, Response, NextFunction } from "express";
import cors from "cors";
import { loadConfig, ServiceConfig } from "./config";
import { RunCoordinator } from "./coordinator/runCoordinator";
import { errorMessage } from "./errors";
import { createBenchmarkRouter } from "./routes/benchmark";
import { logger, requestIdMiddleware, requestLoggerMiddleware } from "./observability/logger";
import { initDefaultMetrics, metricsMiddleware, register } from "./observability/metrics";

export interface AppOptions {
  config: ServiceConfig;
  coordinator?: RunCoordinator;
}

const defaultAllowedHeaders = [
  "Content-Type",
  "Accept",
  "Origin",
  "X-Requested-With",
  "Authorization",
  "x-api-key"
];

function buildCorsOptions(rawCorsOrigins: string | undefined): cors.CorsOptions {
  if (typeof rawCorsOrigins === "string" && rawCorsOrigins.trim() !== "") {
    const allowed = new Set(
      rawCorsOrigins
        .split(",")
        .map((s) => s.trim())
        .filter((s) => s !== "")
    );

    return {
      origin: (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
        // Allow non-browser (e.g., curl, server-to-server) requests that don't set Origin
        if (!origin) return callback(null, true);
        if (allowed.has(origin)) return callback(null, true);
        return callback(new Error("Not allowed by CORS"));
      },
      allowedHeaders: defaultAllowedHeaders,
      credentials: false
    };
  }
  return {
    origin: true,
    allowedHeaders: defaultAllowedHeaders,
    credentials: false
  };
}

const isExemptPath = (req: Request): boolean => {
  if (req.method === "OPTIONS") return true;
  if (req.method === "GET") {
    const p = req.path;
    if (p === "/health" || p === "/ready" || p === "/metrics") return true;
  }
  return false;
};

// Enabled only when an API key is configured.
function authMiddleware(apiKey: string | undefined) {
  const expected = apiKey?.trim() ?? "";
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!expected || isExemptPath(req)) return next();

    const authHeader = req.header("authorization");
    let bearerToken: string | undefined;
    if (authHeader && authHeader.toLowerCase().startsWith("bearer ")) {
      bearerToken = authHeader.substring(7).trim();
    }

    if (bearerToken === expected || req.header("x-api-key") === expected) {
      return next();
    }
    res.status(401).json({ error: "unauthorized" });
  };
}

export function createApp(options: AppOptions): { app: express.Express; coordinator: RunCoordinator } {
  const { config } = options;
  const coordinator = options.coordinator ?? new RunCoordinator({ config });

  initDefaultMetrics();

  const app = express();
  app.use(cors(buildCorsOptions(config.corsOrigins)));
  app.use(express.json());

  app.use(requestIdMiddleware());
  app.use(requestLoggerMiddleware());
  app.use(metricsMiddleware());
  app.use(authMiddleware(config.apiKey));

  app.get("/ready", (_req, res) => {
    res.status(200).json({ ok: true });
  });

  app.get("/metrics", async (_req, res, next) => {
    try {
      res.setHeader("Content-Type", register.contentType);
      res.send(await register.metrics());
    } catch (err) {
      next(err);
    }
  });

  app.get("/health", (_req, res) => {
    res.json({ ok: true, service: "benchmon" });
  });

  app.use("/api", createBenchmarkRouter(coordinator));
  app.use(config.staticRoute, express.static(config.artifactDir, { etag: false, maxAge: 0 }));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error({ err: errorMessage(err) }, "unhandled request error");
    res.status(500).json({ error: "internal" });
  });

  return { app, coordinator };
}

function main(): void {
  const config = loadConfig();
  const { app, coordinator } = createApp({ config });

  const server = app.listen(config.port, () => {
    logger.info({ port: config.port, workdir: config.workdir, artifactDir: config.artifactDir }, "benchmon listening");
  });

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "shutting down");
    void coordinator
      .stopAndReset()
      .catch((err: unknown) => logger.error({ err: errorMessage(err) }, "cleanup on shutdown failed"))
      .finally(() => server.close(() => process.exit(0)));
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

if (require.main === module) {
  main();
}
