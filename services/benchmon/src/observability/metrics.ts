import { Registry, collectDefaultMetrics, Counter, Gauge, Histogram } from "prom-client";
import type { Request, Response, NextFunction } from "express";

/**
 * Custom Registry so we can expose default + custom metrics on /metrics
 */
export const register = new Registry();

/**
 * Histogram to measure HTTP request durations with labels method, route, status_code
 */
export const httpRequestDurationSeconds = new Histogram({
  name: "http_request_duration_seconds",
  help: "Duration of HTTP requests in seconds",
  labelNames: ["method", "route", "status_code"] as const,
  registers: [register],
  buckets: [0.005, 0.01, 0.05, 0.1, 0.3, 0.5, 1, 2, 5]
});

export const runsTotal = new Counter({
  name: "benchmon_runs_total",
  help: "Benchmark runs that reached a terminal state",
  labelNames: ["outcome"] as const,
  registers: [register]
});

export const runDurationSeconds = new Histogram({
  name: "benchmon_run_duration_seconds",
  help: "Wall time from run start to terminal state",
  labelNames: ["outcome"] as const,
  registers: [register],
  buckets: [1, 5, 15, 30, 60, 120, 300, 600, 1800]
});

export const runActive = new Gauge({
  name: "benchmon_run_active",
  help: "1 while a benchmark run is starting or running",
  registers: [register]
});

export const artifactPublicationsTotal = new Counter({
  name: "benchmon_artifact_publications_total",
  help: "Artifact references published, by reason",
  labelNames: ["reason"] as const,
  registers: [register]
});

let defaultMetricsStarted = false;

/**
 * Initialize collection of default Node/process metrics on the custom registry.
 * Safe to call more than once.
 */
export function initDefaultMetrics(): void {
  if (defaultMetricsStarted) return;
  defaultMetricsStarted = true;
  collectDefaultMetrics({ register });
}

/**
 * Express middleware that measures request duration and records into the histogram.
 * Uses req.route?.path when available, otherwise falls back to req.path.
 */
export function metricsMiddleware() {
  return (req: Request, res: Response, next: NextFunction) => {
    const start = process.hrtime();
    res.on("finish", () => {
      const diff = process.hrtime(start);
      const durationSeconds = diff[0] + diff[1] / 1e9;
      const routePath: unknown = req.route?.path;
      const route = typeof routePath === "string" ? routePath : req.path;
      httpRequestDurationSeconds.labels(req.method, route, String(res.statusCode)).observe(durationSeconds);
    });
    next();
  };
}
