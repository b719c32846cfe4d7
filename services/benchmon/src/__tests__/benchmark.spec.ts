import { promises as fs } from "fs";
import http from "http";
import path from "path";
import request from "supertest";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import type { ServiceConfig } from "../config";
import type { RunCoordinator } from "../coordinator/runCoordinator";
import { createApp } from "../server";
import { validateStatusPayload } from "../validation/schemas";
import { WAIT, makeWorkdir, removeWorkdir, testConfig } from "./helpers/fixtures";
import { openSSE } from "./helpers/sseClient";

const IDLE_PAYLOAD = {
  running: false,
  completed: false,
  error: null,
  artifact_ref: null,
  benchmark_started: false,
  watcher_started: false
};

describe("benchmark HTTP API", () => {
  let dir = "";
  let coordinator: RunCoordinator | null = null;

  const build = (overrides: Partial<ServiceConfig> = {}) => {
    const built = createApp({ config: testConfig(dir, overrides) });
    coordinator = built.coordinator;
    return built.app;
  };

  beforeEach(async () => {
    dir = await makeWorkdir();
  });

  afterEach(async () => {
    if (coordinator) await coordinator.stopAndReset();
    coordinator = null;
    await removeWorkdir(dir);
  });

  it("GET /health and /ready", async () => {
    const app = build();
    const health = await request(app).get("/health");
    expect(health.status).toBe(200);
    expect(health.body).toEqual({ ok: true, service: "benchmon" });

    const ready = await request(app).get("/ready");
    expect(ready.body).toEqual({ ok: true });
  });

  it("GET /api/status returns the idle payload matching the schema", async () => {
    const app = build();
    const res = await request(app).get("/api/status");
    expect(res.status).toBe(200);
    expect(res.body).toEqual(IDLE_PAYLOAD);
    expect(validateStatusPayload(res.body)).toEqual({ valid: true, errors: undefined });
    expect(res.header["x-request-id"]).toBeTypeOf("string");
  });

  it("starts a run, rejects a concurrent start with 409, and resets", async () => {
    const app = build({ benchmarkCommand: "sleep 30" });

    const started = await request(app).post("/api/run-benchmark");
    expect(started.status).toBe(202);
    expect(started.body).toMatchObject({ message: "Benchmark started", status: "running" });
    expect(started.body.runId).toBeTypeOf("string");

    const conflict = await request(app).post("/api/run-benchmark");
    expect(conflict.status).toBe(409);
    expect(conflict.body).toEqual({ error: "conflict", detail: "Benchmark is already running" });

    const running = await request(app).get("/api/status");
    expect(running.body.running).toBe(true);

    const reset = await request(app).post("/api/reset");
    expect(reset.status).toBe(200);
    expect(reset.body).toEqual({ message: "Status reset and cleanup completed" });

    const after = await request(app).get("/api/status");
    expect(after.body).toEqual(IDLE_PAYLOAD);
  });

  it("reports a completed run through polling", async () => {
    const app = build({
      benchmarkCommand: "printf 'ts,ops\\n' > benchmark_throughput.csv; sleep 0.3",
      visualizeCommand: "head -c 4096 /dev/zero > throughput_monitor.png; sleep 30"
    });
    await request(app).post("/api/run-benchmark").expect(202);

    await vi.waitFor(async () => {
      const res = await request(app).get("/api/status");
      expect(res.body.completed).toBe(true);
    }, WAIT);

    const res = await request(app).get("/api/status");
    expect(res.body).toMatchObject({ running: false, completed: true, error: null, benchmark_started: true });
    expect(res.body.artifact_ref).toMatch(/^\/static\/throughput_monitor\.png\?t=\d+$/);

    const image = await request(app).get(res.body.artifact_ref);
    expect(image.status).toBe(200);
    expect(Number(image.header["content-length"])).toBe(4096);
  });

  it("reset answers 200 even when cleanup steps fail", async () => {
    const app = build();
    const blocked = path.join(dir, "throughput_monitor.png");
    await fs.mkdir(blocked);

    const res = await request(app).post("/api/reset");
    expect(res.status).toBe(200);
    expect(res.body.message).toBe("Reset completed with errors");
    expect(res.body.errors).toHaveLength(1);
    expect(res.body.errors[0].startsWith(`Cleanup step "delete ${blocked}" failed: `)).toBe(true);
  });

  it("GET /api/check-image reports existence and size", async () => {
    const app = build();
    const image = path.join(dir, "throughput_monitor.png");

    const missing = await request(app).get("/api/check-image");
    expect(missing.body).toEqual({ exists: false, path: image });

    await fs.writeFile(image, Buffer.alloc(10));
    const present = await request(app).get("/api/check-image");
    expect(present.body).toEqual({ exists: true, size: 10, path: image });
  });

  it("requires the API key when one is configured", async () => {
    const app = build({ apiKey: "test-secret" });

    expect((await request(app).get("/api/status")).status).toBe(401);
    expect((await request(app).get("/api/status").set("x-api-key", "test-secret")).status).toBe(200);
    expect((await request(app).get("/api/status").set("Authorization", "Bearer test-secret")).status).toBe(200);
    expect((await request(app).get("/health")).status).toBe(200);
  });

  it("exposes run metrics", async () => {
    const app = build();
    const res = await request(app).get("/metrics");
    expect(res.status).toBe(200);
    expect(res.text).toContain("# TYPE benchmon_runs_total counter");
    expect(res.text).toContain("# TYPE benchmon_artifact_publications_total counter");
  });

  it("streams status snapshots over SSE", async () => {
    const app = build({ benchmarkCommand: "sleep 30" });
    const server = http.createServer(app);
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("server is not listening on a port");
    const { port } = address;
    const sse = openSSE(`http://127.0.0.1:${port}/api/events`);

    try {
      expect(await sse.opened).toBe(200);
      const first = await sse.waitFor((e) => e.event === "status");
      expect(first.data).toEqual(IDLE_PAYLOAD);

      await request(app).post("/api/run-benchmark").expect(202);
      const started = await sse.waitFor((e) => validateStatusPayload(e.data).valid && isStarted(e.data));
      expect(started.data).toMatchObject({ running: true, benchmark_started: true });
    } finally {
      sse.close();
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
  });
});

function isStarted(data: unknown): boolean {
  return typeof data === "object" && data !== null && "benchmark_started" in data && data.benchmark_started === true;
}
