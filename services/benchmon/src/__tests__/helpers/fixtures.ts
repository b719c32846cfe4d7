import { promises as fs } from "fs";
import os from "os";
import path from "path";
import type { ServiceConfig } from "../../config";
import type { RunStatus } from "../../types";

export async function makeWorkdir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "benchmon-"));
}

export async function removeWorkdir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function exists(file: string): Promise<boolean> {
  try {
    await fs.stat(file);
    return true;
  } catch {
    return false;
  }
}

/** Fast timings so runs settle in well under a second. */
export function testConfig(workdir: string, overrides: Partial<ServiceConfig> = {}): ServiceConfig {
  return {
    benchmarkCommand: "true",
    visualizeCommand: "true",
    workdir,
    artifactDir: workdir,
    resultFile: "benchmark_throughput.csv",
    artifactFile: "throughput_monitor.png",
    staticRoute: "/static",
    graceDelayMs: 50,
    pollIntervalMs: 20,
    staleRefreshEvery: 5,
    terminateGraceMs: 500,
    outputLimitBytes: 65536,
    port: 0,
    ...overrides
  };
}

/** Checks the cross-field invariants every published status must satisfy. */
export function invariantViolations(status: RunStatus): string[] {
  const problems: string[] = [];
  if (status.running && status.completed) problems.push("running and completed");
  if (status.error !== null && status.running) problems.push("error while running");
  if (status.watcherStarted && !status.benchmarkStarted) problems.push("watcher before benchmark");
  if (status.artifactRef !== null && !status.benchmarkStarted) problems.push("artifact before benchmark");
  return problems;
}

/** Options for vi.waitFor around real processes and file polling. */
export const WAIT = { timeout: 5000, interval: 20 };
