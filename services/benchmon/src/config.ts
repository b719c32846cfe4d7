import path from "path";
import { ConfigError } from "./errors";
import { formatErrors, validateConfigFn } from "./validation/schemas";

export interface ServiceConfig {
  benchmarkCommand: string;
  visualizeCommand: string;
  workdir: string;
  artifactDir: string;
  resultFile: string;
  artifactFile: string;
  staticRoute: string;
  graceDelayMs: number;
  pollIntervalMs: number;
  staleRefreshEvery: number;
  terminateGraceMs: number;
  outputLimitBytes: number;
  port: number;
  apiKey?: string;
  corsOrigins?: string;
}

const ENV_KEYS: Record<string, string> = {
  benchmarkCommand: "BENCHMON_BENCHMARK_COMMAND",
  visualizeCommand: "BENCHMON_VISUALIZE_COMMAND",
  workdir: "BENCHMON_WORKDIR",
  artifactDir: "BENCHMON_ARTIFACT_DIR",
  resultFile: "BENCHMON_RESULT_FILE",
  artifactFile: "BENCHMON_ARTIFACT_FILE",
  staticRoute: "BENCHMON_STATIC_ROUTE",
  graceDelayMs: "BENCHMON_GRACE_DELAY_MS",
  pollIntervalMs: "BENCHMON_POLL_INTERVAL_MS",
  staleRefreshEvery: "BENCHMON_STALE_REFRESH_EVERY",
  terminateGraceMs: "BENCHMON_TERMINATE_GRACE_MS",
  outputLimitBytes: "BENCHMON_OUTPUT_LIMIT_BYTES",
  port: "PORT",
  apiKey: "BENCHMON_API_KEY",
  corsOrigins: "CORS_ORIGINS"
};

/**
 * Builds the service configuration from environment variables.
 * Blank variables count as unset. Throws ConfigError listing every problem.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const raw: Record<string, unknown> = {};
  for (const [field, key] of Object.entries(ENV_KEYS)) {
    const value = env[key];
    if (typeof value === "string" && value.trim() !== "") raw[field] = value.trim();
  }

  const workdir = path.resolve(typeof raw.workdir === "string" ? raw.workdir : process.cwd());
  raw.workdir = workdir;
  raw.artifactDir = typeof raw.artifactDir === "string" ? path.resolve(workdir, raw.artifactDir) : workdir;

  if (!validateConfigFn(raw)) {
    throw new ConfigError(formatErrors(validateConfigFn.errors) ?? ["unknown error"]);
  }
  return { ...raw, staticRoute: raw.staticRoute.replace(/\/+$/, "") || "/static" };
}

export function resultPath(config: ServiceConfig): string {
  return path.join(config.workdir, config.resultFile);
}

export function artifactPath(config: ServiceConfig): string {
  return path.join(config.artifactDir, config.artifactFile);
}

/** URL path the artifact is served under; the watcher appends a version token to it. */
export function artifactRoute(config: Pick<ServiceConfig, "staticRoute" | "artifactFile">): string {
  return `${config.staticRoute}/${config.artifactFile}`;
}
