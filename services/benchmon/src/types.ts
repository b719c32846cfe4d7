export type RunState = "idle" | "starting" | "running" | "completed" | "failed";
export type RunOutcome = "completed" | "failed" | "cancelled";
export type ProcessRole = "benchmark" | "visualizer";

export interface ArtifactRef {
  path: string;
  version: string;
}

/**
 * Shared run status. The coordinator writes the run fields; the artifact
 * watcher is limited to `artifactRef`, `watcherStarted` and `warning`.
 */
export interface RunStatus {
  running: boolean;
  completed: boolean;
  error: string | null;
  artifactRef: ArtifactRef | null;
  benchmarkStarted: boolean;
  watcherStarted: boolean;
  warning: string | null;
}

export type StatusField = keyof RunStatus;

/** Field-exact payload served by GET /api/status. */
export interface StatusPayload {
  running: boolean;
  completed: boolean;
  error: string | null;
  artifact_ref: string | null;
  benchmark_started: boolean;
  watcher_started: boolean;
}

export interface ArtifactCheck {
  exists: boolean;
  size?: number;
  path: string;
}

export interface CleanupReport {
  terminated: ProcessRole[];
  deleted: string[];
  errors: string[];
}
