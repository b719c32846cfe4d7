import { promises as fs } from "fs";
import { CleanupError, errnoCode, errorMessage } from "../errors";
import { createLogger, Logger } from "../observability/logger";
import type { ProcessHandle } from "../process/processHandle";
import type { StatusStore } from "../store/statusStore";
import type { CleanupReport } from "../types";
import type { WatchTask } from "../watcher/artifactWatcher";

export interface CleanupResources {
  handles: ProcessHandle[];
  watch: WatchTask | null;
  /** In-flight activities to join once their processes are gone. */
  pending: Promise<unknown>[];
  files: string[];
  store: StatusStore;
  terminateGraceMs: number;
  logger?: Logger;
}

/**
 * Removes a file if present. Returns false when there was nothing to delete.
 */
export async function deleteIfPresent(path: string): Promise<boolean> {
  try {
    await fs.unlink(path);
    return true;
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return false;
    throw err;
  }
}

/**
 * Tears a run down from whatever state it is in: terminates live processes,
 * joins the watcher and the run flow, deletes output files and resets the
 * status store. A failing step is recorded and the remaining steps still run.
 */
export async function runCleanup(resources: CleanupResources): Promise<CleanupReport> {
  const log = resources.logger ?? createLogger("cleanup");
  const report: CleanupReport = { terminated: [], deleted: [], errors: [] };

  const record = (step: string, err: unknown) => {
    const failure = new CleanupError(step, errorMessage(err));
    log.error({ step, err: failure.message }, "cleanup step failed");
    report.errors.push(failure.message);
  };

  log.info("stopping all processes and cleaning up files");

  const live = resources.handles.filter((h) => h.live);
  const outcomes = await Promise.allSettled(
    live.map(async (handle) => {
      log.info({ role: handle.role, pid: handle.pid }, "terminating process");
      const result = await handle.terminate(resources.terminateGraceMs);
      log.info({ role: handle.role, forced: result.forced }, "process terminated");
      return handle.role;
    })
  );
  outcomes.forEach((outcome, i) => {
    if (outcome.status === "fulfilled") report.terminated.push(outcome.value);
    else record(`terminate ${live[i].role}`, outcome.reason);
  });

  if (resources.watch) {
    try {
      await resources.watch.stop();
    } catch (err) {
      record("stop watcher", err);
    }
  }

  for (const settled of await Promise.allSettled(resources.pending)) {
    if (settled.status === "rejected") record("join run", settled.reason);
  }

  for (const file of resources.files) {
    try {
      if (await deleteIfPresent(file)) {
        report.deleted.push(file);
        log.info({ file }, "deleted file");
      }
    } catch (err) {
      record(`delete ${file}`, err);
    }
  }

  resources.store.reset();
  log.info({ errors: report.errors.length }, "cleanup completed");
  return report;
}
