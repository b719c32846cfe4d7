import { EventEmitter } from "events";
import type { RunStatus, StatusField, StatusPayload } from "../types";

export function defaultStatus(): RunStatus {
  return {
    running: false,
    completed: false,
    error: null,
    artifactRef: null,
    benchmarkStarted: false,
    watcherStarted: false,
    warning: null
  };
}

function copyStatus(status: RunStatus): RunStatus {
  return { ...status, artifactRef: status.artifactRef ? { ...status.artifactRef } : null };
}

/**
 * Write capability limited to a subset of status fields. Mutations to any
 * other field made through the draft are discarded on commit.
 */
export interface ScopedStatusWriter<K extends StatusField> {
  update(mutator: (draft: Pick<RunStatus, K>) => void): RunStatus;
}

export type StatusListener = (status: RunStatus) => void;

/**
 * Process-wide run status. Readers only ever receive copies; every update
 * is applied to a private draft and swapped in whole, then broadcast as a
 * "change" event.
 */
export class StatusStore extends EventEmitter {
  private current: RunStatus = defaultStatus();

  snapshot(): RunStatus {
    return copyStatus(this.current);
  }

  update(mutator: (draft: RunStatus) => void): RunStatus {
    const draft = copyStatus(this.current);
    mutator(draft);
    return this.commit(draft);
  }

  reset(): RunStatus {
    return this.commit(defaultStatus());
  }

  writer<K extends StatusField>(fields: readonly K[]): ScopedStatusWriter<K> {
    const allowed = [...fields];
    return {
      update: (mutator) => {
        const draft = copyStatus(this.current);
        mutator(draft);
        const next = copyStatus(this.current);
        for (const field of allowed) {
          assignField(next, draft, field);
        }
        return this.commit(next);
      }
    };
  }

  onChange(listener: StatusListener): () => void {
    this.on("change", listener);
    return () => {
      this.off("change", listener);
    };
  }

  private commit(next: RunStatus): RunStatus {
    this.current = next;
    const published = copyStatus(next);
    this.emit("change", published);
    return copyStatus(next);
  }
}

function assignField<K extends StatusField>(target: RunStatus, source: RunStatus, field: K): void {
  target[field] = source[field];
}

export function toStatusPayload(status: RunStatus): StatusPayload {
  return {
    running: status.running,
    completed: status.completed,
    error: status.error,
    artifact_ref: status.artifactRef ? `${status.artifactRef.path}?t=${status.artifactRef.version}` : null,
    benchmark_started: status.benchmarkStarted,
    watcher_started: status.watcherStarted
  };
}
