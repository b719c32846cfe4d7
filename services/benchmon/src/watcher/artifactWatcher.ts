import { promises as fs } from "fs";
import { WatchIOError, errnoCode, errorMessage } from "../errors";
import { createLogger, Logger } from "../observability/logger";
import { artifactPublicationsTotal } from "../observability/metrics";
import type { ScopedStatusWriter } from "../store/statusStore";

/** Status fields the watcher is allowed to write. */
export const WATCHER_FIELDS = ["artifactRef", "watcherStarted", "warning"] as const;
export type WatcherField = (typeof WATCHER_FIELDS)[number];

/** Returns the file size in bytes, or null when the file does not exist. */
export type FileProbe = (path: string) => Promise<number | null>;

export const statFileSize: FileProbe = async (path) => {
  try {
    const stats = await fs.stat(path);
    return stats.size;
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return null;
    throw err;
  }
};

export interface ArtifactWatcherOptions {
  /** File on disk to poll. */
  filePath: string;
  /** Path published in the artifact reference, without version token. */
  publicPath: string;
  pollIntervalMs: number;
  /** Republish an unchanged artifact every N stale ticks. */
  staleRefreshEvery: number;
  writer: ScopedStatusWriter<WatcherField>;
  probe?: FileProbe;
  clock?: VersionClock;
  logger?: Logger;
}

export type TickResult = "missing" | "empty" | "changed" | "stale" | "refreshed" | "error";

/**
 * Issues cache-busting version tokens: millisecond timestamps, bumped when
 * the clock has not advanced so that every token is distinct.
 */
export class VersionClock {
  private last = 0;

  constructor(private readonly now: () => number = Date.now) {}

  next(): string {
    const candidate = this.now();
    this.last = candidate > this.last ? candidate : this.last + 1;
    return String(this.last);
  }
}

/** Cancellable handle for a running watch loop. */
export interface WatchTask {
  /** Resolves when the loop has exited. */
  readonly done: Promise<void>;
  stop(): Promise<void>;
}

interface WatchState {
  lastKnownSize: number;
  staleCount: number;
  isFirstObservation: boolean;
}

/**
 * Polls the artifact file and publishes a versioned reference to it whenever
 * its size changes, plus every `staleRefreshEvery` unchanged polls so that
 * clients holding a cached copy fetch it again.
 */
export class ArtifactWatcher {
  private readonly probe: FileProbe;
  private readonly clock: VersionClock;
  private readonly log: Logger;
  private state: WatchState = { lastKnownSize: 0, staleCount: 0, isFirstObservation: true };

  constructor(private readonly options: ArtifactWatcherOptions) {
    this.probe = options.probe ?? statFileSize;
    this.clock = options.clock ?? new VersionClock();
    this.log = options.logger ?? createLogger("watcher");
  }

  /**
   * Runs the poll loop until `shouldStop` returns true or the task is stopped.
   * The stop condition is checked once per tick.
   */
  start(shouldStop: () => boolean = () => false): WatchTask {
    let stopped = false;
    let wake: (() => void) | null = null;
    const halted = () => stopped || shouldStop();

    this.state = { lastKnownSize: 0, staleCount: 0, isFirstObservation: true };
    this.options.writer.update((draft) => {
      draft.watcherStarted = true;
    });
    this.log.info({ file: this.options.filePath, intervalMs: this.options.pollIntervalMs }, "artifact watcher started");

    const loop = async () => {
      while (!halted()) {
        await new Promise<void>((resolve) => {
          const timer = setTimeout(resolve, this.options.pollIntervalMs);
          wake = () => {
            clearTimeout(timer);
            resolve();
          };
        });
        wake = null;
        if (halted()) break;
        await this.tick();
      }
      this.log.info("artifact watcher stopped");
    };

    const done = loop();
    return {
      done,
      stop: async () => {
        stopped = true;
        if (wake) wake();
        await done;
      }
    };
  }

  /** One poll. Never throws. */
  async tick(): Promise<TickResult> {
    const { filePath } = this.options;
    let size: number | null;
    try {
      size = await this.probe(filePath);
    } catch (err) {
      const warning = new WatchIOError(filePath, errorMessage(err));
      this.log.warn({ err: warning.message }, "artifact poll failed");
      this.options.writer.update((draft) => {
        draft.warning = warning.message;
      });
      return "error";
    }

    if (size === null) {
      this.log.debug({ file: filePath }, "artifact not found yet");
      return "missing";
    }
    if (size === 0) return "empty";

    const state = this.state;
    if (state.isFirstObservation || size !== state.lastKnownSize) {
      state.isFirstObservation = false;
      state.lastKnownSize = size;
      state.staleCount = 0;
      const ref = this.publish("changed");
      this.log.info({ size, ref }, "artifact updated");
      return "changed";
    }

    state.staleCount += 1;
    if (state.staleCount % this.options.staleRefreshEvery === 0) {
      const ref = this.publish("stale");
      this.log.debug({ size, ref }, "artifact refreshed without change");
      return "refreshed";
    }
    return "stale";
  }

  private publish(reason: "changed" | "stale"): string {
    const version = this.clock.next();
    this.options.writer.update((draft) => {
      draft.artifactRef = { path: this.options.publicPath, version };
    });
    artifactPublicationsTotal.labels(reason).inc();
    return `${this.options.publicPath}?t=${version}`;
  }
}
