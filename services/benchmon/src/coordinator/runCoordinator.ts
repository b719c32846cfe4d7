import { nanoid } from "nanoid";
import { artifactPath, artifactRoute, resultPath, ServiceConfig } from "../config";
import {
  AlreadyRunningError,
  BenchmonError,
  MissingOutputError,
  ProcessExitError,
  errorMessage
} from "../errors";
import { createLogger } from "../observability/logger";
import { artifactPublicationsTotal, runActive, runDurationSeconds, runsTotal } from "../observability/metrics";
import { ProcessHandle, ProcessSpawner } from "../process/processHandle";
import { StatusStore, defaultStatus } from "../store/statusStore";
import type { ArtifactCheck, CleanupReport, ProcessRole, RunOutcome, RunState, RunStatus } from "../types";
import {
  ArtifactWatcher,
  FileProbe,
  VersionClock,
  WATCHER_FIELDS,
  WatchTask,
  statFileSize
} from "../watcher/artifactWatcher";
import { deleteIfPresent, runCleanup } from "./cleanup";

const log = createLogger("coordinator");

export interface RunCoordinatorOptions {
  config: ServiceConfig;
  store?: StatusStore;
  /** Environment handed to both external commands. */
  env?: NodeJS.ProcessEnv;
  probe?: FileProbe;
  clock?: VersionClock;
  spawner?: ProcessSpawner;
}

export interface ProcessInfo {
  role: ProcessRole;
  pid: number | undefined;
  live: boolean;
}

export interface StartedRun {
  runId: string;
  /** Resolves with the terminal outcome of the run. Never rejects. */
  done: Promise<RunOutcome>;
}

/**
 * Per-run cancellation: a flag checked after every suspension point plus a
 * way to cut the grace delay short.
 */
class RunContext {
  readonly startedAt = process.hrtime.bigint();
  done: Promise<RunOutcome> = Promise.resolve("cancelled");
  private cancelledFlag = false;
  private readonly sleepers = new Set<() => void>();

  constructor(readonly id: string) {}

  get cancelled(): boolean {
    return this.cancelledFlag;
  }

  cancel(): void {
    this.cancelledFlag = true;
    for (const wake of this.sleepers) wake();
    this.sleepers.clear();
  }

  sleep(ms: number): Promise<void> {
    if (this.cancelledFlag) return Promise.resolve();
    return new Promise<void>((resolve) => {
      const wake = () => {
        clearTimeout(timer);
        this.sleepers.delete(wake);
        resolve();
      };
      const timer = setTimeout(wake, ms);
      this.sleepers.add(wake);
    });
  }
}

/**
 * Owns the single benchmark run: spawns the benchmark, starts the visualizer
 * and artifact watcher after the grace delay, and settles the run once the
 * benchmark exits.
 *
 *   idle ──start──▶ starting ──spawned──▶ running ──exit 0 + result──▶ completed
 *                      │                     └──exit ≠ 0 / no result──▶ failed
 *                      └──spawn error──▶ failed
 *
 * completed and failed accept a new start(); stopAndReset() returns to idle
 * from anywhere.
 */
export class RunCoordinator {
  readonly store: StatusStore;
  private readonly config: ServiceConfig;
  private readonly env: NodeJS.ProcessEnv | undefined;
  private readonly probe: FileProbe;
  private readonly clock: VersionClock;
  private readonly spawner: ProcessSpawner;

  private state: RunState = "idle";
  private active: RunContext | null = null;
  private benchmark: ProcessHandle | null = null;
  private visualizer: ProcessHandle | null = null;
  private watch: WatchTask | null = null;
  private cleanupInFlight: Promise<CleanupReport> | null = null;

  constructor(options: RunCoordinatorOptions) {
    this.config = options.config;
    this.store = options.store ?? new StatusStore();
    this.env = options.env;
    this.probe = options.probe ?? statFileSize;
    this.clock = options.clock ?? new VersionClock();
    this.spawner = options.spawner ?? ((spawnOptions) => ProcessHandle.spawn(spawnOptions));
  }

  get runState(): RunState {
    return this.state;
  }

  get runId(): string | null {
    return this.active?.id ?? null;
  }

  snapshot(): RunStatus {
    return this.store.snapshot();
  }

  /**
   * Begins a run in the background. Throws AlreadyRunningError, leaving all
   * state untouched, while a run is starting or running or cleanup is underway.
   */
  start(): StartedRun {
    if (this.cleanupInFlight) throw new AlreadyRunningError("Cleanup is in progress");
    if (this.state === "starting" || this.state === "running") throw new AlreadyRunningError();

    const run = new RunContext(nanoid(10));
    this.active = run;
    this.state = "starting";
    this.store.update((draft) => {
      Object.assign(draft, defaultStatus(), { running: true });
    });
    runActive.set(1);
    log.info({ runId: run.id, command: this.config.benchmarkCommand }, "run starting");

    run.done = this.execute(run)
      .catch(async (err: unknown): Promise<RunOutcome> => {
        if (run.cancelled) return "cancelled";
        log.error({ runId: run.id, err: errorMessage(err) }, "run crashed");
        return this.fail(run, errorMessage(err));
      })
      .then((outcome) => {
        this.recordOutcome(run, outcome);
        return outcome;
      });
    return { runId: run.id, done: run.done };
  }

  /**
   * Idempotent teardown from any state. Concurrent callers share one cleanup.
   */
  stopAndReset(): Promise<CleanupReport> {
    if (this.cleanupInFlight) return this.cleanupInFlight;
    const pending = this.performCleanup().finally(() => {
      this.cleanupInFlight = null;
    });
    this.cleanupInFlight = pending;
    return pending;
  }

  async checkArtifact(): Promise<ArtifactCheck> {
    const path = artifactPath(this.config);
    const size = await this.probe(path);
    return size === null ? { exists: false, path } : { exists: true, size, path };
  }

  /** Processes spawned for the current or most recent run. */
  processes(): ProcessInfo[] {
    return [this.benchmark, this.visualizer]
      .filter((h): h is ProcessHandle => h !== null)
      .map((h) => ({ role: h.role, pid: h.pid, live: h.live }));
  }

  private async execute(run: RunContext): Promise<RunOutcome> {
    await this.releaseLeftovers();
    if (run.cancelled) return "cancelled";

    const benchmark = await this.spawnOrNull(run, "benchmark", this.config.benchmarkCommand);
    if (benchmark === "failed") return "failed";
    if (benchmark === null) return "cancelled";

    this.store.update((draft) => {
      draft.benchmarkStarted = true;
    });
    this.state = "running";
    log.info({ runId: run.id, graceDelayMs: this.config.graceDelayMs }, "benchmark started, waiting before visualization");

    await run.sleep(this.config.graceDelayMs);

    if (this.state === "running" && !run.cancelled) {
      this.startWatcher(run);
      await this.spawnOrNull(run, "visualizer", this.config.visualizeCommand);
    }

    const exit = await benchmark.waitForExit();
    if (run.cancelled) return "cancelled";
    await this.stopWatcher();

    if (exit.code !== 0) {
      const failure = new ProcessExitError("benchmark", exit.code, exit.signal, benchmark.stderr);
      log.error({ runId: run.id, ...failure.context, err: failure.message }, "benchmark failed");
      return this.fail(run, failure.message);
    }

    const result = resultPath(this.config);
    if ((await this.probe(result)) === null) {
      const missing = new MissingOutputError(result, this.config.resultFile);
      log.warn({ runId: run.id, ...missing.context }, "result file not found");
      return this.fail(run, missing.message);
    }
    if (run.cancelled) return "cancelled";

    const finalSize = await this.probe(artifactPath(this.config));
    if (run.cancelled) return "cancelled";
    const version = finalSize !== null ? this.clock.next() : null;
    if (version !== null) {
      artifactPublicationsTotal.labels("final").inc();
      log.info({ runId: run.id, size: finalSize }, "final artifact captured");
    }

    this.store.update((draft) => {
      draft.running = false;
      draft.completed = true;
      if (version !== null) draft.artifactRef = { path: artifactRoute(this.config), version };
    });
    this.state = "completed";
    log.info({ runId: run.id }, "benchmark completed successfully");
    return "completed";
  }

  /**
   * Spawns one external command. Returns null when the run was cancelled
   * (terminating the process if it got as far as starting) and "failed" when a
   * benchmark spawn error failed the run. Visualizer spawn errors only warn.
   */
  private async spawnOrNull(
    run: RunContext,
    role: ProcessRole,
    command: string
  ): Promise<ProcessHandle | null | "failed"> {
    let handle: ProcessHandle;
    try {
      handle = await this.spawner({
        role,
        command,
        workdir: this.config.workdir,
        env: this.env,
        outputLimitBytes: this.config.outputLimitBytes
      });
    } catch (err) {
      if (run.cancelled) return null;
      const context = err instanceof BenchmonError ? err.context : { role, command };
      if (role === "visualizer") {
        log.warn({ runId: run.id, ...context, err: errorMessage(err) }, "visualizer failed to start");
        return null;
      }
      log.error({ runId: run.id, ...context, err: errorMessage(err) }, "benchmark failed to start");
      return this.fail(run, errorMessage(err));
    }

    // Cleanup only sees handles that were stored before it began.
    if (run.cancelled) {
      await handle.terminate(this.config.terminateGraceMs);
      return null;
    }
    if (role === "benchmark") this.benchmark = handle;
    else this.visualizer = handle;
    return handle;
  }

  private startWatcher(run: RunContext): void {
    const watcher = new ArtifactWatcher({
      filePath: artifactPath(this.config),
      publicPath: artifactRoute(this.config),
      pollIntervalMs: this.config.pollIntervalMs,
      staleRefreshEvery: this.config.staleRefreshEvery,
      writer: this.store.writer(WATCHER_FIELDS),
      probe: this.probe,
      clock: this.clock,
      logger: createLogger("watcher").child({ runId: run.id })
    });
    this.watch = watcher.start(() => this.state !== "running" || run.cancelled);
  }

  private async stopWatcher(): Promise<void> {
    const watch = this.watch;
    this.watch = null;
    if (watch) await watch.stop();
  }

  private async fail(run: RunContext, message: string): Promise<"failed"> {
    this.store.update((draft) => {
      draft.running = false;
      draft.completed = false;
      draft.error = message;
    });
    this.state = "failed";
    await this.stopWatcher();
    log.error({ runId: run.id, err: message }, "run failed");
    return "failed";
  }

  // A new run replaces whatever the previous one left behind: the visualizer
  // may still be rendering and its outputs are still on disk.
  private async releaseLeftovers(): Promise<void> {
    const leftovers = [this.benchmark, this.visualizer].filter(
      (h): h is ProcessHandle => h !== null && h.live
    );
    this.benchmark = null;
    this.visualizer = null;
    await Promise.all(leftovers.map((h) => h.terminate(this.config.terminateGraceMs)));
    for (const file of [resultPath(this.config), artifactPath(this.config)]) {
      if (await deleteIfPresent(file)) log.info({ file }, "removed output of previous run");
    }
  }

  private async performCleanup(): Promise<CleanupReport> {
    const run = this.active;
    run?.cancel();

    const handles = [this.benchmark, this.visualizer].filter((h): h is ProcessHandle => h !== null);
    const watch = this.watch;
    this.watch = null;

    const report = await runCleanup({
      handles,
      watch,
      pending: run ? [run.done] : [],
      files: [resultPath(this.config), artifactPath(this.config)],
      store: this.store,
      terminateGraceMs: this.config.terminateGraceMs
    });

    this.active = null;
    this.state = "idle";
    return report;
  }

  private recordOutcome(run: RunContext, outcome: RunOutcome): void {
    const seconds = Number(process.hrtime.bigint() - run.startedAt) / 1e9;
    runsTotal.labels(outcome).inc();
    runDurationSeconds.labels(outcome).observe(seconds);
    runActive.set(0);
  }
}
