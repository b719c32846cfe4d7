import { spawn, ChildProcess } from "child_process";
import { SpawnError, errnoCode, errorMessage } from "../errors";
import { createLogger } from "../observability/logger";
import type { ProcessRole } from "../types";

const log = createLogger("process");

const DEFAULT_OUTPUT_LIMIT = 64 * 1024;

export interface SpawnOptions {
  role: ProcessRole;
  command: string;
  workdir: string;
  env?: NodeJS.ProcessEnv;
  /** Bytes kept from the tail of each output stream. */
  outputLimitBytes?: number;
}

export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface TerminateResult {
  alreadyExited: boolean;
  forced: boolean;
}

export type ProcessSpawner = (options: SpawnOptions) => Promise<ProcessHandle>;

/**
 * Keeps the last `limitBytes` bytes written to a stream, decoded as UTF-8 on
 * read. A character cut in half by the limit is dropped.
 */
class OutputTail {
  private tail = Buffer.alloc(0);
  private truncated = false;

  constructor(private readonly limitBytes: number) {}

  push(chunk: Buffer): void {
    const joined = Buffer.concat([this.tail, chunk]);
    if (joined.length > this.limitBytes) {
      this.tail = Buffer.from(joined.subarray(joined.length - this.limitBytes));
      this.truncated = true;
    } else {
      this.tail = joined;
    }
  }

  toString(): string {
    let start = 0;
    if (this.truncated) {
      // skip UTF-8 continuation bytes (10xxxxxx)
      while (start < this.tail.length && (this.tail[start] & 0xc0) === 0x80) start++;
    }
    return this.tail.toString("utf8", start);
  }
}

// Each command gets its own process group so signals reach the shell and
// everything it started. Windows has no process groups.
const useProcessGroup = process.platform !== "win32";

/**
 * One external command run through the shell.
 *
 * `waitForExit()` settles once the process has exited and its output streams
 * are drained. `terminate()` sends SIGTERM to the process group, escalates to
 * SIGKILL after the grace period, then waits without a bound.
 */
export class ProcessHandle {
  readonly role: ProcessRole;

  private readonly stdoutTail: OutputTail;
  private readonly stderrTail: OutputTail;
  private readonly exited: Promise<ProcessExit>;
  private readonly closed: Promise<ProcessExit>;
  private exitInfo: ProcessExit | null = null;

  private constructor(private readonly child: ChildProcess, options: SpawnOptions) {
    this.role = options.role;
    const limit = options.outputLimitBytes ?? DEFAULT_OUTPUT_LIMIT;
    this.stdoutTail = new OutputTail(limit);
    this.stderrTail = new OutputTail(limit);

    child.stdout?.on("data", (chunk: Buffer) => this.stdoutTail.push(chunk));
    child.stderr?.on("data", (chunk: Buffer) => this.stderrTail.push(chunk));

    this.exited = new Promise<ProcessExit>((resolve) => {
      child.once("exit", (code, signal) => {
        this.exitInfo = { code, signal };
        log.info({ role: this.role, pid: child.pid, code, signal }, "process exited");
        resolve({ code, signal });
      });
    });
    this.closed = new Promise<ProcessExit>((resolve) => {
      child.once("close", (code, signal) => resolve({ code, signal }));
    });
  }

  /**
   * Starts `command` through the shell in `workdir`. Resolves once the OS
   * reports the process as spawned; rejects with SpawnError otherwise.
   */
  static spawn(options: SpawnOptions): Promise<ProcessHandle> {
    return new Promise<ProcessHandle>((resolve, reject) => {
      let child: ChildProcess;
      try {
        child = spawn(options.command, {
          cwd: options.workdir,
          env: options.env ?? process.env,
          shell: true,
          detached: useProcessGroup,
          stdio: ["ignore", "pipe", "pipe"],
          windowsHide: true
        });
      } catch (err) {
        reject(new SpawnError(options.role, options.command, errorMessage(err)));
        return;
      }

      const onError = (err: Error) => {
        child.off("spawn", onSpawn);
        log.error({ role: options.role, command: options.command, err: err.message }, "spawn failed");
        reject(new SpawnError(options.role, options.command, err.message));
      };
      const onSpawn = () => {
        child.off("error", onError);
        // Later errors (a failed kill, say) are only logged; exit handling settles the handle.
        child.on("error", (err) => log.warn({ role: options.role, err: err.message }, "process error"));
        log.info({ role: options.role, pid: child.pid, command: options.command }, "process spawned");
        resolve(new ProcessHandle(child, options));
      };
      child.once("error", onError);
      child.once("spawn", onSpawn);
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  get live(): boolean {
    return this.exitInfo === null;
  }

  get exitCode(): number | null {
    return this.exitInfo?.code ?? null;
  }

  get signal(): NodeJS.Signals | null {
    return this.exitInfo?.signal ?? null;
  }

  get stdout(): string {
    return this.stdoutTail.toString();
  }

  get stderr(): string {
    return this.stderrTail.toString();
  }

  async waitForExit(): Promise<ProcessExit> {
    const exit = await this.exited;
    await this.closed;
    return exit;
  }

  async terminate(graceMs: number): Promise<TerminateResult> {
    if (!this.live) return { alreadyExited: true, forced: false };

    this.sendSignal("SIGTERM");
    if (await this.exitsWithin(graceMs)) return { alreadyExited: false, forced: false };

    log.warn({ role: this.role, pid: this.pid, graceMs }, "process did not terminate, killing");
    this.sendSignal("SIGKILL");
    await this.exited;
    return { alreadyExited: false, forced: true };
  }

  private exitsWithin(ms: number): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => resolve(false), ms);
      void this.exited.then(() => {
        clearTimeout(timer);
        resolve(true);
      });
    });
  }

  private sendSignal(signal: NodeJS.Signals): void {
    const pid = this.child.pid;
    if (pid === undefined || !this.live) return;
    try {
      if (useProcessGroup) {
        process.kill(-pid, signal);
      } else {
        this.child.kill(signal);
      }
    } catch (err) {
      // The group is already gone; the exit event is on its way.
      if (errnoCode(err) === "ESRCH") return;
      throw err;
    }
  }
}
