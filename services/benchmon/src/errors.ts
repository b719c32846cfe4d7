import type { ProcessRole } from "./types";

export type BenchmonErrorCode =
  | "SPAWN_FAILED"
  | "PROCESS_EXIT"
  | "MISSING_OUTPUT"
  | "WATCH_IO"
  | "CLEANUP_FAILED"
  | "ALREADY_RUNNING"
  | "INVALID_CONFIG";

export class BenchmonError extends Error {
  readonly code: BenchmonErrorCode;
  readonly context: Record<string, unknown>;

  constructor(code: BenchmonErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.context = context;
  }
}

/** The external command could not be started. Fatal to the run. */
export class SpawnError extends BenchmonError {
  constructor(readonly role: ProcessRole, command: string, cause: string) {
    super("SPAWN_FAILED", `Failed to start ${role} process: ${cause}`, { role, command });
  }
}

/** Non-zero exit (or death by signal). The message is the captured stderr when there is one. */
export class ProcessExitError extends BenchmonError {
  constructor(
    readonly role: ProcessRole,
    readonly exitCode: number | null,
    readonly signal: NodeJS.Signals | null,
    stderr: string
  ) {
    super("PROCESS_EXIT", ProcessExitError.describe(role, exitCode, signal, stderr), { role, exitCode, signal });
  }

  private static describe(
    role: ProcessRole,
    exitCode: number | null,
    signal: NodeJS.Signals | null,
    stderr: string
  ): string {
    const captured = stderr.trim();
    if (captured !== "") return captured;
    if (exitCode === null) return `${capitalize(role)} terminated by ${signal ?? "unknown signal"}`;
    return `${capitalize(role)} exited with code ${exitCode}`;
  }
}

/** The process exited 0 but did not leave its expected output behind. */
export class MissingOutputError extends BenchmonError {
  constructor(readonly path: string, fileName: string) {
    super("MISSING_OUTPUT", `Result file not generated: ${fileName}`, { path });
  }
}

/** Transient stat failure while polling the artifact. Never fatal. */
export class WatchIOError extends BenchmonError {
  constructor(path: string, cause: string) {
    super("WATCH_IO", `Failed to inspect artifact ${path}: ${cause}`, { path });
  }
}

export class CleanupError extends BenchmonError {
  constructor(readonly step: string, cause: string) {
    super("CLEANUP_FAILED", `Cleanup step "${step}" failed: ${cause}`, { step });
  }
}

export class AlreadyRunningError extends BenchmonError {
  constructor(detail = "Benchmark is already running") {
    super("ALREADY_RUNNING", detail);
  }
}

export class ConfigError extends BenchmonError {
  constructor(readonly problems: string[]) {
    super("INVALID_CONFIG", `Invalid configuration: ${problems.join("; ")}`, { problems });
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return undefined;
}

function capitalize(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1);
}
