/**
 * Error taxonomy for segstitch.
 *
 * Low-level adapters (HTTP downloader, process runner, muxer) return
 * `{ ok: false, error }` results; the job pipeline converts fatal results into
 * the typed errors below so diagnostics can name the failing stage.
 */

export type Stage =
  | "manifest"
  | "workdir"
  | "download"
  | "remux"
  | "concat"
  | "destination"
  | "batch"
  | "cancelled"
  | "usage";

/**
 * Base class for every job-fatal error.
 */
export class SegstitchError extends Error {
  constructor(
    message: string,
    public readonly stage: Stage,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "SegstitchError";
  }
}

/**
 * Manifest fetch or parse failure, including unsupported playlists.
 */
export class ManifestError extends SegstitchError {
  constructor(
    message: string,
    public readonly url: string | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, "manifest", options);
    this.name = "ManifestError";
  }
}

/**
 * A segment that exhausted its retries or failed permanently.
 */
export class SegmentDownloadError extends SegstitchError {
  constructor(
    message: string,
    public readonly sequence: number,
    public readonly uri: string,
    public readonly partId: number,
    public readonly attempts: number,
  ) {
    super(message, "download");
    this.name = "SegmentDownloadError";
  }
}

/**
 * Another live process owns the working directory.
 */
export class WorkdirConflictError extends SegstitchError {
  constructor(
    message: string,
    public readonly workdir: string,
    public readonly ownerPid: number | null,
  ) {
    super(message, "workdir");
    this.name = "WorkdirConflictError";
  }
}

/**
 * Filesystem problem while preparing or maintaining the working directory.
 */
export class WorkdirError extends SegstitchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "workdir", options);
    this.name = "WorkdirError";
  }
}

/**
 * External engine failed to remux one part.
 */
export class RemuxError extends SegstitchError {
  constructor(
    message: string,
    public readonly partId: number,
    public readonly exitCode: number | null = null,
    public readonly stderr: string = "",
  ) {
    super(message, "remux");
    this.name = "RemuxError";
  }
}

/**
 * External engine failed to concatenate the remuxed parts.
 */
export class ConcatError extends SegstitchError {
  constructor(
    message: string,
    public readonly exitCode: number | null = null,
    public readonly stderr: string = "",
    public readonly partId: number | null = null,
  ) {
    super(message, "concat");
    this.name = "ConcatError";
  }
}

/**
 * Destination exists without --force, is unusable, or the final move failed.
 */
export class DestinationError extends SegstitchError {
  constructor(
    message: string,
    public readonly destination: string,
    options?: { cause?: unknown },
  ) {
    super(message, "destination", options);
    this.name = "DestinationError";
  }
}

/**
 * Batch manifest unreadable or malformed; fails the batch before any job runs.
 */
export class BatchManifestError extends SegstitchError {
  constructor(
    message: string,
    public readonly path: string,
    public readonly lineNumber: number | null = null,
    options?: { cause?: unknown },
  ) {
    super(lineNumber === null ? `${path}: ${message}` : `${path}:${lineNumber}: ${message}`, "batch", options);
    this.name = "BatchManifestError";
  }
}

/**
 * Interrupted by a signal before the job finished.
 */
export class CancelledError extends SegstitchError {
  constructor(message = "cancelled") {
    super(message, "cancelled");
    this.name = "CancelledError";
  }
}

/**
 * Invalid command line or configuration file.
 */
export class UsageError extends SegstitchError {
  constructor(
    message: string,
    public readonly source: "command line" | "config file" = "command line",
  ) {
    super(message, "usage");
    this.name = "UsageError";
  }
}

/**
 * Extract a printable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Keep the last lines of engine output for diagnostics.
 */
export function tailLines(text: string, count = 10): string {
  const lines = text.trimEnd().split(/\r?\n/);
  return lines.slice(-count).join("\n");
}
