/**
 * Single-job pipeline: playlist URL in, one MP4 at the destination out.
 *
 * The destination is written exactly once, by the final move, after every
 * other step succeeded. The workdir lock is released on every exit path.
 */

import type { Stats } from "node:fs";
import { stat, utimes } from "node:fs/promises";
import { basename, dirname, extname, resolve } from "node:path";
import type { WorkdirCache } from "../db/workdir-cache.js";
import {
  CancelledError,
  DestinationError,
  SegmentDownloadError,
  SegstitchError,
  WorkdirError,
  errorMessage,
} from "../errors.js";
import { createLogger } from "../logger.js";
import type { ConcatMethod } from "../options.js";
import { createDownloadManager, createHttpDownloader, type HttpDownloader } from "./download-manager.js";
import type { EventHook } from "./events.js";
import { DEFAULT_RETRY_POLICY, type HttpFetcher, type Sleep } from "./http.js";
import { fetchManifest, parseMediaPlaylist } from "./manifest.js";
import { createMuxer, type ProcessRunner } from "./muxer.js";
import { createOrchestrator, moveArtifact, type OrchestratorResult } from "./orchestrator.js";
import { planParts } from "./planner.js";
import {
  createWorkdirStore,
  isDirectory,
  isErrnoCode,
  removeEmptyParents,
  resolveWorkdir,
  type LockOptions,
} from "./workdir.js";

const log = createLogger("job");

// ============================================================================
// Types
// ============================================================================

export interface Job {
  url: string;
  /** null: derived from the URL in the current directory */
  destination: string | null;
}

export interface JobOptions {
  force: boolean;
  /** Report an existing destination as skipped instead of failing */
  skipExisting: boolean;
  keep: boolean;
  wipe: boolean;
  jobs: number;
  retries: number;
  timeoutSeconds: number;
  concatMethod: ConcatMethod;
  workdir: string | null;
  workroot: string | null;
}

export interface JobContext {
  fetcher: HttpFetcher;
  runner: ProcessRunner;
  cache: WorkdirCache | null;
  hooks?: EventHook[];
  signal?: AbortSignal;
  /** Base for a derived destination (default: process.cwd()) */
  cwd?: string;
  downloader?: HttpDownloader;
  sleep?: Sleep;
  random?: () => number;
  lock?: LockOptions;
}

export type JobStatus = "succeeded" | "failed" | "skipped";

export interface JobResult {
  url: string;
  destination: string | null;
  status: JobStatus;
  error: Error | null;
  /** Seconds, when the merged file could be probed */
  duration: number | null;
  workdir: string | null;
}

export const DEFAULT_JOB_OPTIONS: JobOptions = {
  force: false,
  skipExisting: false,
  keep: false,
  wipe: false,
  jobs: 8,
  retries: DEFAULT_RETRY_POLICY.retries,
  timeoutSeconds: 30,
  concatMethod: "concat_demuxer",
  workdir: null,
  workroot: null,
};

// ============================================================================
// Destination (pure + fs checks)
// ============================================================================

/**
 * `<stem of the URL path>.mp4`, or null when the path has no usable name.
 */
export function deriveDestinationName(url: string): string | null {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return null;
  }
  let name: string;
  try {
    name = decodeURIComponent(basename(pathname));
  } catch {
    name = basename(pathname);
  }
  const stem = name.slice(0, name.length - extname(name).length);
  if (stem === "" || stem === "." || stem === ".." || /[\\/]/.test(stem)) {
    return null;
  }
  return `${stem}.mp4`;
}

type DestinationCheck = { kind: "ok" } | { kind: "exists" };

async function checkDestination(destination: string, force: boolean, skipExisting: boolean): Promise<DestinationCheck> {
  if (extname(destination) === "") {
    throw new DestinationError(`destination has no file extension: ${destination}`, destination);
  }
  if (!(await isDirectory(dirname(destination)))) {
    throw new DestinationError(`destination directory does not exist: ${dirname(destination)}`, destination);
  }

  let existing: Stats;
  try {
    existing = await stat(destination);
  } catch (error) {
    if (isErrnoCode(error, "ENOENT")) {
      return { kind: "ok" };
    }
    throw new DestinationError(`cannot inspect destination: ${errorMessage(error)}`, destination, { cause: error });
  }

  if (existing.isDirectory()) {
    throw new DestinationError(`destination is a directory: ${destination}`, destination);
  }
  if (skipExisting) {
    return { kind: "exists" };
  }
  if (!force) {
    throw new DestinationError(`destination already exists (use --force to overwrite): ${destination}`, destination);
  }
  return { kind: "ok" };
}

// ============================================================================
// Pipeline
// ============================================================================

/**
 * Run one job to completion. Never throws for job-level failures; they are
 * reported in the result.
 */
export async function runJob(job: Job, options: JobOptions, context: JobContext): Promise<JobResult> {
  const result: JobResult = {
    url: job.url,
    destination: null,
    status: "failed",
    error: null,
    duration: null,
    workdir: null,
  };

  try {
    await runStages(job, options, context, result);
  } catch (error) {
    result.status = "failed";
    result.error = error instanceof Error ? error : new Error(String(error));
    const stage = error instanceof SegstitchError ? error.stage : "internal";
    log.error("Job failed", { url: job.url, stage, error: errorMessage(error) });
  }
  return result;
}

async function runStages(job: Job, options: JobOptions, context: JobContext, result: JobResult): Promise<void> {
  const hooks = context.hooks ?? [];

  // Destination
  let destination = job.destination;
  if (destination === null) {
    const name = deriveDestinationName(job.url);
    if (name === null) {
      throw new DestinationError(`cannot derive an output file name from ${job.url}; pass one explicitly`, "");
    }
    destination = name;
  }
  destination = resolve(context.cwd ?? process.cwd(), destination);
  result.destination = destination;

  const check = await checkDestination(destination, options.force, options.skipExisting);
  if (check.kind === "exists") {
    log.info("Destination exists; skipping", { destination });
    result.status = "skipped";
    return;
  }

  // Workdir
  if (options.workroot !== null && !(await isDirectory(options.workroot))) {
    throw new WorkdirError(`workroot is not an existing directory: ${options.workroot}`);
  }
  const workdir = await resolveWorkdir({
    url: job.url,
    destination,
    override: options.workdir,
    workroot: options.workroot,
    cache: context.cache,
  });
  result.workdir = workdir;
  log.info("Using workdir", { workdir });

  const store = createWorkdirStore(workdir, context.lock);
  await store.acquire();

  try {
    if (options.wipe) {
      await store.wipe();
    }
    await store.prepare();
    const recorded = context.cache?.record(job.url, workdir);
    if (recorded && !recorded.ok) {
      log.warn("Could not record workdir in cache", { error: recorded.error.message });
    }

    // Playlist and plan
    const retryPolicy = { ...DEFAULT_RETRY_POLICY, retries: options.retries };
    const timeoutMs = options.timeoutSeconds * 1000;
    const manifest = await fetchManifest(job.url, {
      fetcher: context.fetcher,
      retryPolicy,
      timeoutMs,
      signal: context.signal,
      sleep: context.sleep,
      random: context.random,
    });
    await store.writeRemoteManifest(manifest.text);
    const plan = parseMediaPlaylist(manifest.text, manifest.url);
    const parts = planParts(plan);
    log.info("Planned parts", { segments: plan.segments.length, parts: parts.length });
    await store.openState(job.url, plan);

    // Download and merge; a failed remux stops the remaining downloads.
    const abort = new AbortController();
    const forwardAbort = () => abort.abort();
    context.signal?.addEventListener("abort", forwardAbort, { once: true });
    if (context.signal?.aborted) {
      abort.abort();
    }

    let merged: OrchestratorResult | null = null;
    let mergeError: unknown = null;
    try {
      const downloads = createDownloadManager(
        { jobs: options.jobs, retryPolicy, timeoutMs },
        store,
        {
          downloader: context.downloader ?? createHttpDownloader(context.fetcher),
          sleep: context.sleep,
          random: context.random,
          hooks,
        },
      ).start(parts, { signal: abort.signal });
      // Observed now: a store error rejects `done` while the merge is still busy.
      const finished = downloads.done.then(
        (summary) => ({ ok: true as const, summary }),
        (error: unknown) => ({ ok: false as const, error }),
      );

      const orchestrator = createOrchestrator(
        { concatMethod: options.concatMethod },
        { muxer: createMuxer(context.runner), store, hooks },
      );
      try {
        merged = await orchestrator.run(parts, downloads, abort.signal);
      } catch (error) {
        mergeError = error;
        if (!(error instanceof SegmentDownloadError)) {
          abort.abort();
        }
      }

      const outcome = await finished;
      if (!outcome.ok) {
        throw outcome.error;
      }
      const { summary } = outcome;
      log.info("Downloads finished", {
        downloaded: summary.downloaded,
        reused: summary.reused,
        failed: summary.failures.length,
      });
      if (summary.failures.length > 0) {
        throw summary.failures[0];
      }
      if (context.signal?.aborted) {
        throw new CancelledError();
      }
      if (mergeError !== null) {
        throw mergeError;
      }
    } finally {
      context.signal?.removeEventListener("abort", forwardAbort);
    }
    if (merged === null) {
      throw new CancelledError();
    }

    // Final move, mtime, cleanup
    // The destination is written from here on; later trouble only warns.
    await moveArtifact(merged.outputPath, destination);
    result.duration = merged.duration;
    result.status = "succeeded";
    if (manifest.lastModified) {
      try {
        await utimes(destination, new Date(), manifest.lastModified);
      } catch (error) {
        log.warn("Could not set modification time", { destination, error: errorMessage(error) });
      }
    }
    log.info("Job succeeded", { destination, duration: merged.duration });

    if (!options.keep) {
      try {
        await store.destroy();
        const forgotten = context.cache?.forget(job.url);
        if (forgotten && !forgotten.ok) {
          log.warn("Could not drop workdir from cache", { error: forgotten.error.message });
        }
        if (options.workroot !== null && options.workdir === null) {
          await removeEmptyParents(dirname(workdir), options.workroot);
        }
      } catch (error) {
        log.warn("Could not clean up workdir", { workdir, error: errorMessage(error) });
      }
    }
  } finally {
    await store.release();
  }
}
