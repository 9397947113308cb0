/**
 * Segment download manager.
 *
 * Design:
 * - Streaming HTTP downloader behind an interface (no whole segment in memory)
 * - Fixed pool of async workers pulling from one queue ordered by sequence
 * - Transient failures re-queued after jittered backoff, up to the retry limit
 * - Per-part settlement so remuxing can start while later parts download
 */

import { createHash } from "node:crypto";
import { open, rename, rm, type FileHandle } from "node:fs/promises";
import { SegmentDownloadError, errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";
import { emitEvent, type EventHook } from "./events.js";
import {
  backoffDelay,
  defaultFetcher,
  defaultSleep,
  isCancelled,
  isRetryableStatus,
  openTimedRequest,
  type HttpFetcher,
  type RetryPolicy,
  type Sleep,
  type TimedRequest,
} from "./http.js";
import type { ByteRange, Segment } from "./manifest.js";
import type { Part, PartStatus } from "./planner.js";
import type { FileDigest } from "./workdir.js";

const log = createLogger("download");

// ============================================================================
// Types
// ============================================================================

export type TaskStatus = "pending" | "in-flight" | "succeeded" | "failed-retryable" | "failed-fatal";

export interface DownloadTask {
  segment: Segment;
  partId: number;
  /** Final location of the segment file */
  path: string;
  attempts: number;
  status: TaskStatus;
}

export interface DownloadManagerConfig {
  /** Worker count */
  jobs: number;
  retryPolicy: RetryPolicy;
  /** Inactivity timeout per request */
  timeoutMs: number;
}

/**
 * The part of the workdir store the manager needs.
 */
export interface SegmentStore {
  segmentPath(sequence: number): string;
  verifySegment(sequence: number): Promise<boolean>;
  recordSegment(sequence: number, digest: FileDigest): Promise<void>;
}

export interface PartSettlement {
  partId: number;
  ok: boolean;
  cancelled: boolean;
  /** First fatal segment failure of the part, or what stopped the whole run */
  error: Error | null;
}

export interface DownloadSummary {
  ok: boolean;
  cancelled: boolean;
  /** Segments fetched over the network in this run */
  downloaded: number;
  /** Segments verified from a previous run */
  reused: number;
  /** Ordered by sequence */
  failures: SegmentDownloadError[];
}

// ============================================================================
// HTTP Downloader Interface
// ============================================================================

export interface HttpDownloadResult {
  ok: true;
  /** Bytes written */
  size: number;
  sha256: string;
}

export interface HttpDownloadError {
  ok: false;
  error: string;
  /** Worth another attempt (timeouts, network errors, 5xx/408/429, short reads) */
  retryable: boolean;
  /** The caller's signal aborted the transfer */
  cancelled: boolean;
  status?: number;
}

/**
 * HTTP downloader interface for dependency injection.
 */
export interface HttpDownloader {
  downloadToFile(
    url: string,
    outputPath: string,
    options: {
      byteRange: ByteRange | null;
      timeoutMs: number;
      signal?: AbortSignal;
    },
  ): Promise<HttpDownloadResult | HttpDownloadError>;
}

/**
 * Parse `Content-Range: bytes start-end/total`.
 */
export function parseContentRange(header: string | null): { start: number; end: number } | null {
  const match = header?.match(/^bytes (\d+)-(\d+)\/(\d+|\*)$/);
  if (!match) {
    return null;
  }
  return { start: Number(match[1]), end: Number(match[2]) };
}

function failure(error: string, retryable: boolean, status?: number): HttpDownloadError {
  return { ok: false, error, retryable, cancelled: false, status };
}

/**
 * Create a downloader that streams response bodies straight to disk,
 * hashing while writing, and fsyncs before reporting success.
 */
export function createHttpDownloader(fetcher: HttpFetcher = defaultFetcher): HttpDownloader {
  return {
    async downloadToFile(url, outputPath, options) {
      const { byteRange, signal, timeoutMs } = options;
      // Content-Length and ranges count encoded bytes; fetch would decode them.
      const headers: Record<string, string> = { "Accept-Encoding": "identity" };
      if (byteRange) {
        headers["Range"] = `bytes=${byteRange.offset}-${byteRange.offset + byteRange.length - 1}`;
      }

      let request: TimedRequest | null = null;
      let file: FileHandle | null = null;

      try {
        request = await openTimedRequest(fetcher, url, { headers, signal, timeoutMs });
        const { response } = request;

        if (!response.ok) {
          const message = `HTTP ${response.status}${response.statusText ? `: ${response.statusText}` : ""}`;
          return failure(message, isRetryableStatus(response.status), response.status);
        }

        // Window of the body to keep, in body coordinates.
        let skip = 0;
        let expected: number | null = null;

        if (byteRange && response.status === 206) {
          const range = parseContentRange(response.headers.get("content-range"));
          const wantedEnd = byteRange.offset + byteRange.length - 1;
          if (!range || range.start !== byteRange.offset || range.end !== wantedEnd) {
            return failure(
              `unexpected Content-Range ${response.headers.get("content-range") ?? "(none)"} for bytes ${byteRange.offset}-${wantedEnd}`,
              false,
              206,
            );
          }
          expected = byteRange.length;
        } else if (byteRange) {
          // Server ignored the Range header: slice the full body.
          log.debug("Range not honored; slicing full response", { url });
          skip = byteRange.offset;
          expected = byteRange.length;
        } else {
          const contentLength = response.headers.get("content-length");
          const encoding = response.headers.get("content-encoding")?.trim().toLowerCase() ?? "identity";
          if (encoding !== "identity") {
            log.debug("Body is encoded; not checking its length", { url, encoding });
          } else if (contentLength !== null && /^\d+$/.test(contentLength)) {
            expected = Number(contentLength);
          }
        }
        // A range stops at its window; a whole body is read to the end.
        const keepBytes = byteRange ? expected : null;

        file = await open(outputPath, "w");
        const hash = createHash("sha256");
        let position = 0;
        let written = 0;

        while (keepBytes === null || written < keepBytes) {
          const chunk = await request.read();
          if (chunk === null) {
            break;
          }
          const chunkStart = position;
          position += chunk.length;

          // Portion of this chunk inside [skip, skip + expected).
          const from = Math.max(skip - chunkStart, 0);
          const limit = keepBytes === null ? chunk.length : Math.min(chunk.length, skip + keepBytes - chunkStart);
          if (limit <= from) {
            continue;
          }
          const slice = chunk.subarray(from, limit);
          await file.write(slice);
          hash.update(slice);
          written += slice.length;
        }

        if (expected !== null && written < expected) {
          return failure(`short read: got ${written} of ${expected} bytes`, true);
        }
        if (expected !== null && written > expected) {
          return failure(`body longer than Content-Length: got ${written} of ${expected} bytes`, true);
        }

        await file.sync();
        return { ok: true, size: written, sha256: hash.digest("hex") };
      } catch (error) {
        if (isCancelled(signal)) {
          return { ok: false, error: "download cancelled", retryable: false, cancelled: true };
        }
        // Timeouts (including reads aborted by them) and network errors.
        return failure(errorMessage(error), true);
      } finally {
        if (file) {
          await file.close();
        }
        if (request) {
          await request.close();
        }
      }
    },
  };
}

// ============================================================================
// Helpers
// ============================================================================

interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  settled: boolean;
}

function createDeferred<T>(): Deferred<T> {
  let resolveFn: (value: T) => void = () => {};
  const promise = new Promise<T>((resolve) => {
    resolveFn = resolve;
  });
  const deferred: Deferred<T> = {
    promise,
    settled: false,
    resolve(value) {
      if (!deferred.settled) {
        deferred.settled = true;
        resolveFn(value);
      }
    },
  };
  return deferred;
}

/**
 * Insert keeping the queue ordered by sequence number.
 */
function enqueue(queue: DownloadTask[], task: DownloadTask): void {
  let low = 0;
  let high = queue.length;
  while (low < high) {
    const mid = (low + high) >> 1;
    if (queue[mid].segment.sequence < task.segment.sequence) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  queue.splice(low, 0, task);
}

// ============================================================================
// Download Manager
// ============================================================================

export interface DownloadManagerDeps {
  downloader?: HttpDownloader;
  sleep?: Sleep;
  random?: () => number;
  hooks?: EventHook[];
}

/**
 * Create a download manager writing into `store`.
 */
export function createDownloadManager(
  config: DownloadManagerConfig,
  store: SegmentStore,
  deps: DownloadManagerDeps = {},
) {
  const downloader = deps.downloader ?? createHttpDownloader();
  const sleep = deps.sleep ?? defaultSleep;
  const hooks = deps.hooks ?? [];
  const policy = config.retryPolicy;

  /**
   * Schedule every segment of `parts`. Returns immediately; progress is
   * observed through the returned handle.
   */
  function start(parts: readonly Part[], options: { signal?: AbortSignal } = {}) {
    const { signal } = options;
    const settlements = new Map<number, Deferred<PartSettlement>>();
    const statuses = new Map<number, PartStatus>();
    const remaining = new Map<number, number>();
    const tasks: DownloadTask[] = [];

    for (const part of parts) {
      settlements.set(part.id, createDeferred<PartSettlement>());
      statuses.set(part.id, "planned");
      remaining.set(part.id, part.segments.length);
      for (const segment of part.segments) {
        tasks.push({
          segment,
          partId: part.id,
          path: store.segmentPath(segment.sequence),
          attempts: 0,
          status: "pending",
        });
      }
    }

    const queue: DownloadTask[] = [];
    const failures: SegmentDownloadError[] = [];
    const retryTimers = new Set<Promise<void>>();
    let waiters: Array<() => void> = [];
    let downloaded = 0;
    let reused = 0;

    function wake(): void {
      const current = waiters;
      waiters = [];
      for (const resume of current) {
        resume();
      }
    }

    function settle(partId: number, settlement: PartSettlement): void {
      const deferred = settlements.get(partId);
      if (!deferred || deferred.settled) {
        return;
      }
      statuses.set(partId, settlement.ok ? "downloaded" : "failed");
      deferred.resolve(settlement);
      emitEvent({ type: "part_settled", partId, ok: settlement.ok }, hooks);
    }

    function markSucceeded(task: DownloadTask): void {
      task.status = "succeeded";
      const left = (remaining.get(task.partId) ?? 0) - 1;
      remaining.set(task.partId, left);
      if (left === 0) {
        settle(task.partId, { partId: task.partId, ok: true, cancelled: false, error: null });
      }
    }

    function markFatal(task: DownloadTask, reason: string): void {
      task.status = "failed-fatal";
      const error = new SegmentDownloadError(
        `segment ${task.segment.sequence} (${task.segment.uri}) failed after ${task.attempts} attempt(s): ${reason}`,
        task.segment.sequence,
        task.segment.uri,
        task.partId,
        task.attempts,
      );
      failures.push(error);
      log.error("Segment download failed", {
        sequence: task.segment.sequence,
        part: task.partId,
        attempts: task.attempts,
        error: reason,
      });
      emitEvent(
        { type: "segment_download_failed", sequence: task.segment.sequence, uri: task.segment.uri, error: reason },
        hooks,
      );
      settle(task.partId, { partId: task.partId, ok: false, cancelled: false, error });
    }

    function scheduleRetry(task: DownloadTask, reason: string): void {
      task.status = "failed-retryable";
      const wait = backoffDelay(task.attempts, policy, deps.random);
      log.warn("Segment download failed; retrying", {
        sequence: task.segment.sequence,
        attempt: task.attempts,
        retryInMs: wait,
        error: reason,
      });
      emitEvent(
        { type: "segment_download_retry", sequence: task.segment.sequence, attempt: task.attempts, delayMs: wait, error: reason },
        hooks,
      );

      const timer: Promise<void> = sleep(wait, signal)
        .then(
          () => {
            task.status = "pending";
            enqueue(queue, task);
          },
          () => {
            // Aborted while backing off; the task stays unfinished.
            task.status = "pending";
          },
        )
        .finally(() => {
          retryTimers.delete(timer);
          wake();
        });
      retryTimers.add(timer);
    }

    async function nextTask(): Promise<DownloadTask | null> {
      while (!signal?.aborted) {
        const task = queue.shift();
        if (task) {
          if (statuses.get(task.partId) === "failed") {
            // Part already failed; leave the rest of it for a later run.
            continue;
          }
          return task;
        }
        if (retryTimers.size === 0) {
          return null;
        }
        await new Promise<void>((resume) => waiters.push(resume));
      }
      return null;
    }

    async function runTask(task: DownloadTask): Promise<void> {
      task.status = "in-flight";
      task.attempts += 1;
      if (statuses.get(task.partId) === "planned") {
        statuses.set(task.partId, "downloading");
      }
      const partialPath = `${task.path}.part`;

      const result = await downloader.downloadToFile(task.segment.uri, partialPath, {
        byteRange: task.segment.byteRange,
        timeoutMs: config.timeoutMs,
        signal,
      });

      if (result.ok) {
        await rename(partialPath, task.path);
        await store.recordSegment(task.segment.sequence, { size: result.size, sha256: result.sha256 });
        downloaded += 1;
        log.debug("Segment downloaded", { sequence: task.segment.sequence, size: result.size });
        emitEvent(
          {
            type: "segment_download_succeeded",
            sequence: task.segment.sequence,
            partId: task.partId,
            path: task.path,
            size: result.size,
          },
          hooks,
        );
        markSucceeded(task);
        return;
      }

      await rm(partialPath, { force: true });

      if (isCancelled(signal)) {
        task.status = "pending";
        return;
      }
      // Without an aborted signal a "cancelled" transfer was torn down under us.
      if ((result.retryable || result.cancelled) && task.attempts <= policy.retries) {
        scheduleRetry(task, result.error);
        return;
      }
      markFatal(task, result.error);
    }

    async function worker(): Promise<void> {
      for (let task = await nextTask(); task; task = await nextTask()) {
        try {
          await runTask(task);
        } catch (error) {
          // Local disk trouble (rename, state write) is not retried.
          markFatal(task, errorMessage(error));
        }
      }
    }

    async function runAll(): Promise<DownloadSummary> {
      for (const task of tasks) {
        if (await store.verifySegment(task.segment.sequence)) {
          reused += 1;
          markSucceeded(task);
        } else {
          enqueue(queue, task);
        }
      }

      log.info("Starting segment downloads", {
        segments: tasks.length,
        alreadyComplete: reused,
        parts: parts.length,
      });
      emitEvent(
        { type: "segments_download_initiated", segmentCount: tasks.length, alreadyComplete: reused },
        hooks,
      );

      const onAbort = () => wake();
      signal?.addEventListener("abort", onAbort, { once: true });
      try {
        const workerCount = Math.max(1, Math.min(config.jobs, queue.length));
        await Promise.all(Array.from({ length: workerCount }, () => worker()));
        await Promise.all(retryTimers);
      } finally {
        signal?.removeEventListener("abort", onAbort);
      }

      const cancelled = signal?.aborted ?? false;
      for (const part of parts) {
        settle(part.id, { partId: part.id, ok: false, cancelled, error: null });
      }

      failures.sort((a, b) => a.sequence - b.sequence);
      emitEvent(
        { type: "segments_download_finished", successCount: reused + downloaded, failureCount: failures.length },
        hooks,
      );
      const complete = tasks.every((task) => task.status === "succeeded");
      return {
        ok: complete && failures.length === 0 && !cancelled,
        cancelled,
        downloaded,
        reused,
        failures,
      };
    }

    /**
     * A store error ends the run; every part still waiting settles with it
     * before `done` rejects.
     */
    async function run(): Promise<DownloadSummary> {
      try {
        return await runAll();
      } catch (error) {
        const reason = error instanceof Error ? error : new Error(errorMessage(error));
        log.error("Segment downloads stopped", { error: reason.message });
        for (const part of parts) {
          settle(part.id, { partId: part.id, ok: false, cancelled: false, error: reason });
        }
        throw reason;
      }
    }

    const done = run();

    return {
      /** Resolves once every segment of the part succeeded or one failed fatally */
      whenPartSettled(partId: number): Promise<PartSettlement> {
        const deferred = settlements.get(partId);
        if (!deferred) {
          return Promise.reject(new Error(`unknown part ${partId}`));
        }
        return deferred.promise;
      },
      partStatus(partId: number): PartStatus | null {
        return statuses.get(partId) ?? null;
      },
      done,
    };
  }

  return { start };
}

/**
 * Type for the download manager instance.
 */
export type DownloadManager = ReturnType<typeof createDownloadManager>;
export type DownloadRun = ReturnType<DownloadManager["start"]>;
