/**
 * Batch controller: one pipeline run per manifest line, sequentially.
 *
 * Manifest format (UTF-8, BOM tolerated):
 *
 *     # comment
 *     https://example.com/a/index.m3u8<TAB>a.mp4
 *
 * Destinations resolve relative to the manifest's directory. A malformed
 * manifest fails the batch before any job runs; a failing job does not stop
 * the ones after it.
 */

import { readFile, rm } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { BatchManifestError, errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";
import { runJob, type JobContext, type JobOptions, type JobResult } from "./pipeline.js";

const log = createLogger("batch");

// ============================================================================
// Types
// ============================================================================

export interface BatchEntry {
  lineNumber: number;
  url: string;
  /** Absolute */
  destination: string;
}

export interface BatchOptions {
  /** Skip entries whose destination exists (--exist-ok) */
  existOk: boolean;
  removeManifestOnSuccess: boolean;
}

export interface BatchReport {
  manifest: string;
  results: JobResult[];
  succeeded: number;
  failed: number;
  skipped: number;
  /** Entries never started because the batch was interrupted */
  notRun: number;
  manifestRemoved: boolean;
}

export type JobRunner = (
  job: { url: string; destination: string },
  options: JobOptions,
  context: JobContext,
) => Promise<JobResult>;

// ============================================================================
// Manifest Parser (pure)
// ============================================================================

/**
 * Parse manifest text. `path` is used for error messages and to resolve
 * relative destinations.
 */
export function parseBatchManifest(content: string, path: string): BatchEntry[] {
  const base = dirname(resolve(path));
  const entries: BatchEntry[] = [];

  content
    .replace(/^\uFEFF/, "")
    .split(/\r?\n/)
    .forEach((rawLine, index) => {
      const lineNumber = index + 1;
      const line = rawLine.trim();
      if (line === "" || line.startsWith("#")) {
        return;
      }
      const fields = rawLine.split("\t");
      if (fields.length !== 2) {
        throw new BatchManifestError(
          `expected "URL<TAB>destination", found ${fields.length - 1} tab(s)`,
          path,
          lineNumber,
        );
      }
      const url = fields[0].trim();
      const destination = fields[1].trim();
      if (url === "" || destination === "") {
        throw new BatchManifestError("empty URL or destination", path, lineNumber);
      }
      entries.push({ lineNumber, url, destination: resolve(base, destination) });
    });

  return entries;
}

/**
 * Read and parse a manifest file; undecodable content is rejected.
 */
export async function readBatchManifest(path: string): Promise<BatchEntry[]> {
  let bytes: Buffer;
  try {
    bytes = await readFile(path);
  } catch (error) {
    throw new BatchManifestError(`cannot read manifest: ${errorMessage(error)}`, path, null, { cause: error });
  }

  let content: string;
  try {
    content = new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (error) {
    throw new BatchManifestError("manifest is not valid UTF-8", path, null, { cause: error });
  }

  return parseBatchManifest(content, path);
}

// ============================================================================
// Controller
// ============================================================================

/**
 * Run every entry of the manifest and collect a report.
 */
export async function runBatch(
  manifestPath: string,
  batchOptions: BatchOptions,
  jobOptions: JobOptions,
  context: JobContext,
  runner: JobRunner = runJob,
): Promise<BatchReport> {
  const entries = await readBatchManifest(manifestPath);
  const report: BatchReport = {
    manifest: manifestPath,
    results: [],
    succeeded: 0,
    failed: 0,
    skipped: 0,
    notRun: 0,
    manifestRemoved: false,
  };

  const options: JobOptions = { ...jobOptions, skipExisting: batchOptions.existOk, workdir: null };

  for (const [index, entry] of entries.entries()) {
    if (context.signal?.aborted) {
      report.notRun = entries.length - index;
      log.warn("Batch interrupted", { remaining: report.notRun });
      break;
    }

    log.info(`[${index + 1}/${entries.length}] Processing`, { url: entry.url, destination: entry.destination });
    const result = await runner({ url: entry.url, destination: entry.destination }, options, context);
    report.results.push(result);
    report[result.status] += 1;
  }

  if (
    batchOptions.removeManifestOnSuccess &&
    report.failed === 0 &&
    report.notRun === 0
  ) {
    await rm(manifestPath, { force: true });
    report.manifestRemoved = true;
    log.info("Removed batch manifest", { path: manifestPath });
  }

  return report;
}

/**
 * Human-readable summary, one line per entry plus totals.
 */
export function formatBatchReport(report: BatchReport): string {
  const lines = report.results.map((result) => {
    const target = result.destination ?? result.url;
    if (result.status === "failed") {
      return `FAILED   ${target}: ${result.error?.message ?? "unknown error"}`;
    }
    return `${result.status === "succeeded" ? "OK      " : "SKIPPED "} ${target}`;
  });
  const totals = [
    `${report.succeeded} succeeded`,
    `${report.failed} failed`,
    `${report.skipped} skipped`,
  ];
  if (report.notRun > 0) {
    totals.push(`${report.notRun} not run`);
  }
  lines.push(`Batch ${report.manifest}: ${totals.join(", ")}`);
  return lines.join("\n");
}
