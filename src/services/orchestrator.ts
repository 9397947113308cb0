/**
 * Remux & concat orchestrator.
 *
 * Parts are remuxed one at a time in ascending id as soon as their segments
 * are on disk, then joined with the user's chosen concat strategy. Byte order
 * in the output therefore follows part ids, never download completion order.
 */

import { copyFile, rename, rm, stat, writeFile } from "node:fs/promises";
import { basename, dirname, join, relative } from "node:path";
import {
  CancelledError,
  ConcatError,
  DestinationError,
  RemuxError,
  errorMessage,
  tailLines,
} from "../errors.js";
import { createLogger } from "../logger.js";
import type { ConcatMethod } from "../options.js";
import type { PartSettlement } from "./download-manager.js";
import { emitEvent, type EventHook } from "./events.js";
import type { Segment } from "./manifest.js";
import { buildConcatList, type Muxer, type MuxResult } from "./muxer.js";
import type { Part } from "./planner.js";
import { fileSize, isErrnoCode, type PartRecord, type WorkdirPaths } from "./workdir.js";

const log = createLogger("merge");

// ============================================================================
// Types
// ============================================================================

export interface OrchestratorConfig {
  concatMethod: ConcatMethod;
}

/**
 * The part of the workdir store the orchestrator needs.
 */
export interface PartStore {
  paths: WorkdirPaths;
  segmentPath(sequence: number): string;
  partPlaylistPath(partId: number, piece?: number): string;
  intermediatePath(partId: number, piece?: number): string;
  partRecord(partId: number): PartRecord | null;
  recordPart(partId: number, pieces: readonly number[]): Promise<void>;
  clearPart(partId: number): Promise<void>;
}

export interface PartSource {
  whenPartSettled(partId: number): Promise<PartSettlement>;
}

export interface OrchestratorResult {
  outputPath: string;
  /** Seconds, from the prober; null when probing failed */
  duration: number | null;
  remuxed: number;
  reusedParts: number;
}

// ============================================================================
// Playlist Builder (pure)
// ============================================================================

/**
 * Local playlist for a run of segments. `segmentUri` maps a sequence number
 * to the path written into the playlist (relative to the playlist's directory).
 */
export function buildPartPlaylist(
  segments: readonly Segment[],
  segmentUri: (sequence: number) => string,
): string {
  const longest = Math.max(...segments.map((segment) => segment.duration));
  const lines = [
    "#EXTM3U",
    "#EXT-X-VERSION:3",
    `#EXT-X-TARGETDURATION:${Math.max(Math.ceil(longest), 1)}`,
    `#EXT-X-MEDIA-SEQUENCE:${segments[0].sequence}`,
    "#EXT-X-PLAYLIST-TYPE:VOD",
  ];
  for (const segment of segments) {
    lines.push(`#EXTINF:${segment.duration},`, segmentUri(segment.sequence));
  }
  lines.push("#EXT-X-ENDLIST");
  return lines.join("\n") + "\n";
}

const DTS_JUMP = /Non-monotonous DTS in output stream|out of range for mov\/mp4 format/;
const OPENING = /Opening '(.+)' for reading/;

/**
 * Where a timestamp jump shows in ffmpeg's log: the index into `fileNames`
 * (segment file names, in playlist order) at which to split, or null when
 * there is no jump. The segment being read when the jump is reported starts
 * the second half; a jump in the first segment splits after it. Without any
 * "Opening" lines the run is halved.
 */
export function findDtsJump(stderr: string, fileNames: readonly string[]): number | null {
  if (fileNames.length < 2) {
    return null;
  }
  let lastOpened: number | null = null;
  for (const line of stderr.split(/\r?\n/)) {
    const opened = OPENING.exec(line);
    if (opened) {
      const index = fileNames.indexOf(basename(opened[1]));
      if (index !== -1) {
        lastOpened = index;
      }
      continue;
    }
    if (DTS_JUMP.test(line)) {
      return Math.max(lastOpened ?? Math.floor(fileNames.length / 2), 1);
    }
  }
  return null;
}

function describeFailure(result: Extract<MuxResult, { ok: false }>): string {
  const stderr = result.error.stderr ? `\n${tailLines(result.error.stderr)}` : "";
  return `${result.error.message}${stderr}`;
}

// ============================================================================
// Final Move
// ============================================================================

/**
 * Filesystem calls made by the final move.
 */
export interface FileOps {
  rename(from: string, to: string): Promise<void>;
  copyFile(from: string, to: string): Promise<void>;
  size(path: string): Promise<number>;
}

export const defaultFileOps: FileOps = {
  rename: (from, to) => rename(from, to),
  copyFile: (from, to) => copyFile(from, to),
  size: async (path) => (await stat(path)).size,
};

/**
 * Move `source` onto `destination`: a rename when both live on one
 * filesystem, otherwise copy to a temporary sibling of the destination,
 * verify its size, rename it over the destination and delete the source.
 */
export async function moveArtifact(
  source: string,
  destination: string,
  ops: FileOps = defaultFileOps,
): Promise<void> {
  try {
    await ops.rename(source, destination);
    return;
  } catch (error) {
    if (!isErrnoCode(error, "EXDEV")) {
      throw new DestinationError(`cannot move result into place: ${errorMessage(error)}`, destination, {
        cause: error,
      });
    }
  }

  const temporary = join(dirname(destination), `.${basename(destination)}.${process.pid}.tmp`);
  log.debug("Cross-device move; copying", { source, destination });
  try {
    await ops.copyFile(source, temporary);
    const [expected, actual] = await Promise.all([ops.size(source), ops.size(temporary)]);
    if (expected !== actual) {
      throw new Error(`copied ${actual} of ${expected} bytes`);
    }
    await ops.rename(temporary, destination);
  } catch (error) {
    await rm(temporary, { force: true });
    throw new DestinationError(`cannot copy result into place: ${errorMessage(error)}`, destination, {
      cause: error,
    });
  }
  await rm(source, { force: true });
}

// ============================================================================
// Orchestrator
// ============================================================================

/**
 * Create an orchestrator for one job.
 */
export function createOrchestrator(
  config: OrchestratorConfig,
  deps: { muxer: Muxer; store: PartStore; hooks?: EventHook[] },
) {
  const { muxer, store } = deps;
  const hooks = deps.hooks ?? [];

  /**
   * Stored intermediates of a part when they all still match its record.
   */
  async function reusablePieces(part: Part): Promise<string[] | null> {
    const record = store.partRecord(part.id);
    if (!record) {
      return null;
    }
    const sizes = record.pieces ?? [record.size];
    const paths = sizes.map((_, piece) => store.intermediatePath(part.id, piece));
    for (const [piece, path] of paths.entries()) {
      if ((await fileSize(path)) !== sizes[piece]) {
        return null;
      }
    }
    return paths;
  }

  async function remuxPiece(
    part: Part,
    piece: number,
    segments: readonly Segment[],
    signal?: AbortSignal,
  ): Promise<MuxResult> {
    const playlistPath = store.partPlaylistPath(part.id, piece);
    const playlistDir = dirname(playlistPath);
    await writeFile(
      playlistPath,
      buildPartPlaylist(segments, (sequence) => relative(playlistDir, store.segmentPath(sequence))),
      "utf8",
    );
    return muxer.remux(playlistPath, store.intermediatePath(part.id, piece), signal);
  }

  function remuxFailure(part: Part, result: Extract<MuxResult, { ok: false }>, signal?: AbortSignal): Error {
    if (signal?.aborted) {
      return new CancelledError();
    }
    return new RemuxError(
      `failed to remux part ${part.id}: ${describeFailure(result)}`,
      part.id,
      result.error.exitCode ?? null,
      result.error.stderr ?? "",
    );
  }

  /**
   * Remux one part into its intermediate file; skipped when a previous run
   * already produced it. A DTS jump inside the part splits it there: the
   * segments before the jump become one piece and the rest is tried again,
   * so a part may yield several intermediates, in order.
   */
  async function remuxPart(part: Part, signal?: AbortSignal): Promise<{ paths: string[]; skipped: boolean }> {
    const reusable = await reusablePieces(part);
    if (reusable) {
      log.info("Part already remuxed", { part: part.id, pieces: reusable.length });
      emitEvent({ type: "part_remuxed", partId: part.id, path: reusable[0], skipped: true }, hooks);
      return { paths: reusable, skipped: true };
    }
    if (store.partRecord(part.id)) {
      await store.clearPart(part.id);
    }

    log.info("Remuxing part", { part: part.id, segments: part.segments.length });
    const pieces: Array<{ path: string; size: number }> = [];
    let rest: readonly Segment[] = part.segments;

    while (rest.length > 0) {
      const piece = pieces.length;
      const result = await remuxPiece(part, piece, rest, signal);
      const stderr = result.ok ? result.stderr : (result.error.stderr ?? "");
      const names = rest.map((segment) => basename(store.segmentPath(segment.sequence)));
      const jump = signal?.aborted ? null : findDtsJump(stderr, names);

      if (jump === null) {
        if (!result.ok) {
          throw remuxFailure(part, result, signal);
        }
        pieces.push({ path: result.outputPath, size: result.size });
        break;
      }

      log.warn("DTS jump detected; splitting part", {
        part: part.id,
        piece,
        at: rest[jump].sequence,
      });
      // Jumps left inside the head are ignored; only the tail is checked again.
      const head = await remuxPiece(part, piece, rest.slice(0, jump), signal);
      if (!head.ok) {
        throw remuxFailure(part, head, signal);
      }
      pieces.push({ path: head.outputPath, size: head.size });
      rest = rest.slice(jump);
    }

    await store.recordPart(part.id, pieces.map((piece) => piece.size));
    const paths = pieces.map((piece) => piece.path);
    emitEvent({ type: "part_remuxed", partId: part.id, path: paths[0], skipped: false }, hooks);
    return { paths, skipped: false };
  }

  /**
   * Join intermediates, in the order given, into `outputPath`.
   */
  async function concatParts(
    intermediates: readonly string[],
    outputPath: string,
    signal?: AbortSignal,
  ): Promise<number | null> {
    log.info("Concatenating parts", { parts: intermediates.length, method: config.concatMethod });

    let result: MuxResult;
    if (config.concatMethod === "concat_demuxer") {
      await writeFile(store.paths.concatList, buildConcatList(intermediates), "utf8");
      result = await muxer.concatDemuxer(store.paths.concatList, outputPath, signal);
    } else {
      result = await muxer.concatProtocol(intermediates, outputPath, signal);
    }

    if (!result.ok) {
      if (signal?.aborted) {
        throw new CancelledError();
      }
      throw new ConcatError(
        `failed to concatenate ${intermediates.length} part(s) with ${config.concatMethod}: ${describeFailure(result)}`,
        result.error.exitCode ?? null,
        result.error.stderr ?? "",
      );
    }

    const probe = await muxer.probe(outputPath);
    if (!probe) {
      log.warn("Could not probe merged file", { path: outputPath });
    }
    emitEvent({ type: "merge_finished", path: outputPath }, hooks);
    return probe?.duration ?? null;
  }

  /**
   * Drive every part through remuxing as its downloads settle, then
   * concatenate. Throws the first download failure it meets.
   */
  async function run(
    parts: readonly Part[],
    source: PartSource,
    signal?: AbortSignal,
  ): Promise<OrchestratorResult> {
    const ordered = [...parts].sort((a, b) => a.id - b.id);
    const intermediates: string[] = [];
    let reusedParts = 0;

    for (const part of ordered) {
      const settlement = await source.whenPartSettled(part.id);
      if (settlement.error) {
        throw settlement.error;
      }
      if (!settlement.ok || signal?.aborted) {
        throw new CancelledError();
      }
      const { paths, skipped } = await remuxPart(part, signal);
      if (skipped) {
        reusedParts += 1;
      }
      intermediates.push(...paths);
    }

    const outputPath = store.paths.merged;
    await rm(outputPath, { force: true });
    const duration = await concatParts(intermediates, outputPath, signal);

    return {
      outputPath,
      duration,
      remuxed: ordered.length - reusedParts,
      reusedParts,
    };
  }

  return {
    remuxPart,
    concatParts,
    run,
  };
}

/**
 * Type for the orchestrator instance.
 */
export type Orchestrator = ReturnType<typeof createOrchestrator>;
