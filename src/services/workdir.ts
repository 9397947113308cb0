/**
 * Working directory store.
 *
 * Layout under the root:
 *   .lock                 owner {pid, hostname, acquiredAt}
 *   state.json            completion records + plan snapshot
 *   remote.m3u8           playlist as downloaded
 *   segments/<seq>.ts     downloaded segments
 *   parts/<id>.m3u8       local playlist per part
 *   intermediate/<id>.mp4 remuxed parts
 *   concat.txt            concat demuxer input list
 *   merged.mp4            final artifact before it is moved to the destination
 *
 * state.json is the only source of truth for resume decisions. It is written
 * with write-then-rename after an fsync, one write at a time.
 */

import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import { mkdir, open, readdir, readFile, rename, rm, rmdir, stat } from "node:fs/promises";
import { hostname } from "node:os";
import { dirname, join, parse, relative, resolve } from "node:path";
import { z } from "zod";
import type { WorkdirCache } from "../db/workdir-cache.js";
import { WorkdirConflictError, WorkdirError, errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";
import type { SegmentPlan } from "./manifest.js";

const log = createLogger("workdir");

// ============================================================================
// Paths (pure)
// ============================================================================

export interface WorkdirPaths {
  root: string;
  lock: string;
  state: string;
  remoteManifest: string;
  segments: string;
  parts: string;
  intermediate: string;
  concatList: string;
  merged: string;
}

export function workdirPaths(root: string): WorkdirPaths {
  return {
    root,
    lock: join(root, ".lock"),
    state: join(root, "state.json"),
    remoteManifest: join(root, "remote.m3u8"),
    segments: join(root, "segments"),
    parts: join(root, "parts"),
    intermediate: join(root, "intermediate"),
    concatList: join(root, "concat.txt"),
    merged: join(root, "merged.mp4"),
  };
}

/**
 * Default workdir: `<dest dir>/<dest stem>.<first 8 hex of sha1(url)>`.
 */
export function deriveWorkdir(destination: string, url: string): string {
  const { dir, name } = parse(resolve(destination));
  const digest = createHash("sha1").update(url).digest("hex").slice(0, 8);
  return join(dir, `${name}.${digest}`);
}

/**
 * Re-root an absolute path: `/a/b/c` under `/work` becomes `/work/a/b/c`.
 */
export function mapPath(path: string, root: string): string {
  const absolute = resolve(path);
  return join(resolve(root), relative(parse(absolute).root, absolute));
}

export interface ResolveWorkdirInput {
  url: string;
  destination: string;
  /** Explicit --workdir */
  override: string | null;
  /** Alternate processing root (--workroot) */
  workroot: string | null;
  cache: WorkdirCache | null;
}

/**
 * Pick the workdir for a job: explicit override, then the cached workdir of
 * the same URL if it still exists, then the derived default.
 */
export async function resolveWorkdir(input: ResolveWorkdirInput): Promise<string> {
  if (input.override !== null) {
    return resolve(input.override);
  }

  if (input.cache) {
    const cached = input.cache.lookup(input.url);
    if (!cached.ok) {
      log.warn("Workdir cache lookup failed", { error: cached.error.message });
    } else if (cached.data !== null) {
      if (await isDirectory(cached.data)) {
        log.warn("Resuming in previously used workdir", { workdir: cached.data });
        return cached.data;
      }
      log.debug("Cached workdir no longer exists", { workdir: cached.data });
    }
  }

  const derived = deriveWorkdir(input.destination, input.url);
  return input.workroot !== null ? mapPath(derived, input.workroot) : derived;
}

// ============================================================================
// Filesystem Helpers
// ============================================================================

export function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

export async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

export async function fileSize(path: string): Promise<number | null> {
  try {
    const info = await stat(path);
    return info.isFile() ? info.size : null;
  } catch (error) {
    if (isErrnoCode(error, "ENOENT")) {
      return null;
    }
    throw error;
  }
}

export interface FileDigest {
  size: number;
  sha256: string;
}

/**
 * Size and SHA-256 of a file, or null when it does not exist.
 */
export async function hashFile(path: string): Promise<FileDigest | null> {
  const hash = createHash("sha256");
  let size = 0;
  try {
    for await (const chunk of createReadStream(path)) {
      if (chunk instanceof Buffer) {
        hash.update(chunk);
        size += chunk.length;
      }
    }
  } catch (error) {
    if (isErrnoCode(error, "ENOENT")) {
      return null;
    }
    throw error;
  }
  return { size, sha256: hash.digest("hex") };
}

/**
 * Write a file durably: temp sibling, fsync, rename.
 */
export async function writeFileAtomic(path: string, data: string): Promise<void> {
  const tmp = `${path}.tmp`;
  const handle = await open(tmp, "w");
  try {
    await handle.writeFile(data, "utf8");
    await handle.sync();
  } finally {
    await handle.close();
  }
  await rename(tmp, path);
}

/**
 * Remove `start` and its empty parents, stopping at (and keeping) `stopAt`.
 */
export async function removeEmptyParents(start: string, stopAt: string): Promise<void> {
  const boundary = resolve(stopAt);
  let current = resolve(start);

  while (current !== boundary && relative(boundary, current).split(/[\\/]/)[0] !== "..") {
    try {
      await rmdir(current);
    } catch (error) {
      if (isErrnoCode(error, "ENOENT")) {
        current = dirname(current);
        continue;
      }
      // ENOTEMPTY / EEXIST: something else lives here.
      log.debug("Stopped removing parents", { path: current, error: errorMessage(error) });
      return;
    }
    current = dirname(current);
  }
}

// ============================================================================
// Lock
// ============================================================================

const LockSchema = z.object({
  pid: z.number().int(),
  hostname: z.string(),
  acquiredAt: z.string(),
});

export type LockInfo = z.infer<typeof LockSchema>;

export interface LockOptions {
  pid?: number;
  host?: string;
  isAlive?: (pid: number) => boolean;
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else.
    return isErrnoCode(error, "EPERM");
  }
}

export async function readLock(path: string): Promise<LockInfo | null> {
  try {
    const parsed = LockSchema.safeParse(JSON.parse(await readFile(path, "utf8")));
    return parsed.success ? parsed.data : null;
  } catch (error) {
    log.debug("Unreadable lock file", { path, error: errorMessage(error) });
    return null;
  }
}

/**
 * Create the lock file exclusively. A lock left by a dead process on this
 * host, or one that cannot be read, is taken over.
 */
export async function acquireLock(
  lockPath: string,
  workdir: string,
  options: LockOptions = {},
): Promise<LockInfo> {
  const pid = options.pid ?? process.pid;
  const host = options.host ?? hostname();
  const isAlive = options.isAlive ?? isProcessAlive;

  for (let attempt = 0; attempt < 2; attempt += 1) {
    const info: LockInfo = { pid, hostname: host, acquiredAt: new Date().toISOString() };
    try {
      const handle = await open(lockPath, "wx");
      try {
        await handle.writeFile(JSON.stringify(info), "utf8");
        await handle.sync();
      } finally {
        await handle.close();
      }
      return info;
    } catch (error) {
      if (!isErrnoCode(error, "EEXIST")) {
        throw new WorkdirError(`cannot create lock file ${lockPath}: ${errorMessage(error)}`, {
          cause: error,
        });
      }
    }

    const owner = await readLock(lockPath);
    if (owner !== null && !(owner.hostname === host && owner.pid !== pid && !isAlive(owner.pid))) {
      throw new WorkdirConflictError(
        `workdir ${workdir} is in use by process ${owner.pid} on ${owner.hostname} (since ${owner.acquiredAt})`,
        workdir,
        owner.pid,
      );
    }
    log.warn("Taking over stale workdir lock", { workdir, owner });
    await rm(lockPath, { force: true });
  }

  throw new WorkdirConflictError(`workdir ${workdir} lock keeps reappearing`, workdir, null);
}

// ============================================================================
// State
// ============================================================================

const ByteRangeSchema = z.object({
  length: z.number().int().nonnegative(),
  offset: z.number().int().nonnegative(),
});

const PlanSnapshotSchema = z.object({
  mediaSequence: z.number().int().nonnegative(),
  segments: z.array(
    z.object({
      sequence: z.number().int().nonnegative(),
      uri: z.string(),
      duration: z.number().nonnegative(),
      byteRange: ByteRangeSchema.nullable(),
      discontinuity: z.boolean(),
    }),
  ),
});

const SegmentRecordSchema = z.object({
  size: z.number().int().nonnegative(),
  sha256: z.string().regex(/^[0-9a-f]{64}$/),
  completedAt: z.string(),
});

const PartRecordSchema = z.object({
  status: z.literal("remuxed"),
  /** Total bytes over all pieces */
  size: z.number().int().nonnegative(),
  /** Size of each intermediate piece, in order; absent means one piece */
  pieces: z.array(z.number().int().nonnegative()).min(1).optional(),
  completedAt: z.string(),
});

export const WorkdirStateSchema = z.object({
  version: z.literal(1),
  url: z.string(),
  fingerprint: z.string(),
  plan: PlanSnapshotSchema,
  segments: z.record(z.string(), SegmentRecordSchema),
  parts: z.record(z.string(), PartRecordSchema),
});

export type PlanSnapshot = z.infer<typeof PlanSnapshotSchema>;
export type SegmentRecord = z.infer<typeof SegmentRecordSchema>;
export type PartRecord = z.infer<typeof PartRecordSchema>;
export type WorkdirState = z.infer<typeof WorkdirStateSchema>;

export function planSnapshot(plan: SegmentPlan): PlanSnapshot {
  return {
    mediaSequence: plan.mediaSequence,
    segments: plan.segments.map((segment) => ({
      sequence: segment.sequence,
      uri: segment.uri,
      duration: segment.duration,
      byteRange: segment.byteRange ? { length: segment.byteRange.length, offset: segment.byteRange.offset } : null,
      discontinuity: segment.discontinuity,
    })),
  };
}

export function planFingerprint(plan: SegmentPlan): string {
  return createHash("sha256").update(JSON.stringify(planSnapshot(plan))).digest("hex");
}

type LoadedState =
  | { kind: "missing" }
  | { kind: "invalid"; reason: string }
  | { kind: "loaded"; state: WorkdirState };

export async function loadState(path: string): Promise<LoadedState> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    if (isErrnoCode(error, "ENOENT")) {
      return { kind: "missing" };
    }
    return { kind: "invalid", reason: errorMessage(error) };
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    return { kind: "invalid", reason: `malformed JSON: ${errorMessage(error)}` };
  }

  const parsed = WorkdirStateSchema.safeParse(json);
  if (!parsed.success) {
    return { kind: "invalid", reason: parsed.error.issues.map((issue) => issue.message).join("; ") };
  }
  return { kind: "loaded", state: parsed.data };
}

export interface OpenStateResult {
  /** Prior state matched the plan and was kept */
  resumed: boolean;
  /** Prior state existed but was discarded */
  invalidated: boolean;
}

// ============================================================================
// Store
// ============================================================================

/**
 * Create a store for the workdir at `root`.
 */
export function createWorkdirStore(root: string, lockOptions: LockOptions = {}) {
  const paths = workdirPaths(resolve(root));
  let state: WorkdirState | null = null;
  let lockHeld = false;

  // Serialized writes: `chain` is the last scheduled write, `queued` a write
  // that has not started yet and will pick up any newer changes.
  let chain: Promise<void> = Promise.resolve();
  let queued: Promise<void> | null = null;

  function requireState(): WorkdirState {
    if (!state) {
      throw new WorkdirError(`state of ${paths.root} used before openState`);
    }
    return state;
  }

  async function prepare(): Promise<void> {
    try {
      for (const dir of [paths.root, paths.segments, paths.parts, paths.intermediate]) {
        await mkdir(dir, { recursive: true });
      }
    } catch (error) {
      throw new WorkdirError(`cannot create workdir ${paths.root}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  async function acquire(): Promise<LockInfo> {
    await mkdir(paths.root, { recursive: true });
    const info = await acquireLock(paths.lock, paths.root, lockOptions);
    lockHeld = true;
    return info;
  }

  async function release(): Promise<void> {
    if (!lockHeld) {
      return;
    }
    lockHeld = false;
    await rm(paths.lock, { force: true });
  }

  /**
   * Delete everything in the workdir except the lock.
   */
  async function wipe(): Promise<void> {
    await chain;
    let entries: string[];
    try {
      entries = await readdir(paths.root);
    } catch (error) {
      if (isErrnoCode(error, "ENOENT")) {
        return;
      }
      throw new WorkdirError(`cannot list workdir ${paths.root}: ${errorMessage(error)}`, { cause: error });
    }
    for (const entry of entries) {
      if (entry !== ".lock") {
        await rm(join(paths.root, entry), { recursive: true, force: true });
      }
    }
    state = null;
    log.info("Wiped workdir", { workdir: paths.root });
  }

  async function clearDownloads(): Promise<void> {
    for (const dir of [paths.segments, paths.parts, paths.intermediate]) {
      await rm(dir, { recursive: true, force: true });
      await mkdir(dir, { recursive: true });
    }
    await rm(paths.concatList, { force: true });
    await rm(paths.merged, { force: true });
  }

  /**
   * Load prior state and keep it only if it was recorded for the same plan.
   */
  async function openState(url: string, plan: SegmentPlan): Promise<OpenStateResult> {
    const fingerprint = planFingerprint(plan);
    const loaded = await loadState(paths.state);

    if (loaded.kind === "loaded" && loaded.state.fingerprint === fingerprint) {
      state = loaded.state;
      log.info("Resuming from existing state", {
        workdir: paths.root,
        segments: Object.keys(state.segments).length,
        parts: Object.keys(state.parts).length,
      });
      return { resumed: true, invalidated: false };
    }

    if (loaded.kind !== "missing") {
      log.warn("Discarding stale workdir state", {
        workdir: paths.root,
        reason: loaded.kind === "invalid" ? loaded.reason : "playlist changed since the last run",
      });
      await clearDownloads();
    }

    state = {
      version: 1,
      url,
      fingerprint,
      plan: planSnapshot(plan),
      segments: {},
      parts: {},
    };
    await flush();
    return { resumed: false, invalidated: loaded.kind !== "missing" };
  }

  /**
   * Persist the in-memory state. Calls made while a write is pending share it.
   */
  function flush(): Promise<void> {
    if (queued) {
      return queued;
    }
    const next = chain.then(async () => {
      queued = null;
      await writeFileAtomic(paths.state, JSON.stringify(requireState(), null, 2));
    });
    queued = next;
    chain = next.catch((error: unknown) => {
      log.error("Failed to write state", { path: paths.state, error: errorMessage(error) });
    });
    return next;
  }

  function segmentPath(sequence: number): string {
    return join(paths.segments, `${sequence}.ts`);
  }

  /**
   * Playlist of a part, or of one piece of a part split at a DTS jump.
   */
  function partPlaylistPath(partId: number, piece = 0): string {
    return join(paths.parts, piece === 0 ? `${partId}.m3u8` : `${partId}.${piece}.m3u8`);
  }

  function intermediatePath(partId: number, piece = 0): string {
    return join(paths.intermediate, piece === 0 ? `${partId}.mp4` : `${partId}.${piece}.mp4`);
  }

  function segmentRecord(sequence: number): SegmentRecord | null {
    return requireState().segments[String(sequence)] ?? null;
  }

  async function recordSegment(sequence: number, digest: FileDigest): Promise<void> {
    requireState().segments[String(sequence)] = {
      size: digest.size,
      sha256: digest.sha256,
      completedAt: new Date().toISOString(),
    };
    await flush();
  }

  /**
   * True when the segment's file matches its completion record. A missing
   * record or a mismatching file leaves no trace of the segment behind.
   */
  async function verifySegment(sequence: number): Promise<boolean> {
    const path = segmentPath(sequence);
    const record = segmentRecord(sequence);
    await rm(`${path}.part`, { force: true });

    if (!record) {
      await rm(path, { force: true });
      return false;
    }

    const size = await fileSize(path);
    const digest = size === record.size ? await hashFile(path) : null;
    if (digest && digest.sha256 === record.sha256) {
      return true;
    }

    log.warn("Segment failed verification; it will be downloaded again", {
      sequence,
      expectedSize: record.size,
      actualSize: size,
    });
    delete requireState().segments[String(sequence)];
    await rm(path, { force: true });
    await flush();
    return false;
  }

  function partRecord(partId: number): PartRecord | null {
    return requireState().parts[String(partId)] ?? null;
  }

  async function recordPart(partId: number, pieces: readonly number[]): Promise<void> {
    requireState().parts[String(partId)] = {
      status: "remuxed",
      size: pieces.reduce((sum, size) => sum + size, 0),
      pieces: [...pieces],
      completedAt: new Date().toISOString(),
    };
    await flush();
  }

  async function clearPart(partId: number): Promise<void> {
    const current = requireState();
    if (current.parts[String(partId)]) {
      delete current.parts[String(partId)];
      await flush();
    }
  }

  async function writeRemoteManifest(text: string): Promise<void> {
    await writeFileAtomic(paths.remoteManifest, text);
  }

  /**
   * Remove the whole workdir, lock included.
   */
  async function destroy(): Promise<void> {
    await chain;
    await rm(paths.root, { recursive: true, force: true });
    lockHeld = false;
    state = null;
  }

  return {
    paths,
    prepare,
    acquire,
    release,
    wipe,
    openState,
    flush,
    segmentPath,
    partPlaylistPath,
    intermediatePath,
    segmentRecord,
    recordSegment,
    verifySegment,
    partRecord,
    recordPart,
    clearPart,
    writeRemoteManifest,
    destroy,
    isLocked: () => lockHeld,
  };
}

/**
 * Type for the workdir store.
 */
export type WorkdirStore = ReturnType<typeof createWorkdirStore>;
