import { mkdir, readdir, readFile, stat, truncate, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createSqliteExecutor, createWorkdirCache } from "../src/db/workdir-cache.js";
import { WorkdirConflictError } from "../src/errors.js";
import { parseMediaPlaylist } from "../src/services/manifest.js";
import {
  acquireLock,
  createWorkdirStore,
  deriveWorkdir,
  hashFile,
  loadState,
  mapPath,
  planFingerprint,
  removeEmptyParents,
  resolveWorkdir,
  writeFileAtomic,
} from "../src/services/workdir.js";
import { buildVodPlaylist, makeTempDir, removeTempDir } from "./helpers.js";

const URL_A = "https://cdn.example.com/a/index.m3u8";

function planOf(names: string[]) {
  return parseMediaPlaylist(buildVodPlaylist(names), URL_A);
}

let dir: string;

beforeEach(async () => {
  dir = await makeTempDir();
});

afterEach(async () => {
  await removeTempDir(dir);
});

// ============================================================================
// Paths
// ============================================================================

describe("deriveWorkdir", () => {
  it("should sit next to the destination and depend on the URL", () => {
    const first = deriveWorkdir("/out/video.mp4", URL_A);
    expect(first).toMatch(/^\/out\/video\.[0-9a-f]{8}$/);
    expect(deriveWorkdir("/out/video.mp4", URL_A)).toBe(first);
    expect(deriveWorkdir("/out/video.mp4", "https://cdn.example.com/b/index.m3u8")).not.toBe(first);
  });
});

describe("mapPath", () => {
  it("should re-root an absolute path", () => {
    expect(mapPath("/a/b/c", "/work")).toBe("/work/a/b/c");
  });
});

describe("resolveWorkdir", () => {
  it("should prefer an explicit override", async () => {
    const workdir = await resolveWorkdir({
      url: URL_A,
      destination: "/out/video.mp4",
      override: join(dir, "explicit"),
      workroot: "/scratch",
      cache: null,
    });
    expect(workdir).toBe(join(dir, "explicit"));
  });

  it("should map the derived workdir under the workroot", async () => {
    const workdir = await resolveWorkdir({
      url: URL_A,
      destination: "/out/video.mp4",
      override: null,
      workroot: "/scratch",
      cache: null,
    });
    expect(workdir).toBe(`/scratch${deriveWorkdir("/out/video.mp4", URL_A)}`);
  });

  it("should reuse a cached workdir that still exists", async () => {
    const cache = createWorkdirCache(await createSqliteExecutor(":memory:"));
    expect(cache.init().ok).toBe(true);
    const previous = join(dir, "previous");
    await mkdir(previous);
    cache.record(URL_A, previous);

    const input = { url: URL_A, destination: join(dir, "other.mp4"), override: null, workroot: null, cache };
    expect(await resolveWorkdir(input)).toBe(previous);

    cache.record(URL_A, join(dir, "gone"));
    expect(await resolveWorkdir(input)).toBe(deriveWorkdir(join(dir, "other.mp4"), URL_A));
    cache.close();
  });
});

// ============================================================================
// Filesystem Helpers
// ============================================================================

describe("hashFile", () => {
  it("should return null for a missing file", async () => {
    expect(await hashFile(join(dir, "missing"))).toBeNull();
  });

  it("should hash contents", async () => {
    await writeFile(join(dir, "f"), "abc");
    expect(await hashFile(join(dir, "f"))).toEqual({
      size: 3,
      sha256: "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
    });
  });
});

describe("writeFileAtomic", () => {
  it("should replace the file and leave no temporary behind", async () => {
    const path = join(dir, "state.json");
    await writeFileAtomic(path, "one");
    await writeFileAtomic(path, "two");
    expect(await readFile(path, "utf8")).toBe("two");
    expect(await readdir(dir)).toEqual(["state.json"]);
  });
});

describe("removeEmptyParents", () => {
  it("should remove empty directories up to the boundary", async () => {
    await mkdir(join(dir, "a", "b", "c"), { recursive: true });
    await removeEmptyParents(join(dir, "a", "b", "c"), dir);
    expect(await readdir(dir)).toEqual([]);
  });

  it("should stop at a non-empty directory", async () => {
    await mkdir(join(dir, "a", "b"), { recursive: true });
    await writeFile(join(dir, "a", "keep.txt"), "x");
    await removeEmptyParents(join(dir, "a", "b"), dir);
    expect(await readdir(join(dir, "a"))).toEqual(["keep.txt"]);
  });
});

// ============================================================================
// Lock
// ============================================================================

describe("acquireLock", () => {
  it("should refuse a lock held by a live owner", async () => {
    const lock = join(dir, ".lock");
    await acquireLock(lock, dir, { pid: 100, host: "here" });
    await expect(acquireLock(lock, dir, { pid: 200, host: "here", isAlive: () => true })).rejects.toBeInstanceOf(
      WorkdirConflictError,
    );
  });

  it("should refuse a lock held on another host", async () => {
    const lock = join(dir, ".lock");
    await writeFile(lock, JSON.stringify({ pid: 4242, hostname: "elsewhere", acquiredAt: "2024-01-01T00:00:00.000Z" }));
    await expect(acquireLock(lock, dir, { pid: 1, host: "here", isAlive: () => false })).rejects.toThrow(
      `workdir ${dir} is in use by process 4242 on elsewhere (since 2024-01-01T00:00:00.000Z)`,
    );
  });

  it("should take over a lock left by a dead process", async () => {
    const lock = join(dir, ".lock");
    await writeFile(lock, JSON.stringify({ pid: 4242, hostname: "here", acquiredAt: "2024-01-01T00:00:00.000Z" }));
    const info = await acquireLock(lock, dir, { pid: 1, host: "here", isAlive: () => false });
    expect(info.pid).toBe(1);
    expect(JSON.parse(await readFile(lock, "utf8"))).toMatchObject({ pid: 1, hostname: "here" });
  });

  it("should take over an unreadable lock", async () => {
    const lock = join(dir, ".lock");
    await writeFile(lock, "garbage");
    const info = await acquireLock(lock, dir, { pid: 7, host: "here" });
    expect(info.pid).toBe(7);
  });
});

// ============================================================================
// Store
// ============================================================================

describe("createWorkdirStore", () => {
  it("should create the layout and a fresh state", async () => {
    const store = createWorkdirStore(join(dir, "work"));
    await store.acquire();
    await store.prepare();
    const result = await store.openState(URL_A, planOf(["a.ts", "b.ts"]));

    expect(result).toEqual({ resumed: false, invalidated: false });
    expect((await readdir(store.paths.root)).sort()).toEqual([".lock", "intermediate", "parts", "segments", "state.json"]);
    const loaded = await loadState(store.paths.state);
    expect(loaded.kind).toBe("loaded");
    if (loaded.kind === "loaded") {
      expect(loaded.state.fingerprint).toBe(planFingerprint(planOf(["a.ts", "b.ts"])));
      expect(loaded.state.segments).toEqual({});
    }
    await store.release();
    expect(store.isLocked()).toBe(false);
  });

  it("should resume state recorded for the same plan", async () => {
    const root = join(dir, "work");
    const first = createWorkdirStore(root);
    await first.prepare();
    await first.openState(URL_A, planOf(["a.ts", "b.ts"]));
    await writeFile(first.segmentPath(0), "abc");
    await first.recordSegment(0, { size: 3, sha256: "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad" });

    const second = createWorkdirStore(root);
    expect(await second.openState(URL_A, planOf(["a.ts", "b.ts"]))).toEqual({ resumed: true, invalidated: false });
    expect(second.segmentRecord(0)?.size).toBe(3);
    expect(await second.verifySegment(0)).toBe(true);
    expect(await second.verifySegment(1)).toBe(false);
  });

  it("should discard state recorded for a different plan", async () => {
    const root = join(dir, "work");
    const first = createWorkdirStore(root);
    await first.prepare();
    await first.openState(URL_A, planOf(["a.ts", "b.ts"]));
    await writeFile(first.segmentPath(0), "abc");
    await first.recordSegment(0, { size: 3, sha256: "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad" });

    const second = createWorkdirStore(root);
    expect(await second.openState(URL_A, planOf(["a.ts", "c.ts"]))).toEqual({ resumed: false, invalidated: true });
    expect(second.segmentRecord(0)).toBeNull();
    expect(await readdir(second.paths.segments)).toEqual([]);
  });

  it("should discard unparseable state", async () => {
    const root = join(dir, "work");
    const store = createWorkdirStore(root);
    await store.prepare();
    await writeFile(store.paths.state, "{not json");
    expect(await store.openState(URL_A, planOf(["a.ts"]))).toEqual({ resumed: false, invalidated: true });
  });

  it("should drop a segment that no longer matches its record", async () => {
    const store = createWorkdirStore(join(dir, "work"));
    await store.prepare();
    await store.openState(URL_A, planOf(["a.ts"]));
    const path = store.segmentPath(0);
    await writeFile(path, "abc");
    await writeFile(`${path}.part`, "partial");
    await store.recordSegment(0, { size: 3, sha256: "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad" });

    await truncate(path, 1);
    expect(await store.verifySegment(0)).toBe(false);
    expect(store.segmentRecord(0)).toBeNull();
    expect(await readdir(store.paths.segments)).toEqual([]);
  });

  it("should track remuxed parts", async () => {
    const store = createWorkdirStore(join(dir, "work"));
    await store.prepare();
    await store.openState(URL_A, planOf(["a.ts"]));
    await store.recordPart(0, [1234, 66]);
    expect(store.partRecord(0)).toMatchObject({ status: "remuxed", size: 1300, pieces: [1234, 66] });
    expect(store.intermediatePath(0)).toBe(join(dir, "work", "intermediate", "0.mp4"));
    expect(store.intermediatePath(0, 1)).toBe(join(dir, "work", "intermediate", "0.1.mp4"));
    expect(store.partPlaylistPath(3, 2)).toBe(join(dir, "work", "parts", "3.2.m3u8"));
    await store.clearPart(0);
    expect(store.partRecord(0)).toBeNull();
  });

  it("should coalesce concurrent state writes", async () => {
    const store = createWorkdirStore(join(dir, "work"));
    await store.prepare();
    await store.openState(URL_A, planOf(["a.ts", "b.ts", "c.ts"]));
    const digest = { size: 3, sha256: "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad" };
    await Promise.all([store.recordSegment(0, digest), store.recordSegment(1, digest), store.recordSegment(2, digest)]);

    const loaded = await loadState(store.paths.state);
    expect(loaded.kind === "loaded" ? Object.keys(loaded.state.segments).sort() : []).toEqual(["0", "1", "2"]);
  });

  it("should wipe everything but the lock", async () => {
    const store = createWorkdirStore(join(dir, "work"));
    await store.acquire();
    await store.prepare();
    await store.openState(URL_A, planOf(["a.ts"]));
    await store.wipe();
    expect(await readdir(store.paths.root)).toEqual([".lock"]);
    await store.release();
  });

  it("should destroy the whole workdir", async () => {
    const store = createWorkdirStore(join(dir, "work"));
    await store.acquire();
    await store.prepare();
    await store.destroy();
    await expect(stat(store.paths.root)).rejects.toThrow();
    expect(store.isLocked()).toBe(false);
  });
});
