/**
 * Test doubles shared by the suites: an in-process HLS origin served by a
 * Hono app, and a process runner that imitates ffmpeg by concatenating bytes.
 */

import { mkdtemp, readFile, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, dirname, join, resolve } from "node:path";
import { Hono } from "hono";
import type { HttpFetcher } from "../src/services/http.js";
import type { ProcessOutput, ProcessRunner } from "../src/services/muxer.js";

// ============================================================================
// Temp Directories
// ============================================================================

export async function makeTempDir(prefix = "segstitch-test-"): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeTempDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

// ============================================================================
// Origin
// ============================================================================

export interface OriginResource {
  body: Uint8Array;
  headers?: Record<string, string>;
}

/**
 * In-process origin. Resources are keyed by path; `fail(path, ...statuses)`
 * makes the next requests for that path answer with those statuses first.
 */
export function createOrigin(host = "http://origin.test") {
  const resources = new Map<string, OriginResource>();
  const faults = new Map<string, number[]>();
  const delays = new Map<string, number>();
  const hits = new Map<string, number>();
  const ranges: string[] = [];

  const app = new Hono();

  app.get("*", async (c) => {
    const path = new URL(c.req.url).pathname;
    hits.set(path, (hits.get(path) ?? 0) + 1);

    const wait = delays.get(path);
    if (wait !== undefined) {
      await new Promise((resolveDelay) => setTimeout(resolveDelay, wait));
    }

    const pending = faults.get(path);
    const status = pending?.shift();
    if (status !== undefined) {
      return new Response(null, { status });
    }

    const resource = resources.get(path);
    if (!resource) {
      return new Response("not found", { status: 404 });
    }

    const range = c.req.header("range");
    const match = range?.match(/^bytes=(\d+)-(\d+)$/);
    if (range && match) {
      ranges.push(`${path} ${range}`);
      const start = Number(match[1]);
      const end = Math.min(Number(match[2]), resource.body.length - 1);
      return new Response(resource.body.slice(start, end + 1), {
        status: 206,
        headers: {
          ...resource.headers,
          "content-range": `bytes ${start}-${end}/${resource.body.length}`,
          "content-length": String(end - start + 1),
        },
      });
    }

    return new Response(resource.body, {
      status: 200,
      headers: { ...resource.headers, "content-length": String(resource.body.length) },
    });
  });

  const fetcher: HttpFetcher = {
    fetch: async (url, init) => app.request(url, init),
  };

  return {
    fetcher,
    url: (path: string) => `${host}${path}`,
    serve(path: string, body: string | Uint8Array, headers?: Record<string, string>): void {
      resources.set(path, { body: typeof body === "string" ? Buffer.from(body, "utf8") : body, headers });
    },
    remove(path: string): void {
      resources.delete(path);
    },
    fail(path: string, ...statuses: number[]): void {
      faults.set(path, [...(faults.get(path) ?? []), ...statuses]);
    },
    delay(path: string, ms: number): void {
      delays.set(path, ms);
    },
    hits: (path: string) => hits.get(path) ?? 0,
    totalHits: (prefix: string) =>
      [...hits.entries()].filter(([path]) => path.startsWith(prefix)).reduce((sum, [, count]) => sum + count, 0),
    ranges,
  };
}

export type Origin = ReturnType<typeof createOrigin>;

/**
 * A body that sends `head` and then stalls. Aborting `signal` errors the
 * stream with an AbortError, as fetch does to a pending read.
 */
export function stallingBody(head: Uint8Array, signal: AbortSignal | null | undefined): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(head);
      signal?.addEventListener(
        "abort",
        () => controller.error(Object.assign(new Error("This operation was aborted"), { name: "AbortError" })),
        { once: true },
      );
    },
  });
}

/**
 * Segment payloads are short labelled strings, so a stitched file can be
 * compared with the expected byte order directly.
 */
export function segmentBody(index: number): string {
  return `<segment ${index}>`;
}

export interface VodOptions {
  /** Indices of segments preceded by #EXT-X-DISCONTINUITY */
  discontinuities?: number[];
  mediaSequence?: number;
  duration?: number;
}

export function buildVodPlaylist(segmentNames: string[], options: VodOptions = {}): string {
  const duration = options.duration ?? 4;
  const lines = [
    "#EXTM3U",
    "#EXT-X-VERSION:3",
    `#EXT-X-TARGETDURATION:${Math.ceil(duration)}`,
    `#EXT-X-MEDIA-SEQUENCE:${options.mediaSequence ?? 0}`,
    "#EXT-X-PLAYLIST-TYPE:VOD",
  ];
  segmentNames.forEach((name, index) => {
    if (options.discontinuities?.includes(index)) {
      lines.push("#EXT-X-DISCONTINUITY");
    }
    lines.push(`#EXTINF:${duration.toFixed(3)},`, name);
  });
  lines.push("#EXT-X-ENDLIST");
  return lines.join("\n") + "\n";
}

/**
 * Serve a VOD playlist at `<dir>/index.m3u8` with `count` segments named
 * `seg<i>.ts` next to it. Returns the playlist URL and the expected stitched
 * content.
 */
export function serveVod(
  origin: Origin,
  dir: string,
  count: number,
  options: VodOptions & { lastModified?: string } = {},
): { url: string; expected: string; segmentPath: (index: number) => string } {
  const names = Array.from({ length: count }, (_, index) => `seg${index}.ts`);
  const headers = options.lastModified ? { "last-modified": options.lastModified } : undefined;
  origin.serve(`${dir}/index.m3u8`, buildVodPlaylist(names, options), headers);
  names.forEach((name, index) => origin.serve(`${dir}/${name}`, segmentBody(index)));
  return {
    url: origin.url(`${dir}/index.m3u8`),
    expected: names.map((_, index) => segmentBody(index)).join(""),
    segmentPath: (index) => `${dir}/seg${index}.ts`,
  };
}

// ============================================================================
// Fake Engine
// ============================================================================

export interface FakeEngineOptions {
  /** Fail invocations whose arguments contain this substring */
  failWhen?: (args: string[]) => boolean;
  missing?: boolean;
  /**
   * Sequence numbers whose segment starts a timestamp jump: a remux that
   * reads one after another segment logs a non-monotonous DTS warning.
   */
  dtsJumps?: number[];
}

function ok(stdout = ""): ProcessOutput {
  return { success: true, code: 0, stdout, stderr: "" };
}

function unescapeListPath(quoted: string): string {
  return quoted.replaceAll("'\\''", "'");
}

function remuxLog(inputs: readonly string[], jumps: readonly number[]): string {
  const lines: string[] = [];
  inputs.forEach((input, index) => {
    lines.push(`[hls @ 0x1] Opening '${input}' for reading`);
    if (index > 0 && jumps.includes(Number(basename(input, ".ts")))) {
      lines.push(
        "[mp4 @ 0x2] Non-monotonous DTS in output stream 0:0; previous: 900000, current: 0; changing to 900001.",
      );
    }
  });
  return lines.map((line) => `${line}\n`).join("");
}

async function readInputs(args: string[]): Promise<string[]> {
  const input = args[args.indexOf("-i") + 1];
  const format = args.indexOf("-f") === -1 ? null : args[args.indexOf("-f") + 1];

  if (format === "hls") {
    const text = await readFile(input, "utf8");
    return text
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line !== "" && !line.startsWith("#"))
      .map((line) => resolve(dirname(input), line));
  }
  if (format === "concat") {
    const text = await readFile(input, "utf8");
    return text
      .split("\n")
      .filter((line) => line.startsWith("file '"))
      .map((line) => unescapeListPath(line.slice("file '".length, -1)));
  }
  if (input.startsWith("concat:")) {
    return input.slice("concat:".length).split("|");
  }
  return [input];
}

/**
 * A ProcessRunner standing in for ffmpeg/ffprobe. Remux and both concat
 * modes write the byte concatenation of their inputs; ffprobe reports a
 * duration of size / 100 seconds.
 */
export function createFakeEngine(options: FakeEngineOptions = {}) {
  const calls: Array<{ cmd: string; args: string[] }> = [];

  const runner: ProcessRunner = {
    async run(cmd, args) {
      calls.push({ cmd, args });
      if (options.missing) {
        return { success: false, code: -1, stdout: "", stderr: `spawn ${cmd} ENOENT` };
      }
      if (args[0] === "-version") {
        return ok(`${cmd} version 6.1-fake\nbuilt for tests\n`);
      }
      if (options.failWhen?.(args)) {
        return { success: false, code: 1, stdout: "", stderr: "Invalid data found when processing input\n" };
      }

      const output = args[args.length - 1];
      if (cmd === "ffprobe") {
        const info = await stat(output);
        return ok(JSON.stringify({ format: { duration: String(info.size / 100) }, streams: [] }));
      }

      const inputs = await readInputs(args);
      const chunks: Buffer[] = [];
      for (const input of inputs) {
        chunks.push(await readFile(input));
      }
      await writeFile(output, Buffer.concat(chunks));
      const remuxing = args[args.indexOf("-f") + 1] === "hls";
      return { ...ok(), stderr: remuxing ? remuxLog(inputs, options.dtsJumps ?? []) : "" };
    },

    async fileSize(path) {
      try {
        const info = await stat(path);
        return info.isFile() ? info.size : null;
      } catch {
        return null;
      }
    },
  };

  return {
    runner,
    calls,
    ffmpegCalls: () => calls.filter((call) => call.cmd === "ffmpeg" && call.args[0] !== "-version"),
  };
}

/**
 * Sleep that returns at once but still honours an aborted signal.
 */
export async function instantSleep(_ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    throw new Error("aborted");
  }
}
