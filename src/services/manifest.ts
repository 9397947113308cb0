/**
 * HLS media playlist fetching and parsing.
 *
 * Design:
 * - Pure parser (text + base URL in, immutable SegmentPlan out)
 * - Fetcher injected for tests
 * - Unsupported playlists (multi-rendition, encrypted, fMP4 init sections)
 *   are rejected with a ManifestError rather than guessed at
 */

import { ManifestError, errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";
import {
  DEFAULT_RETRY_POLICY,
  backoffDelay,
  defaultFetcher,
  defaultSleep,
  isCancelled,
  isRetryableStatus,
  raceTimeout,
  type HttpFetcher,
  type RetryPolicy,
  type Sleep,
} from "./http.js";

const log = createLogger("manifest");

// ============================================================================
// Types
// ============================================================================

export interface ByteRange {
  length: number;
  offset: number;
}

export interface Segment {
  /** Media sequence base + index; unique within a plan */
  sequence: number;
  /** Absolute URI */
  uri: string;
  /** Declared duration in seconds */
  duration: number;
  byteRange: ByteRange | null;
  /** Opens a new discontinuity run */
  discontinuity: boolean;
}

export type PlaylistType = "VOD" | "EVENT";

export interface SegmentPlan {
  version: number | null;
  targetDuration: number;
  mediaSequence: number;
  playlistType: PlaylistType | null;
  endList: boolean;
  segments: readonly Segment[];
}

export interface FetchedManifest {
  text: string;
  /** URL after redirects; segment URIs resolve against it */
  url: string;
  /** From Last-Modified, else Date */
  lastModified: Date | null;
}

export interface FetchManifestOptions {
  fetcher?: HttpFetcher;
  retryPolicy?: RetryPolicy;
  timeoutMs?: number;
  signal?: AbortSignal;
  sleep?: Sleep;
  random?: () => number;
}

// ============================================================================
// Attribute Helpers (pure)
// ============================================================================

function splitAttributes(raw: string): string[] {
  const parts: string[] = [];
  let current = "";
  let inQuotes = false;

  for (const ch of raw) {
    if (ch === '"') {
      inQuotes = !inQuotes;
    } else if (ch === "," && !inQuotes) {
      parts.push(current);
      current = "";
      continue;
    }
    current += ch;
  }
  if (current.length > 0) {
    parts.push(current);
  }
  return parts;
}

export function parseAttributes(raw: string): Record<string, string> {
  const attrs: Record<string, string> = {};
  for (const part of splitAttributes(raw)) {
    const idx = part.indexOf("=");
    if (idx === -1) {
      continue;
    }
    const key = part.slice(0, idx).trim();
    let value = part.slice(idx + 1).trim();
    if (value.startsWith('"') && value.endsWith('"') && value.length >= 2) {
      value = value.slice(1, -1);
    }
    attrs[key] = value;
  }
  return attrs;
}

function tagValue(line: string): string {
  const idx = line.indexOf(":");
  return idx === -1 ? "" : line.slice(idx + 1);
}

function tagName(line: string): string {
  const idx = line.indexOf(":");
  return idx === -1 ? line : line.slice(0, idx);
}

function parseNonNegativeInteger(raw: string): number | null {
  if (!/^\d+$/.test(raw.trim())) {
    return null;
  }
  return Number(raw.trim());
}

function parseDecimal(raw: string): number | null {
  if (!/^\d+(\.\d*)?$|^\.\d+$/.test(raw.trim())) {
    return null;
  }
  return Number(raw.trim());
}

// ============================================================================
// Parser (pure)
// ============================================================================

const MASTER_TAGS = new Set(["#EXT-X-STREAM-INF", "#EXT-X-I-FRAME-STREAM-INF", "#EXT-X-MEDIA"]);

/**
 * Parse a media playlist into an immutable SegmentPlan.
 *
 * `url` is the playlist's own URL; relative segment URIs resolve against it.
 */
export function parseMediaPlaylist(text: string, url: string): SegmentPlan {
  const lines = text.replace(/^\uFEFF/, "").split(/\r?\n/).map((line) => line.trim());
  const firstContent = lines.find((line) => line !== "");
  if (firstContent !== "#EXTM3U") {
    throw new ManifestError("not an M3U8 playlist: missing #EXTM3U header", url);
  }

  let version: number | null = null;
  let targetDuration: number | null = null;
  let mediaSequence = 0;
  let playlistType: PlaylistType | null = null;
  let endList = false;

  const variants: string[] = [];
  let isMaster = false;
  let expectVariantUri = false;

  let pendingDuration: number | null = null;
  let pendingRange: { length: number; offset: number | null } | null = null;
  let pendingDiscontinuity = false;
  const nextOffsetByUri = new Map<string, number>();

  const parsed: Omit<Segment, "sequence">[] = [];

  for (const [index, line] of lines.entries()) {
    const lineNo = index + 1;
    if (line === "" || line === "#EXTM3U") {
      continue;
    }

    if (line.startsWith("#")) {
      const name = tagName(line);
      const value = tagValue(line);

      if (MASTER_TAGS.has(name)) {
        isMaster = true;
        if (name === "#EXT-X-STREAM-INF") {
          expectVariantUri = true;
        } else {
          const uri = parseAttributes(value).URI;
          if (uri) {
            variants.push(resolveUri(uri, url));
          }
        }
        continue;
      }

      switch (name) {
        case "#EXT-X-VERSION": {
          const parsedVersion = parseNonNegativeInteger(value);
          if (parsedVersion === null) {
            throw new ManifestError(`line ${lineNo}: invalid #EXT-X-VERSION: ${value}`, url);
          }
          version = parsedVersion;
          continue;
        }
        case "#EXT-X-TARGETDURATION": {
          const parsedTarget = parseDecimal(value);
          if (parsedTarget === null) {
            throw new ManifestError(`line ${lineNo}: invalid #EXT-X-TARGETDURATION: ${value}`, url);
          }
          targetDuration = parsedTarget;
          continue;
        }
        case "#EXT-X-MEDIA-SEQUENCE": {
          const parsedSequence = parseNonNegativeInteger(value);
          if (parsedSequence === null) {
            throw new ManifestError(`line ${lineNo}: invalid #EXT-X-MEDIA-SEQUENCE: ${value}`, url);
          }
          mediaSequence = parsedSequence;
          continue;
        }
        case "#EXT-X-PLAYLIST-TYPE":
          if (value === "VOD" || value === "EVENT") {
            playlistType = value;
          } else {
            log.warn("Ignoring unknown playlist type", { line: lineNo, value });
          }
          continue;
        case "#EXT-X-ENDLIST":
          endList = true;
          continue;
        case "#EXT-X-DISCONTINUITY":
          pendingDiscontinuity = true;
          continue;
        case "#EXT-X-KEY": {
          const method = parseAttributes(value).METHOD ?? "";
          if (method !== "NONE") {
            throw new ManifestError(
              `line ${lineNo}: encrypted segments are not supported (METHOD=${method || "missing"})`,
              url,
            );
          }
          continue;
        }
        case "#EXT-X-MAP":
          throw new ManifestError(
            `line ${lineNo}: playlists with an initialization section (#EXT-X-MAP) are not supported`,
            url,
          );
        case "#EXT-X-BYTERANGE": {
          const match = value.trim().match(/^(\d+)(?:@(\d+))?$/);
          if (!match) {
            throw new ManifestError(`line ${lineNo}: invalid #EXT-X-BYTERANGE: ${value}`, url);
          }
          pendingRange = {
            length: Number(match[1]),
            offset: match[2] === undefined ? null : Number(match[2]),
          };
          continue;
        }
        case "#EXTINF": {
          if (pendingDuration !== null) {
            throw new ManifestError(`line ${lineNo}: #EXTINF without a following URI`, url);
          }
          const rawDuration = value.split(",")[0];
          const duration = parseDecimal(rawDuration);
          if (duration === null) {
            throw new ManifestError(`line ${lineNo}: invalid #EXTINF duration: ${rawDuration}`, url);
          }
          pendingDuration = duration;
          continue;
        }
        default:
          // Comments and tags that do not affect segment retrieval.
          continue;
      }
    }

    // URI line
    if (expectVariantUri) {
      variants.push(resolveUri(line, url));
      expectVariantUri = false;
      continue;
    }
    if (isMaster) {
      continue;
    }
    if (pendingDuration === null) {
      throw new ManifestError(`line ${lineNo}: URI without a preceding #EXTINF: ${line}`, url);
    }

    const uri = resolveUri(line, url);
    let byteRange: ByteRange | null = null;
    if (pendingRange) {
      const offset = pendingRange.offset ?? nextOffsetByUri.get(uri);
      if (offset === undefined) {
        throw new ManifestError(
          `line ${lineNo}: #EXT-X-BYTERANGE without offset and no previous range of ${line}`,
          url,
        );
      }
      byteRange = { length: pendingRange.length, offset };
      nextOffsetByUri.set(uri, offset + pendingRange.length);
    }

    parsed.push({
      uri,
      duration: pendingDuration,
      byteRange,
      // A discontinuity before the very first segment does not open a new run.
      discontinuity: pendingDiscontinuity && parsed.length > 0,
    });
    pendingDuration = null;
    pendingRange = null;
    pendingDiscontinuity = false;
  }

  if (isMaster) {
    const listing = variants.length > 0 ? `\n  ${variants.join("\n  ")}` : " (none found)";
    throw new ManifestError(
      `this is a master playlist with multiple renditions; pick one and pass its media playlist URL instead. Variants:${listing}`,
      url,
    );
  }
  if (pendingDuration !== null) {
    throw new ManifestError("#EXTINF at end of playlist without a following URI", url);
  }
  if (targetDuration === null) {
    throw new ManifestError("missing #EXT-X-TARGETDURATION", url);
  }
  if (!endList) {
    log.warn("Playlist has no #EXT-X-ENDLIST; treating the current segment list as complete", { url });
  }

  const base = mediaSequence;
  return Object.freeze({
    version,
    targetDuration,
    mediaSequence: base,
    playlistType,
    endList,
    segments: Object.freeze(
      parsed.map((segment, index) => Object.freeze({ ...segment, sequence: base + index })),
    ),
  });
}

/**
 * Resolve a URI reference against the playlist URL.
 */
export function resolveUri(reference: string, base: string): string {
  try {
    return new URL(reference, base).toString();
  } catch (error) {
    throw new ManifestError(`invalid URI reference ${reference}: ${errorMessage(error)}`, base);
  }
}

// ============================================================================
// Fetcher
// ============================================================================

function parseHttpDate(value: string | null): Date | null {
  if (!value) {
    return null;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Fetch the playlist text, retrying transient failures with backoff.
 */
export async function fetchManifest(
  url: string,
  options: FetchManifestOptions = {},
): Promise<FetchedManifest> {
  const fetcher = options.fetcher ?? defaultFetcher;
  const policy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
  const timeoutMs = options.timeoutMs ?? 30_000;
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt += 1) {
    if (options.signal?.aborted) {
      throw new ManifestError("playlist download cancelled", url);
    }
    let failure: string;
    let retryable: boolean;

    try {
      const controller = new AbortController();
      const onAbort = () => controller.abort();
      options.signal?.addEventListener("abort", onAbort, { once: true });
      try {
        const response = await raceTimeout(
          fetcher.fetch(url, { signal: controller.signal }),
          timeoutMs,
          "playlist response",
          onAbort,
        );
        if (response.ok) {
          const text = await raceTimeout(response.text(), timeoutMs, "playlist body", onAbort);
          return {
            text,
            url: response.url || url,
            lastModified:
              parseHttpDate(response.headers.get("last-modified")) ??
              parseHttpDate(response.headers.get("date")),
          };
        }
        // Release the connection before the next attempt.
        await response.body?.cancel().catch((error: unknown) => {
          log.debug("Could not discard playlist error body", { url, error: errorMessage(error) });
        });
        failure = `HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ""}`;
        retryable = isRetryableStatus(response.status);
      } finally {
        options.signal?.removeEventListener("abort", onAbort);
      }
    } catch (error) {
      if (isCancelled(options.signal)) {
        throw new ManifestError("playlist download cancelled", url, { cause: error });
      }
      failure = errorMessage(error);
      retryable = true;
    }

    if (!retryable || attempt > policy.retries) {
      const tried = attempt === 1 ? "" : ` after ${attempt} attempts`;
      throw new ManifestError(`failed to download playlist${tried}: ${failure}`, url);
    }

    const wait = backoffDelay(attempt, policy, options.random);
    log.warn("Playlist download failed; retrying", { url, attempt, error: failure, retryInMs: wait });
    try {
      await sleep(wait, options.signal);
    } catch (error) {
      throw new ManifestError("playlist download cancelled", url, { cause: error });
    }
  }
}
