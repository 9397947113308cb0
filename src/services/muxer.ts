/**
 * FFmpeg adapter for remuxing parts and concatenating them.
 *
 * Design:
 * - Pure command builders (testable)
 * - Process runner interface for dependency injection
 * - Results as { ok } unions; callers decide which failures are fatal
 */

import { spawn } from "node:child_process";
import { stat } from "node:fs/promises";
import { z } from "zod";

// ============================================================================
// Types
// ============================================================================

export type EngineLogLevel = "quiet" | "error" | "warning" | "info" | "verbose" | "debug";

export interface MuxerOptions {
  /** ffmpeg binary (default: "ffmpeg") */
  ffmpegPath?: string;
  /** ffprobe binary (default: "ffprobe") */
  ffprobePath?: string;
  /** -loglevel passed to ffmpeg (default: "info") */
  logLevel?: EngineLogLevel;
}

/**
 * Probe result for a media file.
 */
export interface ProbeResult {
  duration: number;
  hasVideo: boolean;
  hasAudio: boolean;
  videoCodec?: string;
  audioCodec?: string;
}

/**
 * Remux/concat result.
 */
export type MuxResult =
  | { ok: true; outputPath: string; size: number; stderr: string }
  | { ok: false; error: MuxError };

export interface MuxError {
  type: "ffmpeg_not_found" | "input_not_found" | "process_error" | "empty_output";
  message: string;
  exitCode?: number;
  stderr?: string;
}

// ============================================================================
// Process Runner Interface
// ============================================================================

/**
 * Process runner output.
 */
export interface ProcessOutput {
  success: boolean;
  code: number;
  stdout: string;
  stderr: string;
}

/**
 * Process runner interface for dependency injection.
 */
export interface ProcessRunner {
  run(cmd: string, args: string[], options?: { signal?: AbortSignal }): Promise<ProcessOutput>;
  /** Size of a regular file, or null when it does not exist */
  fileSize(path: string): Promise<number | null>;
}

/**
 * Default process runner using child_process.spawn.
 */
export const defaultProcessRunner: ProcessRunner = {
  run(cmd, args, options) {
    return new Promise((resolve) => {
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      const child = spawn(cmd, args, {
        stdio: ["ignore", "pipe", "pipe"],
        signal: options?.signal,
      });

      child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

      child.on("error", (error) => {
        resolve({
          success: false,
          code: -1,
          stdout: Buffer.concat(stdout).toString("utf8"),
          stderr: error.message,
        });
      });

      child.on("close", (code) => {
        resolve({
          success: code === 0,
          code: code ?? -1,
          stdout: Buffer.concat(stdout).toString("utf8"),
          stderr: Buffer.concat(stderr).toString("utf8"),
        });
      });
    });
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

// ============================================================================
// Command Builders (pure functions)
// ============================================================================

function commonArgs(logLevel: EngineLogLevel): string[] {
  return ["-hide_banner", "-loglevel", logLevel, "-y"];
}

const CONCAT_OUTPUT_ARGS = ["-c", "copy", "-bsf:a", "aac_adtstoasc", "-movflags", "+faststart"];

/**
 * Remux one part: read its local HLS playlist, stream-copy into MP4.
 */
export function buildRemuxArgs(playlistPath: string, outputPath: string, logLevel: EngineLogLevel = "info"): string[] {
  return [...commonArgs(logLevel), "-f", "hls", "-i", playlistPath, "-c", "copy", outputPath];
}

/**
 * Container-level concatenation from a list file.
 */
export function buildConcatDemuxerArgs(
  listPath: string,
  outputPath: string,
  logLevel: EngineLogLevel = "info",
): string[] {
  return [
    ...commonArgs(logLevel),
    "-f", "concat",
    "-safe", "0",
    "-i", listPath,
    ...CONCAT_OUTPUT_ARGS,
    outputPath,
  ];
}

/**
 * Byte-stream-level concatenation through the concat: protocol.
 */
export function buildConcatProtocolArgs(
  inputs: readonly string[],
  outputPath: string,
  logLevel: EngineLogLevel = "info",
): string[] {
  return [
    ...commonArgs(logLevel),
    "-i", `concat:${inputs.join("|")}`,
    ...CONCAT_OUTPUT_ARGS,
    outputPath,
  ];
}

/**
 * Build ffprobe command arguments.
 */
export function buildProbeArgs(inputPath: string): string[] {
  return [
    "-v", "quiet",
    "-print_format", "json",
    "-show_format",
    "-show_streams",
    inputPath,
  ];
}

/**
 * Concat demuxer list: one `file '<path>'` line per input, single quotes
 * escaped the way the demuxer expects.
 */
export function buildConcatList(inputs: readonly string[]): string {
  return inputs.map((path) => `file '${path.replaceAll("'", "'\\''")}'\n`).join("");
}

// ============================================================================
// Probe Parser (pure function)
// ============================================================================

const ProbeOutputSchema = z.object({
  format: z
    .object({
      duration: z.string().optional(),
    })
    .optional(),
  streams: z
    .array(
      z.object({
        codec_type: z.string().optional(),
        codec_name: z.string().optional(),
      }),
    )
    .optional(),
});

/**
 * Parse ffprobe JSON output.
 */
export function parseProbeOutput(output: string): ProbeResult | null {
  let json: unknown;
  try {
    json = JSON.parse(output);
  } catch {
    return null;
  }
  const parsed = ProbeOutputSchema.safeParse(json);
  if (!parsed.success) {
    return null;
  }

  const streams = parsed.data.streams ?? [];
  const videoStream = streams.find((s) => s.codec_type === "video");
  const audioStream = streams.find((s) => s.codec_type === "audio");
  const duration = parseFloat(parsed.data.format?.duration ?? "0");

  return {
    duration: Number.isFinite(duration) ? duration : 0,
    hasVideo: videoStream !== undefined,
    hasAudio: audioStream !== undefined,
    videoCodec: videoStream?.codec_name,
    audioCodec: audioStream?.codec_name,
  };
}

// ============================================================================
// Muxer Functions
// ============================================================================

/**
 * Create error result helper.
 */
function errorResult(type: MuxError["type"], message: string, exitCode?: number, stderr?: string): MuxResult {
  return { ok: false, error: { type, message, exitCode, stderr } };
}

/**
 * Create a muxer instance.
 */
export function createMuxer(runner: ProcessRunner = defaultProcessRunner, options: MuxerOptions = {}) {
  const ffmpegPath = options.ffmpegPath ?? "ffmpeg";
  const ffprobePath = options.ffprobePath ?? "ffprobe";
  const logLevel = options.logLevel ?? "info";

  /**
   * First line of `ffmpeg -version`, or null when ffmpeg cannot be run.
   */
  async function checkFfmpeg(): Promise<string | null> {
    const result = await runner.run(ffmpegPath, ["-version"]);
    if (!result.success) {
      return null;
    }
    return result.stdout.split("\n")[0]?.trim() || "ffmpeg";
  }

  /**
   * Probe a media file.
   */
  async function probe(inputPath: string): Promise<ProbeResult | null> {
    const result = await runner.run(ffprobePath, buildProbeArgs(inputPath));
    if (!result.success) {
      return null;
    }
    return parseProbeOutput(result.stdout);
  }

  async function runFfmpeg(args: string[], outputPath: string, signal?: AbortSignal): Promise<MuxResult> {
    const result = await runner.run(ffmpegPath, args, { signal });

    if (!result.success) {
      if (result.code === -1 && /ENOENT/.test(result.stderr)) {
        return errorResult("ffmpeg_not_found", `ffmpeg not found at: ${ffmpegPath}`);
      }
      return errorResult(
        "process_error",
        `ffmpeg failed with code ${result.code}`,
        result.code,
        result.stderr,
      );
    }

    const size = await runner.fileSize(outputPath);
    if (size === null || size === 0) {
      return errorResult(
        "empty_output",
        `ffmpeg exited successfully but produced ${size === null ? "no file" : "an empty file"} at ${outputPath}`,
        result.code,
        result.stderr,
      );
    }

    return { ok: true, outputPath, size, stderr: result.stderr };
  }

  /**
   * Remux one part's local playlist into a single MP4.
   */
  async function remux(playlistPath: string, outputPath: string, signal?: AbortSignal): Promise<MuxResult> {
    if ((await runner.fileSize(playlistPath)) === null) {
      return errorResult("input_not_found", `Playlist not found: ${playlistPath}`);
    }
    return runFfmpeg(buildRemuxArgs(playlistPath, outputPath, logLevel), outputPath, signal);
  }

  /**
   * Concatenate with the concat demuxer; `listPath` must already exist.
   */
  async function concatDemuxer(listPath: string, outputPath: string, signal?: AbortSignal): Promise<MuxResult> {
    if ((await runner.fileSize(listPath)) === null) {
      return errorResult("input_not_found", `Concat list not found: ${listPath}`);
    }
    return runFfmpeg(buildConcatDemuxerArgs(listPath, outputPath, logLevel), outputPath, signal);
  }

  /**
   * Concatenate with the concat: protocol.
   */
  async function concatProtocol(
    inputs: readonly string[],
    outputPath: string,
    signal?: AbortSignal,
  ): Promise<MuxResult> {
    for (const input of inputs) {
      if ((await runner.fileSize(input)) === null) {
        return errorResult("input_not_found", `Input file not found: ${input}`);
      }
    }
    return runFfmpeg(buildConcatProtocolArgs(inputs, outputPath, logLevel), outputPath, signal);
  }

  return {
    checkFfmpeg,
    probe,
    remux,
    concatDemuxer,
    concatProtocol,
  };
}

/**
 * Type for the muxer instance.
 */
export type Muxer = ReturnType<typeof createMuxer>;
