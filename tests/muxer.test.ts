import { describe, expect, it } from "vitest";
import {
  buildConcatDemuxerArgs,
  buildConcatList,
  buildConcatProtocolArgs,
  buildProbeArgs,
  buildRemuxArgs,
  createMuxer,
  parseProbeOutput,
  type ProcessOutput,
  type ProcessRunner,
} from "../src/services/muxer.js";

// ============================================================================
// Mock Process Runner
// ============================================================================

function createMockRunner(
  outputs: Array<{ match: string; output: ProcessOutput }>,
  sizes: Record<string, number> = {},
) {
  const calls: Array<{ cmd: string; args: string[] }> = [];
  const runner: ProcessRunner = {
    async run(cmd, args) {
      calls.push({ cmd, args });
      const key = `${cmd} ${args.join(" ")}`;
      const found = outputs.find((entry) => key.includes(entry.match));
      return found?.output ?? { success: false, code: 1, stdout: "", stderr: "Command not found" };
    },
    async fileSize(path) {
      return sizes[path] ?? null;
    },
  };
  return { runner, calls };
}

const success: ProcessOutput = { success: true, code: 0, stdout: "", stderr: "" };

// ============================================================================
// Command Builders
// ============================================================================

describe("buildRemuxArgs", () => {
  it("should read the part playlist as HLS and stream-copy", () => {
    expect(buildRemuxArgs("/w/parts/0.m3u8", "/w/intermediate/0.mp4", "error")).toEqual([
      "-hide_banner", "-loglevel", "error", "-y",
      "-f", "hls",
      "-i", "/w/parts/0.m3u8",
      "-c", "copy",
      "/w/intermediate/0.mp4",
    ]);
  });
});

describe("buildConcatDemuxerArgs", () => {
  it("should use the concat demuxer with unsafe paths allowed", () => {
    expect(buildConcatDemuxerArgs("/w/concat.txt", "/w/merged.mp4")).toEqual([
      "-hide_banner", "-loglevel", "info", "-y",
      "-f", "concat",
      "-safe", "0",
      "-i", "/w/concat.txt",
      "-c", "copy",
      "-bsf:a", "aac_adtstoasc",
      "-movflags", "+faststart",
      "/w/merged.mp4",
    ]);
  });
});

describe("buildConcatProtocolArgs", () => {
  it("should join inputs with the concat protocol", () => {
    const args = buildConcatProtocolArgs(["/w/i/0.mp4", "/w/i/1.mp4"], "/w/merged.mp4");
    expect(args.slice(4, 6)).toEqual(["-i", "concat:/w/i/0.mp4|/w/i/1.mp4"]);
    expect(args[args.length - 1]).toBe("/w/merged.mp4");
  });
});

describe("buildProbeArgs", () => {
  it("should ask for JSON format and streams", () => {
    expect(buildProbeArgs("/w/merged.mp4")).toEqual([
      "-v", "quiet", "-print_format", "json", "-show_format", "-show_streams", "/w/merged.mp4",
    ]);
  });
});

describe("buildConcatList", () => {
  it("should quote every path and escape single quotes", () => {
    expect(buildConcatList(["/w/i/0.mp4", "/w/it's/1.mp4"])).toBe(
      "file '/w/i/0.mp4'\nfile '/w/it'\\''s/1.mp4'\n",
    );
  });
});

// ============================================================================
// Probe Parser
// ============================================================================

describe("parseProbeOutput", () => {
  it("should read duration and streams", () => {
    const output = JSON.stringify({
      format: { duration: "12.480000" },
      streams: [
        { codec_type: "video", codec_name: "h264" },
        { codec_type: "audio", codec_name: "aac" },
      ],
    });
    expect(parseProbeOutput(output)).toEqual({
      duration: 12.48,
      hasVideo: true,
      hasAudio: true,
      videoCodec: "h264",
      audioCodec: "aac",
    });
  });

  it("should return null for invalid output", () => {
    expect(parseProbeOutput("not json")).toBeNull();
    expect(parseProbeOutput(JSON.stringify({ format: { duration: 5 } }))).toBeNull();
  });
});

// ============================================================================
// Muxer
// ============================================================================

describe("createMuxer", () => {
  it("should report the ffmpeg version line", async () => {
    const { runner } = createMockRunner([
      { match: "ffmpeg -version", output: { ...success, stdout: "ffmpeg version 6.1 Copyright\nconfiguration: ...\n" } },
    ]);
    expect(await createMuxer(runner).checkFfmpeg()).toBe("ffmpeg version 6.1 Copyright");
  });

  it("should return null when ffmpeg cannot run", async () => {
    const { runner } = createMockRunner([]);
    expect(await createMuxer(runner).checkFfmpeg()).toBeNull();
  });

  it("should remux when the playlist exists and output is produced", async () => {
    const { runner, calls } = createMockRunner([{ match: "-f hls", output: success }], {
      "/w/parts/0.m3u8": 200,
      "/w/intermediate/0.mp4": 5000,
    });
    const result = await createMuxer(runner, { ffmpegPath: "/opt/ffmpeg", logLevel: "error" }).remux(
      "/w/parts/0.m3u8",
      "/w/intermediate/0.mp4",
    );

    expect(result).toEqual({ ok: true, outputPath: "/w/intermediate/0.mp4", size: 5000, stderr: "" });
    expect(calls[0].cmd).toBe("/opt/ffmpeg");
    expect(calls[0].args).toEqual(buildRemuxArgs("/w/parts/0.m3u8", "/w/intermediate/0.mp4", "error"));
  });

  it("should fail without running ffmpeg when the input is missing", async () => {
    const { runner, calls } = createMockRunner([{ match: "-f hls", output: success }]);
    const result = await createMuxer(runner).remux("/w/parts/0.m3u8", "/w/intermediate/0.mp4");
    expect(result).toEqual({
      ok: false,
      error: { type: "input_not_found", message: "Playlist not found: /w/parts/0.m3u8", exitCode: undefined, stderr: undefined },
    });
    expect(calls).toEqual([]);
  });

  it("should surface the exit code and stderr of a failed run", async () => {
    const { runner } = createMockRunner(
      [{ match: "-f concat", output: { success: false, code: 1, stdout: "", stderr: "Non-monotonous DTS\n" } }],
      { "/w/concat.txt": 40 },
    );
    const result = await createMuxer(runner).concatDemuxer("/w/concat.txt", "/w/merged.mp4");
    expect(result).toEqual({
      ok: false,
      error: { type: "process_error", message: "ffmpeg failed with code 1", exitCode: 1, stderr: "Non-monotonous DTS\n" },
    });
  });

  it("should treat an empty output file as a failure", async () => {
    const { runner } = createMockRunner([{ match: "concat:", output: success }], {
      "/w/i/0.mp4": 10,
      "/w/i/1.mp4": 10,
      "/w/merged.mp4": 0,
    });
    const result = await createMuxer(runner).concatProtocol(["/w/i/0.mp4", "/w/i/1.mp4"], "/w/merged.mp4");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.type).toBe("empty_output");
      expect(result.error.message).toBe("ffmpeg exited successfully but produced an empty file at /w/merged.mp4");
    }
  });

  it("should detect a missing ffmpeg binary", async () => {
    const { runner } = createMockRunner(
      [{ match: "concat:", output: { success: false, code: -1, stdout: "", stderr: "spawn ffmpeg ENOENT" } }],
      { "/w/i/0.mp4": 10 },
    );
    const result = await createMuxer(runner).concatProtocol(["/w/i/0.mp4"], "/w/merged.mp4");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toMatchObject({ type: "ffmpeg_not_found", message: "ffmpeg not found at: ffmpeg" });
    }
  });

  it("should probe with ffprobe", async () => {
    const { runner, calls } = createMockRunner([
      { match: "ffprobe", output: { ...success, stdout: JSON.stringify({ format: { duration: "3.5" } }) } },
    ]);
    const probe = await createMuxer(runner, { ffprobePath: "/opt/ffprobe" }).probe("/w/merged.mp4");
    expect(probe?.duration).toBe(3.5);
    expect(calls[0].cmd).toBe("/opt/ffprobe");
  });
});
