import { describe, expect, it } from "vitest";
import { UsageError } from "../src/errors.js";
import {
  CONFIG_FILE_TEMPLATE,
  OPTION_TABLE,
  applyTokens,
  defaultCliOptions,
  formatHelp,
  parseConcatMethod,
  parseConfigFile,
  resolveCliOptions,
} from "../src/options.js";

describe("resolveCliOptions", () => {
  it("should apply defaults", () => {
    const options = resolveCliOptions(["https://example.com/vod/index.m3u8"]);
    expect(options.source).toBe("https://example.com/vod/index.m3u8");
    expect(options.output).toBeNull();
    expect(options.jobs).toBeNull();
    expect(options.retries).toBe(2);
    expect(options.timeoutSeconds).toBe(30);
    expect(options.concatMethod).toBe("concat_demuxer");
    expect(options.progress).toBeNull();
  });

  it("should accept long options with separate and inline values", () => {
    const options = resolveCliOptions([
      "--jobs", "4",
      "--retries=0",
      "--timeout", "2.5",
      "--concat-method=concat_protocol",
      "--workdir", "/tmp/work",
      "src",
      "out.mp4",
    ]);
    expect(options.jobs).toBe(4);
    expect(options.retries).toBe(0);
    expect(options.timeoutSeconds).toBe(2.5);
    expect(options.concatMethod).toBe("concat_protocol");
    expect(options.workdir).toBe("/tmp/work");
    expect(options.output).toBe("out.mp4");
  });

  it("should accept bundled short options", () => {
    const options = resolveCliOptions(["-kfvv", "-j8", "-m", "1", "src"]);
    expect(options.keep).toBe(true);
    expect(options.force).toBe(true);
    expect(options.verbose).toBe(2);
    expect(options.jobs).toBe(8);
    expect(options.concatMethod).toBe("concat_protocol");
  });

  it("should treat everything after -- as positional", () => {
    const options = resolveCliOptions(["--", "-weird-name.m3u8", "-out.mp4"]);
    expect(options.source).toBe("-weird-name.m3u8");
    expect(options.output).toBe("-out.mp4");
  });

  it("should let the command line override the config file", () => {
    const options = resolveCliOptions(["--jobs", "3", "-v", "src"], ["--jobs", "16", "--verbose", "--keep"]);
    expect(options.jobs).toBe(3);
    expect(options.verbose).toBe(2);
    expect(options.keep).toBe(true);
  });

  it("should let an empty --workroot clear a configured one", () => {
    const options = resolveCliOptions(["--workroot=", "src"], ["--workroot", "/scratch"]);
    expect(options.workroot).toBeNull();
  });

  it("should toggle progress explicitly", () => {
    expect(resolveCliOptions(["--progress", "src"]).progress).toBe(true);
    expect(resolveCliOptions(["--progress", "--no-progress", "src"]).progress).toBe(false);
  });

  it("should return early for help and version without a source", () => {
    expect(resolveCliOptions(["-h"]).help).toBe(true);
    expect(resolveCliOptions(["--version"]).version).toBe(true);
  });

  it.each([
    [[], "the following argument is required: source"],
    [["--jobs", "0", "src"], "--jobs must be a positive integer, got: 0"],
    [["--jobs", "two", "src"], "--jobs must be a positive integer, got: two"],
    [["--retries=-1", "src"], "--retries must be a non-negative integer, got: -1"],
    [["--timeout", "0", "src"], "--timeout must be a positive number, got: 0"],
    [["--bogus", "src"], "unrecognized option: --bogus"],
    [["-z", "src"], "unrecognized option: -z"],
    [["src", "--jobs"], "option --jobs requires an argument"],
    [["--keep=yes", "src"], "option --keep does not take an argument"],
    [["a", "b", "c"], "unexpected argument: c"],
    [["--batch", "list.txt", "out.mp4"], "output file not allowed in batch mode"],
    [["--batch", "--workdir", "/w", "list.txt"], "--workdir not allowed in batch mode"],
    [["--workdir", " ", "src"], "--workdir requires a non-empty argument"],
  ])("should reject %j", (argv, message) => {
    expect(() => resolveCliOptions(argv)).toThrow(new UsageError(message));
  });

  it("should report config file problems as such", () => {
    try {
      resolveCliOptions(["src"], ["--jobs", "zero"]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(UsageError);
      if (error instanceof UsageError) {
        expect(error.source).toBe("config file");
        expect(error.message).toBe("--jobs must be a positive integer, got: zero");
      }
    }
  });
});

describe("applyTokens", () => {
  it("should reject positionals when not allowed", () => {
    expect(() => applyTokens(["stray"], defaultCliOptions(), "config file", false)).toThrow(
      "positional argument not allowed: stray",
    );
  });
});

describe("parseConcatMethod", () => {
  it("should map numeric aliases", () => {
    expect(parseConcatMethod("0", "command line")).toBe("concat_demuxer");
    expect(parseConcatMethod("1", "command line")).toBe("concat_protocol");
  });

  it("should reject other values", () => {
    expect(() => parseConcatMethod("2", "command line")).toThrow(UsageError);
  });
});

describe("parseConfigFile", () => {
  it("should split each line into an option and one verbatim argument", () => {
    const { tokens, warnings } = parseConfigFile(
      "\uFEFF# defaults\n\n--workdir Temporary Directory\r\n  --keep  \n-j 4\n",
    );
    expect(tokens).toEqual(["--workdir", "Temporary Directory", "--keep", "-j", "4"]);
    expect(warnings).toEqual([]);
  });

  it("should warn about lines that are not options", () => {
    const { tokens, warnings } = parseConfigFile("https://example.com/a.m3u8\n--force\n");
    expect(tokens).toEqual(["--force"]);
    expect(warnings).toEqual(["illegal line in config file: https://example.com/a.m3u8"]);
  });

  it("should produce no tokens from the template", () => {
    expect(parseConfigFile(CONFIG_FILE_TEMPLATE)).toEqual({ tokens: [], warnings: [] });
  });

  it("should feed resolveCliOptions", () => {
    const { tokens } = parseConfigFile("--workdir Temporary Directory\n");
    expect(resolveCliOptions(["src"], tokens).workdir).toBe("Temporary Directory");
  });
});

describe("formatHelp", () => {
  it("should list every option", () => {
    const help = formatHelp("segstitch");
    expect(help.startsWith("usage: segstitch [options] source [output]\n")).toBe(true);
    for (const spec of OPTION_TABLE) {
      expect(help).toContain(`--${spec.long}`);
    }
    expect(help).toContain("  -j N, --jobs N");
  });
});
