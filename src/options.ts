/**
 * Command-line and config-file option handling.
 *
 * One declarative table maps each option to its arity, validator and effect.
 * Both the argv parser and the config-file reader feed tokens through it, so
 * there is exactly one place that knows what `--jobs` means.
 */

import { UsageError } from "./errors.js";

// ============================================================================
// Types
// ============================================================================

export type ConcatMethod = "concat_demuxer" | "concat_protocol";

export interface CliOptions {
  /** Playlist URL, or batch manifest path in batch mode */
  source: string | null;
  output: string | null;
  batch: boolean;
  existOk: boolean;
  force: boolean;
  /** null = twice the logical processor count */
  jobs: number | null;
  keep: boolean;
  concatMethod: ConcatMethod;
  retries: number;
  timeoutSeconds: number;
  removeManifestOnSuccess: boolean;
  workdir: string | null;
  workroot: string | null;
  wipe: boolean;
  /** null = decide from verbosity */
  progress: boolean | null;
  verbose: number;
  quiet: number;
  debug: boolean;
  version: boolean;
  help: boolean;
}

export type TokenSource = "command line" | "config file";

export interface OptionSpec {
  long: string;
  short?: string;
  /** Number of arguments the option takes */
  arity: 0 | 1;
  metavar?: string;
  help: string;
  /** Validate the argument and apply it; throws UsageError on bad input */
  apply(options: CliOptions, value: string, source: TokenSource): void;
}

export function defaultCliOptions(): CliOptions {
  return {
    source: null,
    output: null,
    batch: false,
    existOk: false,
    force: false,
    jobs: null,
    keep: false,
    concatMethod: "concat_demuxer",
    retries: 2,
    timeoutSeconds: 30,
    removeManifestOnSuccess: false,
    workdir: null,
    workroot: null,
    wipe: false,
    progress: null,
    verbose: 0,
    quiet: 0,
    debug: false,
    version: false,
    help: false,
  };
}

// ============================================================================
// Validators (pure)
// ============================================================================

export function parsePositiveInt(raw: string, name: string, source: TokenSource): number {
  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value < 1) {
    throw new UsageError(`--${name} must be a positive integer, got: ${raw}`, source);
  }
  return value;
}

export function parseNonNegativeInt(raw: string, name: string, source: TokenSource): number {
  const value = Number(raw.trim());
  if (raw.trim() === "" || !Number.isInteger(value) || value < 0) {
    throw new UsageError(`--${name} must be a non-negative integer, got: ${raw}`, source);
  }
  return value;
}

export function parsePositiveNumber(raw: string, name: string, source: TokenSource): number {
  const value = Number(raw.trim());
  if (raw.trim() === "" || !Number.isFinite(value) || value <= 0) {
    throw new UsageError(`--${name} must be a positive number, got: ${raw}`, source);
  }
  return value;
}

/**
 * Accepts the method names and their numeric aliases 0 and 1.
 */
export function parseConcatMethod(raw: string, source: TokenSource): ConcatMethod {
  switch (raw.trim()) {
    case "concat_demuxer":
    case "0":
      return "concat_demuxer";
    case "concat_protocol":
    case "1":
      return "concat_protocol";
    default:
      throw new UsageError(
        `--concat-method must be one of concat_demuxer, concat_protocol, 0, 1; got: ${raw}`,
        source,
      );
  }
}

function nonEmpty(raw: string, name: string, source: TokenSource): string {
  if (raw.trim() === "") {
    throw new UsageError(`--${name} requires a non-empty argument`, source);
  }
  return raw;
}

// ============================================================================
// Option Table
// ============================================================================

type BooleanKey = {
  [K in keyof CliOptions]: CliOptions[K] extends boolean ? K : never;
}[keyof CliOptions];

function flag(long: string, short: string | undefined, key: BooleanKey, help: string): OptionSpec {
  return {
    long,
    short,
    arity: 0,
    help,
    apply(options) {
      options[key] = true;
    },
  };
}

export const OPTION_TABLE: readonly OptionSpec[] = [
  flag("batch", "b", "batch", "run in batch mode; SOURCE is a manifest of URL<TAB>destination lines"),
  flag("exist-ok", "e", "existOk", "skip entries whose destination already exists (batch mode only)"),
  flag("force", "f", "force", "overwrite the output file if it already exists"),
  {
    long: "jobs",
    short: "j",
    arity: 1,
    metavar: "N",
    help: "maximum number of concurrent downloads (default: twice the logical processor count)",
    apply(options, value, source) {
      options.jobs = parsePositiveInt(value, "jobs", source);
    },
  },
  flag("keep", "k", "keep", "keep intermediate files even after a successful merge"),
  {
    long: "concat-method",
    short: "m",
    arity: 1,
    metavar: "METHOD",
    help: "concat_demuxer (0, default) or concat_protocol (1)",
    apply(options, value, source) {
      options.concatMethod = parseConcatMethod(value, source);
    },
  },
  {
    long: "retries",
    short: "r",
    arity: 1,
    metavar: "N",
    help: "retries per segment on recoverable errors (default: 2; 0 disables retries)",
    apply(options, value, source) {
      options.retries = parseNonNegativeInt(value, "retries", source);
    },
  },
  {
    long: "timeout",
    short: "t",
    arity: 1,
    metavar: "SECONDS",
    help: "network inactivity timeout per request (default: 30)",
    apply(options, value, source) {
      options.timeoutSeconds = parsePositiveNumber(value, "timeout", source);
    },
  },
  flag(
    "remove-manifest-on-success",
    undefined,
    "removeManifestOnSuccess",
    "remove the batch manifest once every entry succeeded (batch mode only)",
  ),
  {
    long: "workdir",
    arity: 1,
    metavar: "DIR",
    help: "directory for segments and intermediate files (default: derived from URL and output)",
    apply(options, value, source) {
      options.workdir = nonEmpty(value, "workdir", source);
    },
  },
  {
    long: "workroot",
    arity: 1,
    metavar: "DIR",
    help: "root directory under which all processing happens; the result is moved to the destination afterwards",
    apply(options, value) {
      // An empty workroot means "no workroot"; lets the command line undo a config file entry.
      options.workroot = value.trim() === "" ? null : value;
    },
  },
  flag("wipe", undefined, "wipe", "wipe previously downloaded files and start over"),
  {
    long: "progress",
    arity: 0,
    help: "show download progress regardless of verbosity",
    apply(options) {
      options.progress = true;
    },
  },
  {
    long: "no-progress",
    arity: 0,
    help: "hide download progress regardless of verbosity",
    apply(options) {
      options.progress = false;
    },
  },
  {
    long: "verbose",
    short: "v",
    arity: 0,
    help: "increase logging verbosity (repeatable)",
    apply(options) {
      options.verbose += 1;
    },
  },
  {
    long: "quiet",
    short: "q",
    arity: 0,
    help: "decrease logging verbosity (repeatable)",
    apply(options) {
      options.quiet += 1;
    },
  },
  flag("debug", undefined, "debug", "log everything"),
  flag("version", "V", "version", "print version and exit"),
  flag("help", "h", "help", "print this help and exit"),
];

export function findLongOption(name: string): OptionSpec | undefined {
  return OPTION_TABLE.find((spec) => spec.long === name);
}

export function findShortOption(name: string): OptionSpec | undefined {
  return OPTION_TABLE.find((spec) => spec.short === name);
}

// ============================================================================
// Token Parser
// ============================================================================

/**
 * Apply a token list to `options`. Positional arguments fill `source` then
 * `output`; they are rejected when `allowPositional` is false.
 */
export function applyTokens(
  tokens: readonly string[],
  options: CliOptions,
  source: TokenSource,
  allowPositional = true,
): CliOptions {
  let onlyPositional = false;

  for (let i = 0; i < tokens.length; i += 1) {
    const token = tokens[i];

    if (!onlyPositional && token === "--") {
      onlyPositional = true;
      continue;
    }

    if (!onlyPositional && token.startsWith("--")) {
      const eq = token.indexOf("=");
      const name = eq === -1 ? token.slice(2) : token.slice(2, eq);
      const spec = findLongOption(name);
      if (!spec) {
        throw new UsageError(`unrecognized option: --${name}`, source);
      }
      if (spec.arity === 0) {
        if (eq !== -1) {
          throw new UsageError(`option --${name} does not take an argument`, source);
        }
        spec.apply(options, "", source);
        continue;
      }
      let value: string;
      if (eq !== -1) {
        value = token.slice(eq + 1);
      } else {
        if (i + 1 >= tokens.length) {
          throw new UsageError(`option --${name} requires an argument`, source);
        }
        i += 1;
        value = tokens[i];
      }
      spec.apply(options, value, source);
      continue;
    }

    if (!onlyPositional && token.startsWith("-") && token.length > 1) {
      // Bundled short options: -kf, -j8, -j 8
      for (let c = 1; c < token.length; c += 1) {
        const spec = findShortOption(token[c]);
        if (!spec) {
          throw new UsageError(`unrecognized option: -${token[c]}`, source);
        }
        if (spec.arity === 0) {
          spec.apply(options, "", source);
          continue;
        }
        let value = token.slice(c + 1);
        if (value === "") {
          if (i + 1 >= tokens.length) {
            throw new UsageError(`option -${token[c]} requires an argument`, source);
          }
          i += 1;
          value = tokens[i];
        }
        spec.apply(options, value, source);
        break;
      }
      continue;
    }

    if (!allowPositional) {
      throw new UsageError(`positional argument not allowed: ${token}`, source);
    }
    if (options.source === null) {
      options.source = token;
    } else if (options.output === null) {
      options.output = token;
    } else {
      throw new UsageError(`unexpected argument: ${token}`, source);
    }
  }

  return options;
}

// ============================================================================
// Config File
// ============================================================================

export interface ConfigFileTokens {
  tokens: string[];
  /** Lines that were ignored, with the reason */
  warnings: string[];
}

/**
 * Split config file content into option tokens.
 *
 * Each non-blank, non-comment line is an option name optionally followed by
 * whitespace and one argument that runs to the end of the line, verbatim.
 */
export function parseConfigFile(content: string): ConfigFileTokens {
  const tokens: string[] = [];
  const warnings: string[] = [];

  for (const rawLine of content.replace(/^\uFEFF/, "").split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === "" || line.startsWith("#")) {
      continue;
    }
    if (!line.startsWith("-")) {
      warnings.push(`illegal line in config file: ${line}`);
      continue;
    }
    const match = line.match(/^(\S+)(?:\s+(.*))?$/);
    if (!match) {
      continue;
    }
    tokens.push(match[1]);
    if (match[2] !== undefined) {
      tokens.push(match[2]);
    }
  }

  return { tokens, warnings };
}

export const CONFIG_FILE_TEMPLATE = `\
# Default options for segstitch, one per line.
#
# Each option, along with its argument (if any), goes on its own line.
# Unlike on the command line, arguments are not quoted or escaped: a line
#
#     --workdir Temporary Directory
#
# means the option --workdir with the argument "Temporary Directory".
#
# Positional arguments are not allowed; option lines must begin with -.
# Blank lines and lines starting with # are ignored.
# Options given on the command line override the ones here.
#
# Examples:
#
#     --jobs 32
#     --concat-method concat_protocol
`;

// ============================================================================
// Resolution
// ============================================================================

/**
 * Combine config-file tokens (defaults) with argv (overrides), then check
 * cross-option constraints.
 */
export function resolveCliOptions(
  argv: readonly string[],
  configTokens: readonly string[] = [],
): CliOptions {
  const options = defaultCliOptions();
  applyTokens(configTokens, options, "config file", false);
  applyTokens(argv, options, "command line");

  if (options.help || options.version) {
    return options;
  }

  if (options.source === null) {
    throw new UsageError("the following argument is required: source");
  }
  if (options.batch) {
    if (options.output !== null) {
      throw new UsageError("output file not allowed in batch mode");
    }
    if (options.workdir !== null) {
      throw new UsageError("--workdir not allowed in batch mode");
    }
  }

  return options;
}

/**
 * Render --help text from the option table.
 */
export function formatHelp(prog: string, extra = ""): string {
  const lines = [
    `usage: ${prog} [options] source [output]`,
    "",
    "positional arguments:",
    "  source                the VOD playlist URL, or the batch mode manifest file",
    "  output                path to the final output file (default: <URL basename>.mp4)",
    "",
    "options:",
  ];
  for (const spec of OPTION_TABLE) {
    const names = [spec.short ? `-${spec.short}` : null, `--${spec.long}`]
      .filter((name): name is string => name !== null)
      .map((name) => (spec.metavar ? `${name} ${spec.metavar}` : name))
      .join(", ");
    lines.push(names.length < 22 ? `  ${names.padEnd(22)}${spec.help}` : `  ${names}\n${" ".repeat(24)}${spec.help}`);
  }
  return lines.join("\n") + "\n" + extra;
}
