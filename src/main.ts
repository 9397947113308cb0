#!/usr/bin/env node
/**
 * Command-line entry point for segstitch.
 *
 * Loads the environment config and the user config file, resolves options,
 * checks for ffmpeg, then runs one job or a batch. Exit status: 0 on full
 * success, 1 on any unrecovered error, 2 on usage errors.
 */

import { realpathSync } from "node:fs";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { availableParallelism } from "node:os";
import { basename, dirname } from "node:path";
import { fileURLToPath, pathToFileURL } from "node:url";
import { APP_NAME, loadConfigFromEnv, userConfigFile, type AppConfig } from "./config.js";
import { openWorkdirCache, type WorkdirCache } from "./db/workdir-cache.js";
import { SegstitchError, UsageError, errorMessage } from "./errors.js";
import { adjustVerbosity, createLogger, setLogLevel } from "./logger.js";
import {
  CONFIG_FILE_TEMPLATE,
  formatHelp,
  parseConfigFile,
  resolveCliOptions,
  type CliOptions,
} from "./options.js";
import { formatBatchReport, runBatch } from "./services/batch.js";
import type { EventHook } from "./services/events.js";
import { defaultFetcher } from "./services/http.js";
import { createMuxer, defaultProcessRunner } from "./services/muxer.js";
import { runJob, type JobContext, type JobOptions } from "./services/pipeline.js";
import { createProgressReporter } from "./services/progress.js";
import { isErrnoCode } from "./services/workdir.js";
import { VERSION } from "./version.js";

const log = createLogger();

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

// ============================================================================
// Graceful Shutdown
// ============================================================================

interface Cleanup {
  name: string;
  fn: () => void | Promise<void>;
}

const cleanupTasks: Cleanup[] = [];

function registerCleanup(name: string, fn: () => void | Promise<void>): void {
  cleanupTasks.push({ name, fn });
}

async function runCleanup(): Promise<void> {
  for (const task of cleanupTasks.splice(0).reverse()) {
    try {
      log.debug(`Cleaning up: ${task.name}`);
      await task.fn();
    } catch (err) {
      log.error(`Error during cleanup of ${task.name}`, { error: errorMessage(err) });
    }
  }
}

/**
 * First signal cancels the running job cooperatively; a second one exits.
 */
function installSignalHandlers(controller: AbortController): void {
  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    log.warn(`Received ${signal}, stopping...`);
    controller.abort();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
  registerCleanup("Signal handlers", () => {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  });
}

// ============================================================================
// Config File
// ============================================================================

/**
 * Option tokens from the user config file. A missing file is created from
 * the template; a file that cannot be read contributes nothing.
 */
async function loadConfigTokens(config: AppConfig): Promise<{ tokens: string[]; path: string | null }> {
  if (config.userConfigDisabled) {
    return { tokens: [], path: null };
  }
  const path = userConfigFile(config);

  let content: string;
  try {
    content = await readFile(path, "utf8");
  } catch (error) {
    if (!isErrnoCode(error, "ENOENT")) {
      log.warn("Cannot read config file", { path, error: errorMessage(error) });
      return { tokens: [], path };
    }
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, CONFIG_FILE_TEMPLATE, { encoding: "utf8", flag: "wx" });
      log.info("Created config file", { path });
    } catch (writeError) {
      log.warn("Cannot create config file", { path, error: errorMessage(writeError) });
    }
    return { tokens: [], path };
  }

  const parsed = parseConfigFile(content);
  for (const warning of parsed.warnings) {
    log.warn(`${path}: ${warning}`);
  }
  return { tokens: parsed.tokens, path };
}

// ============================================================================
// Option Mapping
// ============================================================================

function applyVerbosity(options: CliOptions): void {
  if (options.debug) {
    setLogLevel("debug");
    return;
  }
  adjustVerbosity(options.verbose - options.quiet);
}

export function defaultJobCount(): number {
  return 2 * availableParallelism();
}

export function toJobOptions(options: CliOptions): JobOptions {
  return {
    force: options.force,
    skipExisting: false,
    keep: options.keep,
    wipe: options.wipe,
    jobs: options.jobs ?? defaultJobCount(),
    retries: options.retries,
    timeoutSeconds: options.timeoutSeconds,
    concatMethod: options.concatMethod,
    workdir: options.workdir,
    workroot: options.workroot,
  };
}

// ============================================================================
// Main
// ============================================================================

/**
 * Run the CLI and return the exit status.
 */
export async function main(argv: readonly string[]): Promise<number> {
  const prog = APP_NAME;

  const configResult = loadConfigFromEnv();
  if (!configResult.ok) {
    for (const error of configResult.errors) {
      process.stderr.write(`${prog}: error: ${error.message}\n`);
    }
    return EXIT_USAGE;
  }
  const config = configResult.config;

  const configFile = await loadConfigTokens(config);
  let options: CliOptions;
  try {
    options = resolveCliOptions(argv, configFile.tokens);
  } catch (error) {
    if (error instanceof UsageError) {
      const where = error.source === "config file" && configFile.path ? `${configFile.path}: ` : "";
      process.stderr.write(`usage: ${prog} [options] source [output]\n${prog}: error: ${where}${error.message}\n`);
      return EXIT_USAGE;
    }
    throw error;
  }

  if (options.help) {
    const extra = configFile.path ? `\nDefault options are read from ${configFile.path}\n` : "";
    process.stdout.write(formatHelp(prog, extra));
    return EXIT_OK;
  }
  if (options.version) {
    process.stdout.write(`${prog} ${VERSION}\n`);
    return EXIT_OK;
  }

  applyVerbosity(options);
  log.debug("Configuration loaded", {
    userConfigDir: config.userConfigDir,
    userDataDir: config.userDataDir,
    cacheDisabled: config.cacheDisabled,
  });

  const engine = await createMuxer(defaultProcessRunner).checkFfmpeg();
  if (engine === null) {
    log.critical("ffmpeg not found; install it and make sure it is on PATH");
    return EXIT_FAILURE;
  }
  log.debug("Found ffmpeg", { version: engine });

  const controller = new AbortController();
  installSignalHandlers(controller);

  const cache: WorkdirCache | null = await openWorkdirCache(config);
  if (cache) {
    registerCleanup("Workdir cache", () => cache.close());
  }

  const showProgress = options.progress ?? (process.stderr.isTTY === true && options.quiet === 0);
  const progress = showProgress
    ? createProgressReporter({
        write: (text) => process.stderr.write(text),
        interactive: process.stderr.isTTY === true,
      })
    : null;
  const hooks: EventHook[] = progress ? [progress.hook] : [];

  const context: JobContext = {
    fetcher: defaultFetcher,
    runner: defaultProcessRunner,
    cache,
    hooks,
    signal: controller.signal,
  };
  const jobOptions = toJobOptions(options);
  const source = options.source ?? "";

  try {
    if (options.batch) {
      const report = await runBatch(
        source,
        { existOk: options.existOk, removeManifestOnSuccess: options.removeManifestOnSuccess },
        jobOptions,
        context,
      );
      progress?.finish();
      process.stdout.write(`${formatBatchReport(report)}\n`);
      return report.failed === 0 && report.notRun === 0 ? EXIT_OK : EXIT_FAILURE;
    }

    const result = await runJob({ url: source, destination: options.output }, jobOptions, context);
    progress?.finish();
    if (result.status === "failed") {
      const stage = result.error instanceof SegstitchError ? ` (${result.error.stage})` : "";
      process.stderr.write(`${prog}: error${stage}: ${result.error?.message ?? "unknown error"}\n`);
      return EXIT_FAILURE;
    }
    if (result.destination) {
      process.stdout.write(`${result.destination}\n`);
    }
    return EXIT_OK;
  } catch (error) {
    progress?.finish();
    process.stderr.write(`${prog}: error: ${errorMessage(error)}\n`);
    return EXIT_FAILURE;
  } finally {
    await runCleanup();
  }
}

function isMain(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return pathToFileURL(realpathSync(entry)).href === import.meta.url;
  } catch {
    return basename(entry) === basename(fileURLToPath(import.meta.url));
  }
}

if (isMain()) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      log.critical("Unexpected error", { error: errorMessage(error) });
      process.exitCode = EXIT_FAILURE;
    },
  );
}
