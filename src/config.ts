/**
 * Process-wide configuration for segstitch.
 * Built once from the environment and passed explicitly to every component.
 */

import { homedir } from "node:os";
import { join } from "node:path";

export const APP_NAME = "segstitch";

export interface AppConfig {
  /** Directory holding segstitch.conf */
  userConfigDir: string;
  /** Directory holding the workdir cache database */
  userDataDir: string;
  /** Skip loading the user config file */
  userConfigDisabled: boolean;
  /** Do not read or write the workdir cache */
  cacheDisabled: boolean;
}

export interface ConfigInput {
  SEGSTITCH_USER_CONFIG_DIR?: string;
  SEGSTITCH_USER_DATA_DIR?: string;
  SEGSTITCH_NO_USER_CONFIG?: string;
  SEGSTITCH_NO_CACHE?: string;
  XDG_CONFIG_HOME?: string;
  XDG_DATA_HOME?: string;
  HOME?: string;
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export type ConfigResult =
  | { ok: true; config: AppConfig }
  | { ok: false; errors: ConfigError[] };

/**
 * Parse and validate configuration from environment variables.
 * Pure function - no I/O, only transforms input to output.
 */
export function parseEnvironment(input: ConfigInput): ConfigResult {
  const errors: ConfigError[] = [];

  const home = input.HOME?.trim() || null;

  const userConfigDir = resolveDir(
    input.SEGSTITCH_USER_CONFIG_DIR,
    input.XDG_CONFIG_HOME,
    home,
    ".config",
  );
  if (!userConfigDir) {
    errors.push(
      new ConfigError(
        "cannot determine user config directory; set SEGSTITCH_USER_CONFIG_DIR",
        "SEGSTITCH_USER_CONFIG_DIR",
      ),
    );
  }

  const userDataDir = resolveDir(
    input.SEGSTITCH_USER_DATA_DIR,
    input.XDG_DATA_HOME,
    home,
    join(".local", "share"),
  );
  if (!userDataDir) {
    errors.push(
      new ConfigError(
        "cannot determine user data directory; set SEGSTITCH_USER_DATA_DIR",
        "SEGSTITCH_USER_DATA_DIR",
      ),
    );
  }

  if (!userConfigDir || !userDataDir) {
    return { ok: false, errors };
  }

  return {
    ok: true,
    config: Object.freeze({
      userConfigDir,
      userDataDir,
      userConfigDisabled: isSet(input.SEGSTITCH_NO_USER_CONFIG),
      cacheDisabled: isSet(input.SEGSTITCH_NO_CACHE),
    }),
  };
}

/**
 * Load config from process.env (convenience wrapper).
 */
export function loadConfigFromEnv(): ConfigResult {
  return parseEnvironment({
    ...process.env,
    HOME: process.env.HOME || homedir(),
  });
}

/**
 * Path of the user config file.
 */
export function userConfigFile(config: AppConfig): string {
  return join(config.userConfigDir, `${APP_NAME}.conf`);
}

/**
 * Path of the workdir cache database.
 */
export function cacheDatabaseFile(config: AppConfig): string {
  return join(config.userDataDir, "data.db");
}

// Helper functions (pure)

function isSet(value: string | undefined): boolean {
  return value !== undefined && value !== "";
}

function resolveDir(
  explicit: string | undefined,
  xdg: string | undefined,
  home: string | null,
  homeRelative: string,
): string | null {
  if (explicit?.trim()) {
    return explicit.trim();
  }
  if (xdg?.trim()) {
    return join(xdg.trim(), APP_NAME);
  }
  if (home) {
    return join(home, homeRelative, APP_NAME);
  }
  return null;
}
