/**
 * SQLite cache remembering which working directory a source URL last used,
 * so an interrupted job resumes in the same place even when it is started
 * with a different output path.
 *
 * Design:
 * - SQL executor interface for dependency injection
 * - Rows validated with zod instead of trusted casts
 * - Entries untouched for a week expire when the cache is opened
 */

import { renameSync, writeFileSync } from "node:fs";
import { mkdir, readFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { cacheDatabaseFile, type AppConfig } from "../config.js";
import { createLogger } from "../logger.js";

const log = createLogger("cache");

// ============================================================================
// SQL Executor Interface
// ============================================================================

/**
 * SQLite executor interface for dependency injection.
 */
export interface SqliteExecutor {
  execute(sql: string, params?: unknown[]): void;
  queryRows(sql: string, params?: unknown[]): unknown[];
  queryOne(sql: string, params?: unknown[]): unknown;
  close(): void;
}

// ============================================================================
// Schema
// ============================================================================

const SCHEMA_SQL = `
-- Source URL to working directory
CREATE TABLE IF NOT EXISTS workdirs (
  url TEXT PRIMARY KEY,
  workdir TEXT NOT NULL,
  accessed_at INTEGER NOT NULL
);
`;

export const CACHE_EXPIRY_MS = 7 * 24 * 60 * 60 * 1000;

const WorkdirRowSchema = z.object({
  url: z.string(),
  workdir: z.string(),
  accessed_at: z.number(),
});

export interface WorkdirEntry {
  url: string;
  workdir: string;
  accessedAt: Date;
}

export function mapWorkdirRow(row: unknown): WorkdirEntry {
  const parsed = WorkdirRowSchema.parse(row);
  return {
    url: parsed.url,
    workdir: parsed.workdir,
    accessedAt: new Date(parsed.accessed_at),
  };
}

// ============================================================================
// Result Types
// ============================================================================

export interface CacheError {
  type: "query_error";
  message: string;
  cause?: unknown;
}

export type CacheResult<T> =
  | { ok: true; data: T }
  | { ok: false; error: CacheError };

function errorResult<T>(type: CacheError["type"], message: string, cause?: unknown): CacheResult<T> {
  return { ok: false, error: { type, message, cause } };
}

function okResult<T>(data: T): CacheResult<T> {
  return { ok: true, data };
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}

// ============================================================================
// Workdir Cache
// ============================================================================

/**
 * Create a workdir cache on top of an executor.
 */
export function createWorkdirCache(executor: SqliteExecutor, now: () => number = Date.now) {
  /**
   * Create the schema and drop expired entries.
   */
  function init(): CacheResult<number> {
    try {
      executor.execute(SCHEMA_SQL);
    } catch (error) {
      return errorResult("query_error", `Failed to initialize schema: ${describe(error)}`, error);
    }
    return expire();
  }

  /**
   * Remove entries not accessed within the expiry window.
   */
  function expire(): CacheResult<number> {
    try {
      const cutoff = now() - CACHE_EXPIRY_MS;
      const stale = executor.queryRows("SELECT * FROM workdirs WHERE accessed_at < ?", [cutoff]);
      executor.execute("DELETE FROM workdirs WHERE accessed_at < ?", [cutoff]);
      return okResult(stale.length);
    } catch (error) {
      return errorResult("query_error", `Failed to expire entries: ${describe(error)}`, error);
    }
  }

  /**
   * Workdir last used for `url`, refreshing its access time.
   */
  function lookup(url: string): CacheResult<string | null> {
    try {
      const row = executor.queryOne("SELECT * FROM workdirs WHERE url = ?", [url]);
      if (row === undefined) {
        return okResult(null);
      }
      const entry = mapWorkdirRow(row);
      executor.execute("UPDATE workdirs SET accessed_at = ? WHERE url = ?", [now(), url]);
      return okResult(entry.workdir);
    } catch (error) {
      return errorResult("query_error", `Failed to look up workdir: ${describe(error)}`, error);
    }
  }

  function record(url: string, workdir: string): CacheResult<void> {
    try {
      executor.execute(
        `INSERT INTO workdirs (url, workdir, accessed_at) VALUES (?, ?, ?)
         ON CONFLICT(url) DO UPDATE SET workdir = excluded.workdir, accessed_at = excluded.accessed_at`,
        [url, workdir, now()],
      );
      return okResult(undefined);
    } catch (error) {
      return errorResult("query_error", `Failed to record workdir: ${describe(error)}`, error);
    }
  }

  function forget(url: string): CacheResult<boolean> {
    try {
      const existed = executor.queryOne("SELECT 1 AS present FROM workdirs WHERE url = ?", [url]);
      executor.execute("DELETE FROM workdirs WHERE url = ?", [url]);
      return okResult(existed !== undefined);
    } catch (error) {
      return errorResult("query_error", `Failed to forget workdir: ${describe(error)}`, error);
    }
  }

  function entries(): CacheResult<WorkdirEntry[]> {
    try {
      return okResult(executor.queryRows("SELECT * FROM workdirs ORDER BY url").map(mapWorkdirRow));
    } catch (error) {
      return errorResult("query_error", `Failed to list entries: ${describe(error)}`, error);
    }
  }

  function close(): void {
    executor.close();
  }

  return {
    init,
    expire,
    lookup,
    record,
    forget,
    entries,
    close,
  };
}

/**
 * Type for the workdir cache.
 */
export type WorkdirCache = ReturnType<typeof createWorkdirCache>;

// ============================================================================
// SQLite Executor Factory
// ============================================================================

type SqlValue = number | string | Uint8Array | null;

function toSqlValue(value: unknown): SqlValue {
  if (value === null || typeof value === "number" || typeof value === "string" || value instanceof Uint8Array) {
    return value;
  }
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  throw new TypeError(`cannot bind a ${typeof value} parameter`);
}

async function readDatabaseFile(dbPath: string): Promise<Uint8Array | null> {
  try {
    return await readFile(dbPath);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

/**
 * Create a SQLite executor backed by sql.js. The database lives in memory;
 * unless `dbPath` is ":memory:" it is loaded from that file and written back
 * after every change.
 */
export async function createSqliteExecutor(dbPath: string): Promise<SqliteExecutor> {
  // CommonJS module seen through ESM: the factory is also its own `default`.
  const { default: sqlJs } = await import("sql.js");
  const SQL = await sqlJs.default();
  const inMemory = dbPath === ":memory:";
  const db = new SQL.Database(inMemory ? null : await readDatabaseFile(dbPath));

  function persist(): void {
    if (inMemory) {
      return;
    }
    const temporary = `${dbPath}.${process.pid}.tmp`;
    writeFileSync(temporary, db.export());
    renameSync(temporary, dbPath);
  }

  function select(sql: string, params: unknown[]): unknown[] {
    const statement = db.prepare(sql);
    try {
      statement.bind(params.map(toSqlValue));
      const rows: unknown[] = [];
      while (statement.step()) {
        rows.push(statement.getAsObject());
      }
      return rows;
    } finally {
      statement.free();
    }
  }

  return {
    execute(sql: string, params: unknown[] = []): void {
      if (params.length === 0) {
        db.exec(sql);
      } else {
        db.run(sql, params.map(toSqlValue));
      }
      persist();
    },

    queryRows(sql: string, params: unknown[] = []): unknown[] {
      return select(sql, params);
    },

    queryOne(sql: string, params: unknown[] = []): unknown {
      return select(sql, params)[0];
    },

    close(): void {
      db.close();
    },
  };
}

/**
 * Open the cache for this process, or null when it is disabled or cannot be
 * opened (logged as a warning).
 */
export async function openWorkdirCache(config: AppConfig): Promise<WorkdirCache | null> {
  if (config.cacheDisabled) {
    log.debug("Workdir cache disabled");
    return null;
  }

  const dbPath = cacheDatabaseFile(config);
  try {
    await mkdir(dirname(dbPath), { recursive: true });
    const cache = createWorkdirCache(await createSqliteExecutor(dbPath));
    const initResult = cache.init();
    if (!initResult.ok) {
      log.warn("Workdir cache unavailable", { path: dbPath, error: initResult.error.message });
      cache.close();
      return null;
    }
    if (initResult.data > 0) {
      log.debug("Expired workdir cache entries", { count: initResult.data });
    }
    return cache;
  } catch (error) {
    log.warn("Workdir cache unavailable", { path: dbPath, error: describe(error) });
    return null;
  }
}
