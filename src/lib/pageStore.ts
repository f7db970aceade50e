import { createRequire } from "node:module";
import type { StoredPage } from "../types.js";
import { readBinaryFile, writeBinaryFile } from "./fileStore.js";
import { DEFAULT_PAGE_QUERIES, type PageQueries } from "./pageQueries.js";

interface SqlJsStatement {
  bind(params?: unknown[] | Record<string, unknown>): void;
  step(): boolean;
  getAsObject(params?: unknown[] | Record<string, unknown>): Record<string, unknown>;
  free(): void;
}

interface SqlJsDatabase {
  run(sql: string, params?: unknown[] | Record<string, unknown>): void;
  prepare(sql: string): SqlJsStatement;
  getRowsModified(): number;
  export(): Uint8Array;
  close(): void;
}

interface SqlJsStatic {
  Database: new (data?: Uint8Array) => SqlJsDatabase;
}

type SqlJsInit = (config?: { locateFile?: (file: string) => string }) => Promise<SqlJsStatic>;

export type PageStoreOperation = "open" | "ensureSchema" | "listNames" | "getByName" | "insert" | "update" | "delete" | "close";

export class PageStoreError extends Error {
  readonly operation: PageStoreOperation;

  constructor(operation: PageStoreOperation, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Page store ${operation} failed: ${detail}`, { cause });
    this.name = "PageStoreError";
    this.operation = operation;
  }
}

/**
 * Single-table persistence for wiki pages. Every call holds the store's
 * connection lease for exactly one statement and releases it on every path.
 */
export interface PageStore {
  ensureSchema(): Promise<void>;
  listNames(): Promise<string[]>;
  getByName(name: string): Promise<StoredPage | null>;
  insert(name: string, content: string): Promise<number>;
  /** Resolves to false when no row has the given id. */
  update(id: number, content: string): Promise<boolean>;
  /** Resolves to false when no row has the given id. */
  delete(id: number): Promise<boolean>;
  close(): Promise<void>;
}

export interface PageStoreOptions {
  /** Path of the SQLite file, or ":memory:" for a database that is never written to disk. */
  filename: string;
  queries?: PageQueries | undefined;
}

export const IN_MEMORY_DATABASE = ":memory:";

const require = createRequire(import.meta.url);

let sqlRuntimePromise: Promise<SqlJsStatic> | null = null;

const getSqlRuntime = async (): Promise<SqlJsStatic> => {
  if (!sqlRuntimePromise) {
    sqlRuntimePromise = (async () => {
      const imported = (await import("sql.js")) as { default?: SqlJsInit };
      if (typeof imported.default !== "function") {
        throw new Error("sql.js could not be initialised.");
      }

      return imported.default({
        locateFile: (file: string) => require.resolve(`sql.js/dist/${file}`)
      });
    })().catch((error: unknown) => {
      sqlRuntimePromise = null;
      throw error;
    });
  }

  return sqlRuntimePromise;
};

const toInt = (value: unknown): number => {
  const parsed = Number(value);
  return Number.isFinite(parsed) ? Math.trunc(parsed) : 0;
};

const mapRowToPage = (row: Record<string, unknown>): StoredPage => ({
  id: toInt(row.Id),
  name: String(row.Name ?? ""),
  content: String(row.Content ?? "")
});

const queryRows = (db: SqlJsDatabase, sql: string, params: unknown[] = []): Array<Record<string, unknown>> => {
  const stmt = db.prepare(sql);
  try {
    if (params.length > 0) {
      stmt.bind(params);
    }

    const rows: Array<Record<string, unknown>> = [];
    while (stmt.step()) {
      rows.push(stmt.getAsObject());
    }
    return rows;
  } finally {
    stmt.free();
  }
};

export const createPageStore = (options: PageStoreOptions): PageStore => {
  const queries = options.queries ?? DEFAULT_PAGE_QUERIES;
  const inMemory = options.filename === IN_MEMORY_DATABASE;

  let db: SqlJsDatabase | null = null;
  let closed = false;
  let lease: Promise<void> = Promise.resolve();

  const withLease = async <T>(task: () => Promise<T>): Promise<T> => {
    const current = lease;
    let release!: () => void;
    lease = new Promise<void>((resolve) => {
      release = resolve;
    });

    await current;
    try {
      return await task();
    } finally {
      release();
    }
  };

  const open = async (): Promise<SqlJsDatabase> => {
    if (db) return db;
    if (closed) {
      throw new Error("store is closed");
    }

    const SQL = await getSqlRuntime();
    if (inMemory) {
      db = new SQL.Database();
      return db;
    }

    const sourceBytes = await readBinaryFile(options.filename);
    db = sourceBytes ? new SQL.Database(sourceBytes) : new SQL.Database();
    return db;
  };

  const persist = async (database: SqlJsDatabase): Promise<void> => {
    if (inMemory) return;
    await writeBinaryFile(options.filename, database.export());
  };

  // Drops the in-memory copy so the next call reloads whatever reached the file.
  const discard = (database: SqlJsDatabase): void => {
    if (inMemory || db !== database) return;
    db = null;
    database.close();
  };

  const run = <T>(operation: PageStoreOperation, task: (database: SqlJsDatabase) => Promise<T> | T): Promise<T> =>
    withLease(async () => {
      let database: SqlJsDatabase;
      try {
        database = await open();
      } catch (error) {
        throw new PageStoreError("open", error);
      }

      try {
        return await task(database);
      } catch (error) {
        discard(database);
        throw new PageStoreError(operation, error);
      }
    });

  return {
    ensureSchema: () =>
      run("ensureSchema", async (database) => {
        database.run(queries.createPagesTable);
        await persist(database);
      }),

    listNames: () =>
      run("listNames", (database) => queryRows(database, queries.allPages).map((row) => String(row.Name ?? ""))),

    getByName: (name) =>
      run("getByName", (database) => {
        const [row] = queryRows(database, queries.getPage, [name]);
        return row ? mapRowToPage(row) : null;
      }),

    insert: (name, content) =>
      run("insert", async (database) => {
        database.run(queries.createPage, [name, content]);
        const [row] = queryRows(database, "SELECT last_insert_rowid() AS id");
        await persist(database);
        return toInt(row?.id);
      }),

    update: (id, content) =>
      run("update", async (database) => {
        database.run(queries.savePage, [content, id]);
        const changed = database.getRowsModified() > 0;
        if (changed) {
          await persist(database);
        }
        return changed;
      }),

    delete: (id) =>
      run("delete", async (database) => {
        database.run(queries.deletePage, [id]);
        const changed = database.getRowsModified() > 0;
        if (changed) {
          await persist(database);
        }
        return changed;
      }),

    close: () =>
      withLease(async () => {
        if (closed) return;
        closed = true;
        if (!db) return;

        const database = db;
        db = null;
        try {
          await persist(database);
        } catch (error) {
          throw new PageStoreError("close", error);
        } finally {
          database.close();
        }
      })
  };
};
