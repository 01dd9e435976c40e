import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { logger as rootLogger, type Logger } from "../utils/logger";

type Statements = {
  db: Database.Database;
  get: Database.Statement<[string], { value: string }>;
  put: Database.Statement<[string, string], void>;
  del: Database.Statement<[string], void>;
  keys: Database.Statement<[], { key: string }>;
};

/**
 * One SQLite file holding JSON values under string keys. Several logical
 * repositories share it (chat overrides, the user→group link table).
 *
 * Writers go through {@link exclusive}, which runs the callback inside
 * `BEGIN IMMEDIATE`: the file's write lock is held from the first read of a
 * read-modify-write until commit, for this connection and any other one
 * opened on the same file.
 */
export class KvStore {
  private stmts: Statements | null = null;

  constructor(
    readonly filePath: string,
    private readonly log: Logger = rootLogger.child({ module: "kv-store" })
  ) {}

  /** Opens lazily so a broken path surfaces as an operation failure, not a crash at import. */
  private open(): Statements {
    if (this.stmts) return this.stmts;

    if (this.filePath !== ":memory:") {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    }
    const db = new Database(this.filePath, { timeout: 5_000 });
    try {
      db.pragma("journal_mode = WAL");
      db.exec(`
        CREATE TABLE IF NOT EXISTS shelf (
          key   TEXT PRIMARY KEY,
          value TEXT NOT NULL
        )
      `);
      this.stmts = {
        db,
        get: db.prepare<[string], { value: string }>("SELECT value FROM shelf WHERE key = ?"),
        put: db.prepare<[string, string], void>(
          "INSERT INTO shelf (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value"
        ),
        del: db.prepare<[string], void>("DELETE FROM shelf WHERE key = ?"),
        keys: db.prepare<[], { key: string }>("SELECT key FROM shelf"),
      };
    } catch (e) {
      db.close();
      throw e;
    }
    this.log.debug({ path: this.filePath }, "store opened");
    return this.stmts;
  }

  /** Parsed JSON stored under `key`, or undefined when absent. */
  get(key: string): unknown {
    const row = this.open().get.get(key);
    if (!row) return undefined;
    const value: unknown = JSON.parse(row.value);
    return value;
  }

  has(key: string): boolean {
    return this.open().get.get(key) !== undefined;
  }

  put(key: string, value: unknown): void {
    const json = JSON.stringify(value);
    if (json === undefined) throw new TypeError(`Value for "${key}" is not JSON-serializable`);
    this.open().put.run(key, json);
  }

  delete(key: string): boolean {
    return this.open().del.run(key).changes > 0;
  }

  keys(): string[] {
    return this.open()
      .keys.all()
      .map((r) => r.key);
  }

  /**
   * Runs `fn` while holding the store's write lock. A throw inside `fn`
   * rolls back everything it wrote.
   */
  exclusive<T>(fn: () => T): T {
    return this.open().db.transaction(fn).immediate();
  }

  close(): void {
    this.stmts?.db.close();
    this.stmts = null;
  }
}
