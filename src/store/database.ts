import initSqlJs, { type Database, type SqlJsStatic, type SqlValue } from "sql.js";
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { SCHEMA_STATEMENTS } from "./schema.js";

export type Row = Record<string, SqlValue>;

export interface RunResult {
  lastInsertRowid: number;
}

let engine: Promise<SqlJsStatic> | undefined;

function loadEngine(): Promise<SqlJsStatic> {
  engine ??= initSqlJs();
  return engine;
}

/**
 * Thin synchronous wrapper over a sql.js database.
 *
 * sql.js keeps the whole database in memory; a file-backed Db writes the
 * image back to disk after every statement that changes it.
 */
export class Db {
  private sql: Database;
  private filename: string | null;

  constructor(sql: Database, filename: string | null) {
    this.sql = sql;
    this.filename = filename;
    this.applyPragmas();
  }

  /**
   * Execute a write statement and return the rowid it inserted
   */
  run(statement: string, params: SqlValue[] = []): RunResult {
    this.sql.run(statement, params);
    const lastInsertRowid = Number(
      this.sql.exec("SELECT last_insert_rowid()")[0]?.values[0]?.[0] ?? 0
    );
    this.persist();
    return { lastInsertRowid };
  }

  /** First row of a query, or undefined */
  get(query: string, params: SqlValue[] = []): Row | undefined {
    const stmt = this.sql.prepare(query, params);
    try {
      return stmt.step() ? stmt.getAsObject() : undefined;
    } finally {
      stmt.free();
    }
  }

  all(query: string, params: SqlValue[] = []): Row[] {
    const stmt = this.sql.prepare(query, params);
    const rows: Row[] = [];
    try {
      while (stmt.step()) {
        rows.push(stmt.getAsObject());
      }
    } finally {
      stmt.free();
    }
    return rows;
  }

  /** Run DDL or other statements without parameters */
  exec(statements: string): void {
    this.sql.exec(statements);
    this.persist();
  }

  close(): void {
    this.sql.close();
  }

  private applyPragmas(): void {
    this.sql.run("PRAGMA foreign_keys = ON");
  }

  private persist(): void {
    if (this.filename === null) return;
    // export() reopens the database, which resets pragmas
    writeFileSync(this.filename, this.sql.export());
    this.applyPragmas();
  }
}

/**
 * Open (or create) the tracker database and make sure both tables exist.
 *
 * Pass ":memory:" for a throwaway database.
 */
export async function openDatabase(filename: string): Promise<Db> {
  const SQL = await loadEngine();

  let db: Db;
  if (filename === ":memory:") {
    db = new Db(new SQL.Database(), null);
  } else {
    mkdirSync(dirname(filename), { recursive: true });
    const image = existsSync(filename) ? readFileSync(filename) : undefined;
    db = new Db(new SQL.Database(image), filename);
  }

  for (const statement of SCHEMA_STATEMENTS) {
    db.exec(statement);
  }
  return db;
}
