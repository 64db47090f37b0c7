/**
 * SqliteConnection: Thin abstraction over better-sqlite3
 *
 * The model layer never touches better-sqlite3 directly. It talks to a
 * Connection, which hands out the grammar that compiles queries and the
 * post processor that validates their results.
 */

import Database from 'better-sqlite3';
import type { CompiledQuery, Connection, RunResult } from './types';
import { SqliteGrammar, SqlitePostProcessor } from './sqlite-dialect';

/**
 * Configuration options for a SQLite connection.
 */
export interface SqliteConnectionOptions {
  /** Path to the SQLite database file, or ':memory:' */
  filename: string;
  /** Open the database read-only */
  readonly?: boolean;
  /** Log every statement with its bindings */
  logging?: boolean;
}

export class SqliteConnection implements Connection {
  private db: Database.Database;
  private grammar = new SqliteGrammar();
  private processor = new SqlitePostProcessor();

  constructor(
    readonly name: string,
    private options: SqliteConnectionOptions,
  ) {
    this.db = new Database(options.filename, { readonly: options.readonly ?? false });
  }

  getQueryGrammar(): SqliteGrammar {
    return this.grammar;
  }

  getPostProcessor(): SqlitePostProcessor {
    return this.processor;
  }

  /**
   * Run a query that returns rows.
   */
  select(query: CompiledQuery): unknown[] {
    this.log(query);
    return this.db.prepare(query.sql).all(...query.bindings);
  }

  /**
   * Run a statement that changes data.
   */
  run(query: CompiledQuery): RunResult {
    this.log(query);
    return this.db.prepare(query.sql).run(...query.bindings);
  }

  /**
   * Execute raw SQL, possibly several statements, without bindings.
   */
  exec(sql: string): void {
    this.log({ sql, bindings: [] });
    this.db.exec(sql);
  }

  /**
   * Execute a function within a transaction.
   *
   * If the function throws, the transaction is rolled back.
   * If it succeeds, changes are committed.
   */
  transaction<T>(fn: () => T): T {
    const trx = this.db.transaction(fn);
    return trx();
  }

  tableExists(table: string): boolean {
    const result = this.db
      .prepare(`SELECT name FROM sqlite_master WHERE type='table' AND name = ?`)
      .get(table);
    return result !== undefined;
  }

  /**
   * Close the database connection.
   * After calling this, no further operations are possible.
   */
  close(): void {
    this.db.close();
  }

  private log(query: CompiledQuery): void {
    if (this.options.logging) {
      console.log(`[Connection:${this.name}] ${query.sql}`, query.bindings);
    }
  }
}
