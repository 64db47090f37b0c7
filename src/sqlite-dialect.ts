import type {
  AttributeValue,
  Attributes,
  ColumnDefinition,
  CompiledQuery,
  PostProcessor,
  QueryDescriptor,
  QueryGrammar,
  RunResult,
  SqliteValue,
  WhereClause,
} from './types';
import { VALUE_CONVERTERS } from './types';
import { assertRow } from './type-guards';

/**
 * Compiles query descriptors to SQLite SQL strings.
 * Encapsulates all SQL generation logic.
 */
export class SqliteGrammar implements QueryGrammar {
  compileSelect(query: QueryDescriptor): CompiledQuery {
    const columns =
      query.columns.length > 0 ? query.columns.map((c) => this.wrap(c)).join(', ') : '*';
    const where = this.compileWheres(query.wheres);

    let sql = `SELECT ${columns} FROM ${this.wrap(query.table)}`;
    for (const join of query.joins) {
      sql += ` INNER JOIN ${this.wrap(join.table)} ON ${this.wrap(join.first)} ${join.operator} ${this.wrap(join.second)}`;
    }
    sql += where.sql;
    if (query.orders.length > 0) {
      sql += ` ORDER BY ${query.orders
        .map((o) => `${this.wrap(o.column)} ${o.direction.toUpperCase()}`)
        .join(', ')}`;
    }
    if (query.limit !== undefined) {
      sql += ` LIMIT ${query.limit}`;
    } else if (query.offset !== undefined) {
      // SQLite only accepts OFFSET after a LIMIT
      sql += ' LIMIT -1';
    }
    if (query.offset !== undefined) {
      sql += ` OFFSET ${query.offset}`;
    }

    return { sql, bindings: where.bindings };
  }

  compileInsert(table: string, values: Attributes): CompiledQuery {
    const keys = Object.keys(values);
    if (keys.length === 0) {
      return { sql: `INSERT INTO ${this.wrap(table)} DEFAULT VALUES`, bindings: [] };
    }
    const cols = keys.map((k) => this.wrap(k)).join(', ');
    const placeholders = keys.map(() => '?').join(', ');
    return {
      sql: `INSERT INTO ${this.wrap(table)} (${cols}) VALUES (${placeholders})`,
      bindings: keys.map((k) => this.parameter(values[k])),
    };
  }

  compileUpdate(query: QueryDescriptor, values: Attributes): CompiledQuery {
    const keys = Object.keys(values);
    const setClauses = keys.map((k) => `${this.wrap(k)} = ?`).join(', ');
    const where = this.compileWheres(query.wheres);

    return {
      sql: `UPDATE ${this.wrap(query.table)} SET ${setClauses}${where.sql}`,
      bindings: [...keys.map((k) => this.parameter(values[k])), ...where.bindings],
    };
  }

  compileDelete(query: QueryDescriptor): CompiledQuery {
    const where = this.compileWheres(query.wheres);
    return {
      sql: `DELETE FROM ${this.wrap(query.table)}${where.sql}`,
      bindings: where.bindings,
    };
  }

  compileCount(query: QueryDescriptor): CompiledQuery {
    const { sql, bindings } = this.compileSelect({
      ...query,
      columns: [],
      orders: [],
      limit: undefined,
      offset: undefined,
    });
    return { sql: sql.replace(/^SELECT \* /, 'SELECT COUNT(*) AS "aggregate" '), bindings };
  }

  compileCreateTable(table: string, columns: ColumnDefinition[]): string {
    const defs = columns
      .map((col) => {
        let def = `${this.wrap(col.name)} ${col.type}`;
        if (col.primary) def += ' PRIMARY KEY';
        if (col.autoIncrement) def += ' AUTOINCREMENT';
        return def;
      })
      .join(', ');
    return `CREATE TABLE IF NOT EXISTS ${this.wrap(table)} (${defs})`;
  }

  /**
   * Quote an identifier: `users.id` -> `"users"."id"`, `id as key` -> `"id" AS "key"`.
   */
  wrap(value: string): string {
    const aliased = /^(.+?)\s+as\s+(.+)$/i.exec(value);
    if (aliased) {
      return `${this.wrap(aliased[1])} AS ${this.wrapSegment(aliased[2])}`;
    }
    return value
      .split('.')
      .map((segment) => this.wrapSegment(segment))
      .join('.');
  }

  /**
   * Normalize a value before binding it to better-sqlite3.
   * Booleans and dates go through VALUE_CONVERTERS.
   */
  parameter(value: AttributeValue | undefined): SqliteValue {
    if (value === undefined || value === null) return null;
    if (typeof value === 'boolean') return this.parameter(VALUE_CONVERTERS.Boolean?.toDb(value));
    if (value instanceof Date) return this.parameter(VALUE_CONVERTERS.Date?.toDb(value));
    return value;
  }

  private compileWheres(wheres: WhereClause[]): CompiledQuery {
    if (wheres.length === 0) {
      return { sql: '', bindings: [] };
    }
    const bindings: SqliteValue[] = [];
    const clauses = wheres.map((where) => {
      if (where.type === 'basic') {
        bindings.push(this.parameter(where.value));
        return `${this.wrap(where.column)} ${where.operator.toUpperCase()} ?`;
      }
      if (where.values.length === 0) {
        return '0 = 1';
      }
      bindings.push(...where.values.map((v) => this.parameter(v)));
      return `${this.wrap(where.column)} IN (${where.values.map(() => '?').join(', ')})`;
    });
    return { sql: ` WHERE ${clauses.join(' AND ')}`, bindings };
  }

  private wrapSegment(segment: string): string {
    return segment === '*' ? '*' : `"${segment.trim().replace(/"/g, '""')}"`;
  }
}

/**
 * Validates driver results before they are hydrated into models.
 */
export class SqlitePostProcessor implements PostProcessor {
  processSelect(rows: unknown[]): Attributes[] {
    return rows.map((row) => {
      assertRow(row, 'select');
      return row;
    });
  }

  processInsertGetId(result: RunResult): number | bigint {
    return result.lastInsertRowid;
  }
}
