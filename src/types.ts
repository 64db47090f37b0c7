/**
 * Core type definitions shared across the model layer.
 * This module defines attribute values, query descriptors and the
 * connection collaborator contracts.
 */

import type Database from 'better-sqlite3';

/**
 * Metadata key for the per-type entity definition.
 * Using a Symbol prevents naming collisions in the metadata registry.
 */
export const ENTITY_KEY = Symbol('entity');

/**
 * Values an attribute may hold in memory.
 */
export type AttributeValue =
  | string
  | number
  | bigint
  | boolean
  | Date
  | Uint8Array
  | null;

export type Attributes = Record<string, AttributeValue>;

/** Primary key values */
export type Key = string | number | bigint;

/** Values better-sqlite3 can bind to a statement parameter */
export type SqliteValue = string | number | bigint | Uint8Array | null;

export type Operator = '=' | '!=' | '<>' | '<' | '<=' | '>' | '>=' | 'like';

export type WhereClause =
  | { type: 'basic'; column: string; operator: Operator; value: AttributeValue }
  | { type: 'in'; column: string; values: AttributeValue[] };

export interface JoinClause {
  table: string;
  first: string;
  operator: Operator;
  second: string;
}

export interface OrderClause {
  column: string;
  direction: 'asc' | 'desc';
}

/**
 * Everything the grammar needs to turn one query into SQL.
 * Built per call by the query builder and the relations on top of it.
 */
export interface QueryDescriptor {
  table: string;
  columns: string[];
  wheres: WhereClause[];
  joins: JoinClause[];
  orders: OrderClause[];
  limit?: number;
  offset?: number;
  eagerLoad: string[];
}

export interface CompiledQuery {
  sql: string;
  bindings: SqliteValue[];
}

export type RunResult = Database.RunResult;

/**
 * Options accepted by the @Entity decorator.
 */
export interface EntityOptions {
  /** Connection name; falls back to the registry default */
  connection?: string;
  /** Primary key column (default: 'id') */
  primaryKey?: string;
  /** Whether the key is generated by the database on insert (default: true) */
  incrementing?: boolean;
  /** Maintain created_at/updated_at on save (default: true) */
  timestamps?: boolean;
}

/**
 * Internal metadata for a declared column.
 * Stores the mapping between TypeScript properties and database columns.
 */
export interface ColumnMetadata {
  /** TypeScript property name */
  property: string;
  /** Database column name */
  column: string;
  /** Runtime type emitted by emitDecoratorMetadata, when supported */
  type?: SupportedType;
  /** Whether this is the primary key */
  isPrimary: boolean;
}

export interface ColumnDefinition {
  name: string;
  type: string;
  primary?: boolean;
  autoIncrement?: boolean;
}

/**
 * Turns query descriptors into dialect-specific SQL.
 */
export interface QueryGrammar {
  compileSelect(query: QueryDescriptor): CompiledQuery;
  compileInsert(table: string, values: Attributes): CompiledQuery;
  compileUpdate(query: QueryDescriptor, values: Attributes): CompiledQuery;
  compileDelete(query: QueryDescriptor): CompiledQuery;
  compileCount(query: QueryDescriptor): CompiledQuery;
  compileCreateTable(table: string, columns: ColumnDefinition[]): string;
}

/**
 * Post-processes raw driver results before hydration.
 */
export interface PostProcessor {
  processSelect(rows: unknown[]): Attributes[];
  processInsertGetId(result: RunResult): number | bigint;
}

/**
 * A named handle on one database.
 */
export interface Connection {
  readonly name: string;
  getQueryGrammar(): QueryGrammar;
  getPostProcessor(): PostProcessor;
  select(query: CompiledQuery): unknown[];
  run(query: CompiledQuery): RunResult;
  exec(sql: string): void;
  transaction<T>(fn: () => T): T;
  tableExists(table: string): boolean;
  close(): void;
}

/**
 * Supported runtime types for declared columns.
 */
export type SupportedType =
  | 'String'
  | 'Number'
  | 'Boolean'
  | 'Date'
  | 'BigInt'
  | 'Object';

/**
 * Maps declared column types to SQLite column types.
 * Used during schema synchronization.
 */
export const TYPE_MAP: Record<SupportedType, string> = {
  String: 'TEXT',
  Number: 'INTEGER',
  Boolean: 'INTEGER',
  Date: 'TEXT',
  BigInt: 'INTEGER',
  Object: 'TEXT',
};

export function isSupportedType(name: string): name is SupportedType {
  return Object.prototype.hasOwnProperty.call(TYPE_MAP, name);
}

/**
 * Converters for transforming values between TypeScript and SQLite.
 * - toDb: Prepares a value for storage (e.g., Boolean -> 0/1, Date -> ISO string)
 * - fromDb: Hydrates a value from storage (e.g., 0/1 -> Boolean, ISO string -> Date)
 */
export const VALUE_CONVERTERS: Partial<
  Record<
    SupportedType,
    {
      toDb: (v: AttributeValue) => AttributeValue;
      fromDb: (v: AttributeValue) => AttributeValue;
    }
  >
> = {
  Boolean: {
    toDb: (v) => (v === true ? 1 : v === false ? 0 : v),
    fromDb: (v) => (v === 1 ? true : v === 0 ? false : Boolean(v)),
  },
  Date: {
    toDb: (v) => (v instanceof Date ? v.toISOString() : v),
    fromDb: (v) => (typeof v === 'string' ? new Date(v) : v),
  },
};
