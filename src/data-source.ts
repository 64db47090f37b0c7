/**
 * DataSource is the primary orchestrator.
 *
 * Responsibilities:
 * 1. Opens the configured better-sqlite3 connections into a registry
 * 2. Binds the registry to every configured model type
 * 3. Optional schema synchronization (auto-create tables)
 * 4. Dispenses the EntityManager
 */

import { ConnectionRegistry } from './connection-registry';
import { SqliteConnection } from './connection';
import type { SqliteConnectionOptions } from './connection';
import { bindEntity, definitionFor, getTableName } from './decorators';
import { EntityManager } from './entity-manager';
import type { ModelClass } from './model';
import type { ColumnDefinition, Connection } from './types';
import { TYPE_MAP } from './types';

/**
 * Configuration options for DataSource initialization.
 */
export interface DataSourceOptions {
  /** Named connections; the first one is the default unless `defaultConnection` says otherwise */
  connections: Record<string, SqliteConnectionOptions>;
  /** Name of the default connection */
  defaultConnection?: string;
  /** Model classes to bind to this data source */
  entities: ModelClass[];
  /** If true, auto-creates missing tables from declared columns */
  synchronize?: boolean;
  /** Log lifecycle events and every statement */
  logging?: boolean;
}

export class DataSource {
  public readonly manager: EntityManager;
  private registry = new ConnectionRegistry();
  private isInitialized = false;
  private options: DataSourceOptions;

  constructor(options: DataSourceOptions) {
    this.options = {
      synchronize: false,
      logging: false,
      ...options,
    };
    this.manager = new EntityManager(this.registry);
  }

  /**
   * Create and initialize a data source in one step.
   */
  static async init(options: DataSourceOptions): Promise<DataSource> {
    return new DataSource(options).initialize();
  }

  /**
   * Initialize the data source.
   * Opens every connection, binds the entities and optionally creates tables.
   *
   * Safe to call multiple times (idempotent).
   *
   * @example
   * ```typescript
   * const dataSource = new DataSource({
   *   connections: { main: { filename: 'app.db' } },
   *   entities: [User, Post],
   *   synchronize: true,
   * });
   *
   * await dataSource.initialize();
   * const user = User.find(1);
   * ```
   */
  async initialize(): Promise<this> {
    if (this.isInitialized) {
      return this;
    }

    try {
      for (const [name, options] of Object.entries(this.options.connections)) {
        this.registry.register(
          name,
          new SqliteConnection(name, { logging: this.options.logging, ...options }),
        );
        this.log(`Connected "${name}" to ${options.filename}`);
      }
      if (this.options.defaultConnection !== undefined) {
        this.registry.setDefaultName(this.options.defaultConnection);
      }

      for (const entity of this.options.entities) {
        bindEntity(entity, this.registry);
      }

      if (this.options.synchronize) {
        this.synchronizeSchema();
        this.log('Schema synchronized');
      }

      this.isInitialized = true;
    } catch (error) {
      this.release();
      throw new Error(
        `Failed to initialize DataSource: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }

    return this;
  }

  getConnection(name?: string): Connection {
    this.assertInitialized();
    return name === undefined ? this.registry.getDefault() : this.registry.resolve(name);
  }

  getRegistry(): ConnectionRegistry {
    return this.registry;
  }

  isReady(): boolean {
    return this.isInitialized;
  }

  /**
   * Close every connection and unbind the entities.
   *
   * @example
   * ```typescript
   * process.on('SIGTERM', async () => {
   *   await dataSource.destroy();
   *   process.exit(0);
   * });
   * ```
   */
  async destroy(): Promise<void> {
    if (!this.isInitialized) {
      return;
    }
    this.release();
    this.isInitialized = false;
    this.log('Connections closed');
  }

  /**
   * Create a table for every entity that has none yet, with its key
   * column, its declared columns and its timestamp columns.
   *
   * Intended for development and tests; use migrations in production.
   */
  private synchronizeSchema(): void {
    for (const entity of this.options.entities) {
      const model = new entity();
      const connection = model.getConnection();
      const table = getTableName(entity);
      if (connection.tableExists(table)) {
        continue;
      }

      const definition = definitionFor(entity);
      const columns: ColumnDefinition[] = [];
      const declared = [...definition.columns.values()];

      if (!declared.some((col) => col.column === definition.primaryKey)) {
        columns.push(this.keyColumn(definition.primaryKey, 'Number', definition.incrementing));
      }
      for (const col of declared) {
        columns.push(
          col.column === definition.primaryKey
            ? this.keyColumn(col.column, col.type ?? 'Number', definition.incrementing)
            : { name: col.column, type: TYPE_MAP[col.type ?? 'String'] },
        );
      }
      if (definition.timestamps) {
        for (const name of ['created_at', 'updated_at']) {
          if (!columns.some((col) => col.name === name)) {
            columns.push({ name, type: TYPE_MAP.Date });
          }
        }
      }

      connection.exec(connection.getQueryGrammar().compileCreateTable(table, columns));
      this.log(`Created table: ${table}`);
    }
  }

  private keyColumn(
    name: string,
    type: keyof typeof TYPE_MAP,
    incrementing: boolean,
  ): ColumnDefinition {
    const sqlType = TYPE_MAP[type];
    return {
      name,
      type: sqlType,
      primary: true,
      autoIncrement: incrementing && sqlType === 'INTEGER',
    };
  }

  /**
   * Unbind the entities, close every connection and empty the registry.
   */
  private release(): void {
    for (const entity of this.options.entities) {
      bindEntity(entity, undefined);
    }
    for (const connection of this.registry.all()) {
      connection.close();
    }
    this.registry.clear();
  }

  private assertInitialized(): void {
    if (!this.isInitialized) {
      throw new Error('DataSource not initialized. Call .initialize() first.');
    }
  }

  private log(message: string): void {
    if (this.options.logging) {
      console.log(`[DataSource] ${message}`);
    }
  }
}
