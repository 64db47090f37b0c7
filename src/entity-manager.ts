/**
 * EntityManager implements the Unit of Work pattern.
 *
 * The Unit of Work pattern ensures that multiple operations succeed or fail
 * as a single atomic unit. In SQLite (via better-sqlite3), this is achieved
 * using the .transaction() method which handles BEGIN, COMMIT, and ROLLBACK.
 */

import type { ConnectionRegistry } from './connection-registry';
import type { Model, ModelClass } from './model';
import type { QueryBuilder } from './query-builder';
import type { Connection } from './types';

export type TransactionCallback<T> = (manager: EntityManager) => T;

export class EntityManager {
  constructor(private registry: ConnectionRegistry) {}

  /**
   * Save a model through its own connection.
   *
   * @example
   * ```typescript
   * manager.save(new User({ username: 'alice' }));
   * ```
   */
  save<T extends Model>(model: T): T {
    model.save();
    return model;
  }

  /**
   * Execute multiple operations within a single transaction.
   * If any operation throws an error, all changes are rolled back.
   *
   * @param connectionName - Connection to run on. Defaults to the registry default.
   *
   * @example
   * ```typescript
   * manager.transaction((tx) => {
   *   const user = tx.save(new User({ username: 'alice' }));
   *   user.posts().create({ title: 'Hello' });
   * });
   * ```
   */
  transaction<T>(callback: TransactionCallback<T>, connectionName?: string): T {
    return this.getConnection(connectionName).transaction(() => callback(this));
  }

  /**
   * Start a query for a model type.
   */
  query<T extends Model>(entity: ModelClass<T>): QueryBuilder<T> {
    return new entity().newQuery();
  }

  getConnection(name?: string): Connection {
    return name === undefined ? this.registry.getDefault() : this.registry.resolve(name);
  }
}
