import type { Connection } from './types';
import { NoDefaultConnectionError, UnknownConnectionError } from './errors';

/**
 * Named connection handles with one default.
 *
 * A registry is an explicit object: a DataSource owns one, and model types
 * are bound to it with `Model.useRegistry()` or `bindEntity()`.
 *
 * @example
 * ```typescript
 * const registry = new ConnectionRegistry();
 * registry.register('main', new SqliteConnection('main', { filename: 'app.db' }));
 * registry.register('audit', new SqliteConnection('audit', { filename: 'audit.db' }));
 *
 * registry.getDefault().name; // "main"
 * ```
 */
export class ConnectionRegistry<C extends Connection = Connection> {
  private connections = new Map<string, C>();
  private defaultName: string | undefined;

  /**
   * Register a connection. The first registration becomes the default
   * unless a default is already set.
   */
  register(name: string, connection: C): void {
    this.connections.set(name, connection);
    if (this.defaultName === undefined) {
      this.defaultName = name;
    }
  }

  resolve(name: string): C {
    const connection = this.connections.get(name);
    if (!connection) {
      throw new UnknownConnectionError(name);
    }
    return connection;
  }

  getDefault(): C {
    if (this.defaultName === undefined) {
      throw new NoDefaultConnectionError();
    }
    return this.resolve(this.defaultName);
  }

  getDefaultName(): string | undefined {
    return this.defaultName;
  }

  /**
   * @throws UnknownConnectionError if `name` was never registered
   */
  setDefaultName(name: string): void {
    if (!this.connections.has(name)) {
      throw new UnknownConnectionError(name);
    }
    this.defaultName = name;
  }

  has(name: string): boolean {
    return this.connections.has(name);
  }

  names(): string[] {
    return [...this.connections.keys()];
  }

  all(): C[] {
    return [...this.connections.values()];
  }

  /**
   * Drop every registration and the default marker.
   */
  clear(): void {
    this.connections.clear();
    this.defaultName = undefined;
  }
}
