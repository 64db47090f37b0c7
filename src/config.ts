/**
 * Configuration helpers.
 *
 * - defineConfig(): Helper to define DataSource options with type safety
 * - env(): Type-safe environment variable access with validation
 *
 * Environment files are not loaded here. Use `import 'dotenv/config'` in the
 * config file or `node --env-file=.env`.
 */

import type { DataSourceOptions } from './data-source';

/**
 * Helper to define data source configuration with type safety.
 * Returns the options object unchanged once it passes validation.
 *
 * @example
 * ```typescript
 * import { defineConfig, env } from 'relational-model'
 *
 * export default defineConfig({
 *   connections: {
 *     main: { filename: env('DATABASE_FILE', 'app.db') },
 *   },
 *   entities: [User, Post],
 *   logging: process.env.NODE_ENV === 'development',
 * })
 * ```
 */
export function defineConfig(options: DataSourceOptions): DataSourceOptions {
  validateConfig(options);
  return options;
}

/**
 * Type-safe environment variable accessor.
 *
 * Throws if the variable is not set, ensuring you catch
 * configuration errors early at startup.
 *
 * @example
 * ```typescript
 * const file = env('DATABASE_FILE') // throws if not set
 * const mode = env('DB_MODE', 'wal') // defaults to 'wal'
 * ```
 */
export function env(name: string, defaultValue?: string): string {
  const value = process.env[name];

  if (!value) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(
      `Missing required environment variable: ${name}\n` +
        `Please set ${name} or provide a default in your config.`,
    );
  }

  return value;
}

/**
 * Validate DataSourceOptions to catch common configuration errors early.
 *
 * @internal
 */
function validateConfig(options: DataSourceOptions): void {
  const names = Object.keys(options.connections);

  if (names.length === 0) {
    throw new Error(
      'DataSourceOptions.connections must define at least one connection. \n' +
        'Example: { connections: { main: { filename: "app.db" } }, entities: [User] }',
    );
  }

  for (const name of names) {
    if (!options.connections[name].filename) {
      throw new Error(
        `DataSourceOptions.connections.${name}.filename is required. \n` +
          'Example: { filename: "app.db" } or { filename: ":memory:" }',
      );
    }
  }

  if (options.defaultConnection !== undefined && !names.includes(options.defaultConnection)) {
    throw new Error(
      `DataSourceOptions.defaultConnection "${options.defaultConnection}" is not one of the configured connections: ${names.join(', ')}`,
    );
  }
}
