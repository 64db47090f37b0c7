/**
 * relational-model: Active-record models with relations for better-sqlite3
 *
 * Core concepts:
 * - Model: one row of a table, with schema-less attributes
 * - Decorators: @Entity, @Column, @Accessor, @Mutator, @Relationship
 * - Relations: HasOne, HasMany, BelongsTo, BelongsToMany, with eager loading
 * - ConnectionRegistry: named connections with one default
 * - DataSource: opens connections and binds model types to them
 *
 * @example
 * ```typescript
 * import 'reflect-metadata'
 * import { DataSource, Model, Column, Relationship } from 'relational-model'
 *
 * class User extends Model {
 *   @Column()
 *   username!: string
 *
 *   @Relationship()
 *   posts() {
 *     return this.hasMany(Post)
 *   }
 * }
 *
 * class Post extends Model {
 *   @Column()
 *   title!: string
 *
 *   @Relationship()
 *   user() {
 *     return this.belongsTo(User)
 *   }
 * }
 *
 * await DataSource.init({
 *   connections: { main: { filename: 'app.db' } },
 *   entities: [User, Post],
 *   synchronize: true,
 * })
 *
 * const alice = User.create({ username: 'alice' })
 * alice.posts().create({ title: 'Hello' })
 *
 * const users = User.with('posts').get()
 * ```
 */

// Models and their relations
export { Model } from './model';
export type { ModelClass, RelationValue } from './model';
export { Relation } from './relations/relation';
export { HasOneOrMany } from './relations/has-one-or-many';
export { HasOne } from './relations/has-one';
export { HasMany } from './relations/has-many';
export { BelongsTo } from './relations/belongs-to';
export { BelongsToMany } from './relations/belongs-to-many';

// Decorators: Define entity metadata
export { Entity, Column, Accessor, Mutator, Relationship } from './decorators';
export {
  EntityDefinition,
  bindEntity,
  definitionFor,
  getColumnMetadata,
  getPrimaryKey,
  getTableName,
  registryFor,
} from './decorators';

// Attributes and naming conventions
export { AttributeStore } from './attributes';
export type { AttributeHook, AttributeHooks } from './attributes';
export { snakeCase, camelCase, baseName, foreignKey, joiningTable } from './naming';

// Querying
export { QueryBuilder } from './query-builder';
export type { WhereArgs } from './query-builder';

// Connections
export { ConnectionRegistry } from './connection-registry';
export { SqliteConnection } from './connection';
export type { SqliteConnectionOptions } from './connection';
export { SqliteGrammar, SqlitePostProcessor } from './sqlite-dialect';

// Orchestration
export { DataSource } from './data-source';
export type { DataSourceOptions } from './data-source';
export { EntityManager } from './entity-manager';
export type { TransactionCallback } from './entity-manager';
export { defineConfig, env } from './config';

// Errors
export {
  OrmError,
  UnknownConnectionError,
  NoDefaultConnectionError,
  UnknownRelationError,
  InvalidRelatedTypeError,
  EntityNotBoundError,
} from './errors';

// Types: Re-export commonly used types
export type {
  AttributeValue,
  Attributes,
  ColumnMetadata,
  CompiledQuery,
  Connection,
  EntityOptions,
  Key,
  Operator,
  PostProcessor,
  QueryDescriptor,
  QueryGrammar,
  WhereClause,
} from './types';
