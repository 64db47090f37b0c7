/**
 * Model binds one row of a table to an in-memory attribute store.
 *
 * Attributes are schema-less: any column name can be read or written with
 * get()/set(), and @Column properties are typed views onto them. Relations
 * are plain methods returning a Relation; decorated with @Relationship() they
 * can be eager loaded by name.
 *
 * @example
 * ```typescript
 * class User extends Model {
 *   @Column() name!: string;
 *
 *   @Relationship()
 *   posts() {
 *     return this.hasMany(Post);
 *   }
 * }
 *
 * const user = User.create({ name: 'alice' });
 * user.posts().create({ title: 'Hello' });
 *
 * const users = User.with('posts').get();
 * ```
 */

import { AttributeStore } from './attributes';
import type { AttributeHook } from './attributes';
import type { ConnectionRegistry } from './connection-registry';
import type { AttributeHookMethod, EntityDefinition } from './decorators';
import { bindEntity, definitionFor, getTableName, registryFor } from './decorators';
import { EntityNotBoundError, InvalidRelatedTypeError, UnknownRelationError } from './errors';
import { baseName, foreignKey, joiningTable, snakeCase } from './naming';
import { QueryBuilder } from './query-builder';
import { BelongsTo } from './relations/belongs-to';
import { BelongsToMany } from './relations/belongs-to-many';
import { HasMany } from './relations/has-many';
import { HasOne } from './relations/has-one';
import { Relation } from './relations/relation';
import type { AttributeValue, Attributes, Connection, Key } from './types';
import { VALUE_CONVERTERS } from './types';

export type ModelClass<T extends Model = Model> = new (attributes?: Attributes) => T;

/** What a loaded relation holds: one model, none, or a list */
export type RelationValue = Model | Model[] | null;

export abstract class Model {
  /** Whether the model is known to have a row in storage */
  exists = false;

  /** Join table keys of a model loaded through a many-to-many relation */
  pivot?: Attributes;

  protected readonly attributes: AttributeStore;
  private table: string | undefined;
  private connectionName: string | undefined;
  private relations = new Map<string, RelationValue>();
  private relationScope: string[] = [];

  constructor(attributes: Attributes = {}) {
    this.attributes = new AttributeStore({
      accessor: (key) => this.bindHook(this.definition().accessors.get(key)),
      mutator: (key) => this.bindHook(this.definition().mutators.get(key)),
    });
    this.fill(attributes);
  }

  /**
   * Bind a connection registry to this model type and every subclass.
   *
   * @example
   * ```typescript
   * abstract class AppModel extends Model {}
   * AppModel.useRegistry(registry);
   * ```
   */
  static useRegistry(registry: ConnectionRegistry): void {
    bindEntity(this, registry);
  }

  static query<T extends Model>(this: ModelClass<T>): QueryBuilder<T> {
    return new this().newQuery();
  }

  /**
   * Find a model by its primary key.
   */
  static find<T extends Model>(this: ModelClass<T>, id: Key, columns: string[] = ['*']): T | null {
    return new this().newQuery().find(id, columns);
  }

  static all<T extends Model>(this: ModelClass<T>, columns: string[] = ['*']): T[] {
    return new this().newQuery().get(columns);
  }

  /**
   * Save a new model and return the instance.
   */
  static create<T extends Model>(this: ModelClass<T>, attributes: Attributes): T {
    const model = new this(attributes);
    model.save();
    return model;
  }

  /**
   * Begin querying the model with eager loading.
   */
  static with<T extends Model>(this: ModelClass<T>, ...relations: string[]): QueryBuilder<T> {
    return new this().newQuery().with(...relations);
  }

  fill(attributes: Attributes): this {
    for (const [key, value] of Object.entries(attributes)) {
      this.set(key, value);
    }
    return this;
  }

  /**
   * Read an attribute through its accessor, if one is registered.
   */
  get(key: string): AttributeValue {
    return this.attributes.get(key);
  }

  /**
   * Write an attribute through its mutator, if one is registered.
   */
  set(key: string, value: AttributeValue): void {
    this.attributes.set(key, value);
  }

  has(key: string): boolean {
    return this.attributes.has(key);
  }

  remove(key: string): void {
    this.attributes.remove(key);
  }

  getAttributes(): Attributes {
    return this.attributes.all();
  }

  setRawAttributes(attributes: Attributes): void {
    this.attributes.replace(attributes);
  }

  /**
   * Create a new instance of the same model type.
   */
  newInstance(attributes: Attributes = {}, exists = false): this {
    const model = new (this.constructor as ModelClass<this>)(attributes);
    model.exists = exists;
    model.setConnection(this.connectionName);
    return model;
  }

  /**
   * Hydrate a row read from storage. Mutators do not run; declared
   * Boolean and Date columns are converted back from their stored form.
   */
  newFromStorage(row: Attributes): this {
    const model = this.newInstance({}, true);
    const attributes: Attributes = { ...row };

    for (const column of this.definition().columns.values()) {
      const converter = column.type ? VALUE_CONVERTERS[column.type] : undefined;
      const value = attributes[column.column];
      if (converter && value !== undefined && value !== null) {
        attributes[column.column] = converter.fromDb(value);
      }
    }

    model.setRawAttributes(attributes);
    return model;
  }

  /**
   * Get a new query builder for the model's table.
   */
  newQuery(): QueryBuilder<this> {
    const connection = this.getConnection();

    const builder = new QueryBuilder<this>(
      connection,
      connection.getQueryGrammar(),
      connection.getPostProcessor(),
    );

    return builder.setModel(this);
  }

  getTable(): string {
    return this.table ?? getTableName(this.constructor);
  }

  setTable(table: string): void {
    this.table = table;
  }

  getKeyName(): string {
    return this.definition().primaryKey;
  }

  getQualifiedKeyName(): string {
    return `${this.getTable()}.${this.getKeyName()}`;
  }

  getKey(): AttributeValue {
    return this.get(this.getKeyName());
  }

  /**
   * Default foreign key pointing at this model type (`BlogPost` -> `blog_post_id`).
   */
  getForeignKey(): string {
    return foreignKey(this);
  }

  getConnectionName(): string | undefined {
    return this.connectionName ?? this.definition().connection;
  }

  setConnection(name: string | undefined): void {
    this.connectionName = name;
  }

  /**
   * The connection backing this model: its own override, else the type's
   * @Entity connection, else the registry default.
   */
  getConnection(): Connection {
    const registry = registryFor(this.constructor);
    if (!registry) {
      throw new EntityNotBoundError(baseName(this));
    }
    const name = this.getConnectionName();
    return name === undefined ? registry.getDefault() : registry.resolve(name);
  }

  /**
   * Save the model to the database.
   *
   * A new model is inserted and receives its generated key; an existing one
   * is updated by key with all of its attributes.
   */
  save(): boolean {
    const query = this.newQuery();

    if (this.usesTimestamps()) {
      this.updateTimestamps();
    }

    if (this.exists) {
      query.where(this.getKeyName(), '=', this.getKey()).update(this.getAttributes());
    } else {
      if (this.definition().incrementing) {
        this.attributes.setRaw(this.getKeyName(), query.insertGetId(this.getAttributes()));
      } else {
        query.insert(this.getAttributes());
      }
      this.exists = true;
    }

    return true;
  }

  /**
   * Delete the model's row. Does nothing for a model that does not exist.
   */
  delete(): boolean {
    if (!this.exists) {
      return false;
    }
    this.newQuery().where(this.getKeyName(), '=', this.getKey()).delete();
    this.exists = false;
    return true;
  }

  usesTimestamps(): boolean {
    return this.definition().timestamps;
  }

  /**
   * One clock read shared by updated_at and, on creation, created_at.
   */
  protected updateTimestamps(): void {
    const time = this.freshTimestamp();
    this.set('updated_at', time);
    if (!this.exists) {
      this.set('created_at', time);
    }
  }

  protected freshTimestamp(): Date {
    return new Date();
  }

  /**
   * Define a one-to-one relationship.
   *
   * @param foreignKey - Column on the related table. Defaults to this
   *   model's foreign key (`User` -> `user_id`).
   */
  hasOne<R extends Model>(related: ModelClass<R>, foreignKey?: string): HasOne<R> {
    const instance = this.newRelatedInstance(related);
    return new HasOne(instance.newQuery(), this, foreignKey ?? this.getForeignKey());
  }

  /**
   * Define a one-to-many relationship.
   */
  hasMany<R extends Model>(related: ModelClass<R>, foreignKey?: string): HasMany<R> {
    const instance = this.newRelatedInstance(related);
    return new HasMany(instance.newQuery(), this, foreignKey ?? this.getForeignKey());
  }

  /**
   * Define an inverse one-to-one or many relationship.
   *
   * @param foreignKey - Column on this model. Defaults to the name of the
   *   calling @Relationship() method, snake cased, plus `_id`.
   */
  belongsTo<R extends Model>(related: ModelClass<R>, foreignKey?: string): BelongsTo<R> {
    const key = foreignKey ?? this.inferForeignKey();
    const instance = this.newRelatedInstance(related);
    return new BelongsTo(instance.newQuery(), this, key);
  }

  /**
   * Define a many-to-many relationship.
   *
   * @param table - Join table. Defaults to both snake cased type names in
   *   alphabetical order (`Role` + `User` -> `role_user`).
   * @param foreignKey - Join table column pointing at this model
   * @param otherKey - Join table column pointing at the related model
   */
  belongsToMany<R extends Model>(
    related: ModelClass<R>,
    table?: string,
    foreignKey?: string,
    otherKey?: string,
  ): BelongsToMany<R> {
    const instance = this.newRelatedInstance(related);
    return new BelongsToMany(
      instance.newQuery(),
      this,
      table ?? this.joiningTable(related),
      foreignKey ?? this.getForeignKey(),
      otherKey ?? instance.getForeignKey(),
    );
  }

  /**
   * Get the joining table name for a many-to-many relation.
   */
  joiningTable(related: Function | Model): string {
    return joiningTable(this, related);
  }

  /**
   * Build the relation registered under `name`.
   *
   * @throws UnknownRelationError if no @Relationship() method has that name
   */
  getRelationship(name: string): Relation<Model> {
    const factory = this.definition().relations.get(name);
    if (!factory) {
      throw new UnknownRelationError(baseName(this), name);
    }
    const relation = factory(this);
    if (!(relation instanceof Relation)) {
      throw new UnknownRelationError(baseName(this), name, 'did not return a relation');
    }
    return relation;
  }

  /**
   * Eager load relations onto this model.
   */
  load(...relations: string[]): this {
    this.newQuery().with(...relations).eagerLoadRelations([this]);
    return this;
  }

  getRelation(name: string): RelationValue | undefined {
    return this.relations.get(name);
  }

  setRelation(name: string, value: RelationValue): void {
    this.relations.set(name, value);
  }

  relationLoaded(name: string): boolean {
    return this.relations.has(name);
  }

  /**
   * Run `callback` with `name` as the relation being defined, so that
   * belongsTo() can derive its foreign key from it. Used by @Relationship().
   *
   * @internal
   */
  withinRelation<V>(name: string, callback: () => V): V {
    this.relationScope.push(name);
    try {
      return callback();
    } finally {
      this.relationScope.pop();
    }
  }

  toJSON(): Record<string, unknown> {
    const json: Record<string, unknown> = this.getAttributes();
    for (const [name, value] of this.relations) {
      json[name] = Array.isArray(value) ? value.map((model) => model.toJSON()) : value?.toJSON() ?? null;
    }
    return json;
  }

  protected definition(): EntityDefinition {
    return definitionFor(this.constructor);
  }

  private newRelatedInstance<R extends Model>(related: ModelClass<R>): R {
    if (typeof related !== 'function' || !(related.prototype instanceof Model)) {
      throw new InvalidRelatedTypeError(related);
    }
    try {
      return new related();
    } catch (error) {
      throw new InvalidRelatedTypeError(related, { cause: error });
    }
  }

  private inferForeignKey(): string {
    const relation = this.relationScope[this.relationScope.length - 1];
    if (relation === undefined) {
      throw new Error(
        `${baseName(this)}.belongsTo() needs a foreign key when it is not called from a @Relationship() method.`,
      );
    }
    return `${snakeCase(relation)}_id`;
  }

  private bindHook(method: AttributeHookMethod | undefined): AttributeHook | undefined {
    return method && ((value) => method.call(this, value));
  }
}
