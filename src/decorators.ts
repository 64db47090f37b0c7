/**
 * Decorators for defining entity metadata.
 * These decorators use reflect-metadata to store one EntityDefinition per
 * model type: table, key, declared columns, attribute hooks and relations.
 *
 * Key principle: Decorators are purely declarative. They don't execute
 * queries; they fill in tables that the model reads at runtime.
 */

import 'reflect-metadata';
import type { Model } from './model';
import type { ConnectionRegistry } from './connection-registry';
import type { AttributeValue, ColumnMetadata, EntityOptions } from './types';
import { ENTITY_KEY, isSupportedType } from './types';
import { baseName, snakeCase } from './naming';

export type AttributeHookMethod = (this: Model, value: AttributeValue) => AttributeValue;

export type RelationFactory = (model: Model) => unknown;

/**
 * Everything the decorators record about one model type.
 */
export class EntityDefinition {
  table?: string;
  connection?: string;
  primaryKey = 'id';
  incrementing = true;
  timestamps = true;
  columns = new Map<string, ColumnMetadata>();
  accessors = new Map<string, AttributeHookMethod>();
  mutators = new Map<string, AttributeHookMethod>();
  relations = new Map<string, RelationFactory>();
  registry?: ConnectionRegistry;

  /**
   * Copy for a subclass. The table is not inherited; it derives from the
   * subclass name unless the subclass declares its own.
   */
  extend(): EntityDefinition {
    const child = new EntityDefinition();
    child.connection = this.connection;
    child.primaryKey = this.primaryKey;
    child.incrementing = this.incrementing;
    child.timestamps = this.timestamps;
    child.columns = new Map(this.columns);
    child.accessors = new Map(this.accessors);
    child.mutators = new Map(this.mutators);
    child.relations = new Map(this.relations);
    return child;
  }
}

/**
 * Get (or lazily create) the definition of a model type.
 * A subclass starts from a copy of its parent's definition.
 */
export function definitionFor(entity: Function): EntityDefinition {
  const own: unknown = Reflect.getOwnMetadata(ENTITY_KEY, entity);
  if (own instanceof EntityDefinition) {
    return own;
  }
  const inherited: unknown = Reflect.getMetadata(ENTITY_KEY, entity);
  const definition =
    inherited instanceof EntityDefinition ? inherited.extend() : new EntityDefinition();
  Reflect.defineMetadata(ENTITY_KEY, definition, entity);
  return definition;
}

/**
 * Entity decorator maps a model class to a database table.
 *
 * @param tableName - Table name. Defaults to the snake cased class name.
 *
 * @example
 * ```typescript
 * @Entity('blog_posts', { connection: 'content' })
 * class BlogPost extends Model {}
 * ```
 */
export function Entity(tableName?: string, options: EntityOptions = {}): ClassDecorator {
  return (target: Function) => {
    if (tableName !== undefined) {
      // Validate table name: alphanumeric, underscore, no SQL keywords
      if (!/^[a-zA-Z_][a-zA-Z0-9_]*$/.test(tableName)) {
        throw new Error(
          `Invalid table name "${tableName}". Must start with letter or underscore and contain only alphanumeric characters and underscores.`,
        );
      }
    }

    const definition = definitionFor(target);
    definition.table = tableName;
    definition.connection = options.connection ?? definition.connection;
    definition.primaryKey = options.primaryKey ?? definition.primaryKey;
    definition.incrementing = options.incrementing ?? definition.incrementing;
    definition.timestamps = options.timestamps ?? definition.timestamps;
  };
}

/**
 * Column decorator maps a property to a database column.
 *
 * The property becomes a view on the model's attributes: reading it runs
 * the accessor for the column, writing it runs the mutator. The design type
 * emitted by emitDecoratorMetadata drives value conversion and schema
 * synchronization.
 *
 * @param columnName - Optional database column name. Defaults to property name.
 * @param isPrimary - Optional flag for primary key columns
 *
 * @example
 * ```typescript
 * class User extends Model {
 *   @Column('user_id', true)
 *   id!: number;
 *
 *   @Column()
 *   username!: string;
 * }
 * ```
 */
export function Column(columnName?: string, isPrimary = false) {
  return (target: Model, propertyKey: string): void => {
    const designType: unknown = Reflect.getMetadata('design:type', target, propertyKey);
    const typeName = typeof designType === 'function' ? designType.name : undefined;
    const column = columnName ?? propertyKey;

    const definition = definitionFor(target.constructor);
    definition.columns.set(propertyKey, {
      property: propertyKey,
      column,
      type: typeName !== undefined && isSupportedType(typeName) ? typeName : undefined,
      isPrimary,
    });
    if (isPrimary) {
      definition.primaryKey = column;
    }

    Object.defineProperty(target, propertyKey, {
      get(this: Model) {
        return this.get(column);
      },
      set(this: Model, value: AttributeValue) {
        this.set(column, value);
      },
      configurable: true,
      enumerable: false,
    });
  };
}

/**
 * Register a method as the accessor of an attribute.
 * The method receives the stored value and returns the visible one.
 *
 * @param key - Attribute name. Defaults to the method name without its
 *   `get` prefix, snake cased (`getFullName` -> `full_name`).
 */
export function Accessor(key?: string) {
  return <F extends AttributeHookMethod>(
    target: Model,
    propertyKey: string,
    descriptor: TypedPropertyDescriptor<F>,
  ): void => {
    const hook = descriptor.value;
    if (hook) {
      definitionFor(target.constructor).accessors.set(key ?? hookKey(propertyKey), hook);
    }
  };
}

/**
 * Register a method as the mutator of an attribute.
 * The method's return value is stored instead of the assigned one.
 */
export function Mutator(key?: string) {
  return <F extends AttributeHookMethod>(
    target: Model,
    propertyKey: string,
    descriptor: TypedPropertyDescriptor<F>,
  ): void => {
    const hook = descriptor.value;
    if (hook) {
      definitionFor(target.constructor).mutators.set(key ?? hookKey(propertyKey), hook);
    }
  };
}

/**
 * Register a method as a named relation.
 *
 * Registered relations can be eager loaded by name, and while the method
 * runs its name is known to `belongsTo()`, which derives the default
 * foreign key from it (`author` -> `author_id`).
 *
 * @example
 * ```typescript
 * class Post extends Model {
 *   @Relationship()
 *   author() {
 *     return this.belongsTo(User);
 *   }
 * }
 *
 * const posts = Post.with('author').get();
 * ```
 */
export function Relationship(name?: string): MethodDecorator {
  return (target: object, propertyKey: string | symbol, descriptor: PropertyDescriptor) => {
    const original: unknown = descriptor.value;
    if (typeof original !== 'function') {
      throw new Error(`@Relationship can only decorate methods, not ${String(propertyKey)}.`);
    }
    const method: Function = original;
    const relationName = name ?? String(propertyKey);

    function relation(this: Model, ...args: unknown[]): unknown {
      return this.withinRelation(relationName, (): unknown => method.apply(this, args));
    }

    descriptor.value = relation;
    definitionFor(target.constructor).relations.set(relationName, (model) => relation.call(model));
  };
}

/**
 * Bind a connection registry to a model type and its subclasses.
 */
export function bindEntity(entity: Function, registry: ConnectionRegistry | undefined): void {
  definitionFor(entity).registry = registry;
}

/**
 * The registry bound to a type or to its nearest bound ancestor.
 */
export function registryFor(entity: Function): ConnectionRegistry | undefined {
  let current: unknown = entity;
  while (typeof current === 'function') {
    const own: unknown = Reflect.getOwnMetadata(ENTITY_KEY, current);
    if (own instanceof EntityDefinition && own.registry) {
      return own.registry;
    }
    current = Object.getPrototypeOf(current);
  }
  return undefined;
}

/**
 * Table name for an entity class.
 */
export function getTableName(entity: Function): string {
  return definitionFor(entity).table ?? snakeCase(baseName(entity));
}

/**
 * Declared columns of an entity class, in declaration order.
 */
export function getColumnMetadata(entity: Function): ColumnMetadata[] {
  return [...definitionFor(entity).columns.values()];
}

/**
 * Primary key column of an entity class.
 */
export function getPrimaryKey(entity: Function): string {
  return definitionFor(entity).primaryKey;
}

function hookKey(methodName: string): string {
  return snakeCase(methodName.replace(/^(get|set)(?=[A-Z])/, ''));
}
