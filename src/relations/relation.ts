import type { Model, RelationValue } from '../model';
import type { QueryBuilder, WhereArgs } from '../query-builder';
import type { AttributeValue, Key, QueryDescriptor, WhereClause } from '../types';

/**
 * Base class of every relation: a query on the related model, bound to
 * the model that owns the relation.
 *
 * A relation applies one base constraint when it is built, which limits the
 * related query to the owner's rows. Eager loading swaps that constraint
 * for one that covers a whole batch of owners.
 */
export abstract class Relation<R extends Model> {
  protected related: R;
  protected baseConstraint: WhereClause | undefined;

  constructor(
    protected query: QueryBuilder<R>,
    protected parent: Model,
  ) {
    this.related = query.getModel();
  }

  /**
   * Restrict the related query to the owner's rows.
   */
  abstract addConstraints(): void;

  /**
   * Restrict the related query to the rows of a batch of owners.
   */
  abstract addEagerConstraints(models: Model[]): void;

  /**
   * Give every owner the empty value of this relation.
   */
  abstract initRelation(models: Model[], name: string): Model[];

  /**
   * Distribute eagerly loaded results onto their owners.
   */
  abstract match(models: Model[], results: R[], name: string): Model[];

  /**
   * Run the relation for its owner.
   */
  abstract getResults(): RelationValue;

  getEager(): R[] {
    return this.query.get();
  }

  getQuery(): QueryBuilder<R> {
    return this.query;
  }

  getParent(): Model {
    return this.parent;
  }

  getRelated(): R {
    return this.related;
  }

  where(column: string, ...args: WhereArgs): this {
    this.query.where(column, ...args);
    return this;
  }

  whereIn(column: string, values: AttributeValue[]): this {
    this.query.whereIn(column, values);
    return this;
  }

  orderBy(column: string, direction: 'asc' | 'desc' = 'asc'): this {
    this.query.orderBy(column, direction);
    return this;
  }

  limit(value: number): this {
    this.query.limit(value);
    return this;
  }

  select(...columns: string[]): this {
    this.query.select(...columns);
    return this;
  }

  with(...relations: string[]): this {
    this.query.with(...relations);
    return this;
  }

  get(columns: string[] = ['*']): R[] {
    return this.query.get(columns);
  }

  first(columns: string[] = ['*']): R | null {
    return this.query.first(columns);
  }

  find(id: Key, columns: string[] = ['*']): R | null {
    return this.query.find(id, columns);
  }

  count(): number {
    return this.query.count();
  }

  toDescriptor(): QueryDescriptor {
    return this.query.toDescriptor();
  }

  /**
   * Add the base constraint, remembering it for eager loading.
   */
  protected constrain(column: string, value: AttributeValue): void {
    this.baseConstraint = { type: 'basic', column, operator: '=', value };
    this.query.addWhere(this.baseConstraint);
  }

  /**
   * Replace the base constraint with an IN over a batch of keys.
   */
  protected constrainEagerly(column: string, keys: AttributeValue[]): void {
    if (this.baseConstraint) {
      this.query.removeWhere(this.baseConstraint);
      this.baseConstraint = undefined;
    }
    this.query.whereIn(column, keys);
  }
}

/**
 * Distinct non-null keys, in first-seen order.
 */
export function uniqueKeys(values: AttributeValue[]): AttributeValue[] {
  const seen = new Map<string, AttributeValue>();
  for (const value of values) {
    if (value !== null && !seen.has(dictionaryKey(value))) {
      seen.set(dictionaryKey(value), value);
    }
  }
  return [...seen.values()];
}

/**
 * Normalize a key for dictionary lookups, so 1, 1n and '1' match.
 */
export function dictionaryKey(value: AttributeValue): string {
  return value instanceof Date ? value.toISOString() : String(value);
}

/**
 * Group models by the value a selector returns.
 */
export function buildDictionary<M extends Model>(
  models: M[],
  key: (model: M) => AttributeValue,
): Map<string, M[]> {
  const dictionary = new Map<string, M[]>();
  for (const model of models) {
    const value = key(model);
    if (value === null) continue;
    const group = dictionary.get(dictionaryKey(value)) ?? [];
    group.push(model);
    dictionary.set(dictionaryKey(value), group);
  }
  return dictionary;
}
