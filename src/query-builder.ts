/**
 * QueryBuilder builds one query against a model's table and hydrates the
 * resulting rows as instances of that model.
 *
 * The builder only collects a QueryDescriptor. SQL text comes from the
 * connection's grammar and raw results are validated by its post processor,
 * so every path (static finders, relations, persistence) shares one route
 * from "which table, which dialect" to model instances.
 */

import type { Model } from './model';
import type {
  AttributeValue,
  Attributes,
  Connection,
  Key,
  Operator,
  PostProcessor,
  QueryDescriptor,
  QueryGrammar,
  WhereClause,
} from './types';

/**
 * Arguments after the column in `where()`: a value compared with `=`,
 * or an operator followed by a value.
 */
export type WhereArgs = [value: AttributeValue] | [operator: Operator, value: AttributeValue];

export class QueryBuilder<T extends Model> {
  private model: T | undefined;
  private table = '';
  private columns: string[] = [];
  private wheres: WhereClause[] = [];
  private joins: QueryDescriptor['joins'] = [];
  private orders: QueryDescriptor['orders'] = [];
  private limitValue: number | undefined;
  private offsetValue: number | undefined;
  private eagerLoad: string[] = [];

  constructor(
    private connection: Connection,
    private grammar: QueryGrammar,
    private processor: PostProcessor,
  ) {}

  /**
   * Bind the model whose table is queried and whose type hydrates results.
   */
  setModel(model: T): this {
    this.model = model;
    this.table = model.getTable();
    return this;
  }

  getModel(): T {
    if (!this.model) {
      throw new Error('QueryBuilder has no model. Call setModel() first.');
    }
    return this.model;
  }

  getConnection(): Connection {
    return this.connection;
  }

  /**
   * @example
   * ```typescript
   * query.where('votes', '>', 100).where('name', 'John')
   * ```
   */
  where(column: string, ...args: WhereArgs): this {
    const clause: WhereClause =
      args.length === 1
        ? { type: 'basic', column, operator: '=', value: args[0] }
        : { type: 'basic', column, operator: args[0], value: args[1] };
    return this.addWhere(clause);
  }

  whereIn(column: string, values: AttributeValue[]): this {
    return this.addWhere({ type: 'in', column, values: [...values] });
  }

  addWhere(clause: WhereClause): this {
    this.wheres.push(clause);
    return this;
  }

  /**
   * Remove a clause previously added with addWhere(), by identity.
   */
  removeWhere(clause: WhereClause): this {
    this.wheres = this.wheres.filter((where) => where !== clause);
    return this;
  }

  join(table: string, first: string, operator: Operator, second: string): this {
    this.joins.push({ table, first, operator, second });
    return this;
  }

  select(...columns: string[]): this {
    this.columns = columns.filter((column) => column !== '*');
    return this;
  }

  orderBy(column: string, direction: 'asc' | 'desc' = 'asc'): this {
    this.orders.push({ column, direction });
    return this;
  }

  limit(value: number): this {
    this.limitValue = value;
    return this;
  }

  offset(value: number): this {
    this.offsetValue = value;
    return this;
  }

  /**
   * Mark relations to load for every result of this query.
   * Dotted names load nested relations: `with('posts.comments')`.
   */
  with(...relations: string[]): this {
    this.eagerLoad.push(...relations);
    return this;
  }

  getEagerLoads(): string[] {
    return [...this.eagerLoad];
  }

  toDescriptor(): QueryDescriptor {
    return {
      table: this.table,
      columns: [...this.columns],
      wheres: this.wheres.map((where) =>
        where.type === 'in' ? { ...where, values: [...where.values] } : { ...where },
      ),
      joins: this.joins.map((join) => ({ ...join })),
      orders: this.orders.map((order) => ({ ...order })),
      limit: this.limitValue,
      offset: this.offsetValue,
      eagerLoad: [...this.eagerLoad],
    };
  }

  /**
   * Execute the query and hydrate every row, then eager load.
   *
   * @param columns - Columns to select when none were chosen with select()
   */
  get(columns: string[] = ['*']): T[] {
    const descriptor = this.toDescriptor();
    if (descriptor.columns.length === 0) {
      descriptor.columns = columns.filter((column) => column !== '*');
    }

    const rows = this.processor.processSelect(
      this.connection.select(this.grammar.compileSelect(descriptor)),
    );
    const model = this.getModel();
    const models = rows.map((row) => model.newFromStorage(row));

    if (models.length > 0 && this.eagerLoad.length > 0) {
      this.eagerLoadRelations(models);
    }
    return models;
  }

  first(columns: string[] = ['*']): T | null {
    const previous = this.limitValue;
    this.limitValue = 1;
    try {
      return this.get(columns)[0] ?? null;
    } finally {
      this.limitValue = previous;
    }
  }

  /**
   * Find a model by its primary key.
   */
  find(id: Key, columns: string[] = ['*']): T | null {
    return this.where(this.getModel().getQualifiedKeyName(), id).first(columns);
  }

  count(): number {
    const [row] = this.processor.processSelect(
      this.connection.select(this.grammar.compileCount(this.toDescriptor())),
    );
    return Number(row?.aggregate ?? 0);
  }

  insert(values: Attributes): number {
    return this.connection.run(this.grammar.compileInsert(this.table, values)).changes;
  }

  /**
   * Insert a row and return the identifier the database generated for it.
   */
  insertGetId(values: Attributes): number | bigint {
    const result = this.connection.run(this.grammar.compileInsert(this.table, values));
    return this.processor.processInsertGetId(result);
  }

  /**
   * Update every row matching the current constraints.
   * @returns Number of changed rows
   */
  update(values: Attributes): number {
    if (Object.keys(values).length === 0) {
      throw new Error('update() requires at least one field to update');
    }
    return this.connection.run(this.grammar.compileUpdate(this.toDescriptor(), values)).changes;
  }

  delete(): number {
    return this.connection.run(this.grammar.compileDelete(this.toDescriptor())).changes;
  }

  /**
   * Load the relations marked with with() onto a batch of models.
   *
   * One query runs per top-level relation, keyed by every owner in the
   * batch; results are matched back onto their owners. Nested names are
   * handed to the relation's own query.
   */
  eagerLoadRelations(models: T[]): T[] {
    for (const [name, nested] of groupEagerLoads(this.eagerLoad)) {
      this.loadRelation(models, name, nested);
    }
    return models;
  }

  private loadRelation(models: T[], name: string, nested: string[]): void {
    const relation = this.getModel().getRelationship(name);

    relation.addEagerConstraints(models);
    if (nested.length > 0) {
      relation.with(...nested);
    }

    relation.match(relation.initRelation(models, name), relation.getEager(), name);
  }
}

/**
 * Group eager load names by their first segment:
 * `['posts.comments', 'posts.tags', 'profile']` becomes
 * `{ posts: ['comments', 'tags'], profile: [] }`.
 */
function groupEagerLoads(names: string[]): Map<string, string[]> {
  const grouped = new Map<string, string[]>();
  for (const name of names) {
    const [head, ...rest] = name.split('.');
    const nested = grouped.get(head) ?? [];
    if (rest.length > 0) {
      nested.push(rest.join('.'));
    }
    grouped.set(head, nested);
  }
  return grouped;
}
