import type { Model } from '../model';
import type { QueryBuilder } from '../query-builder';
import type { Attributes, Key, QueryDescriptor, WhereClause } from '../types';
import { Relation, buildDictionary, dictionaryKey, uniqueKeys } from './relation';

const PIVOT_PREFIX = 'pivot_';

/**
 * Many-to-many through a join table holding two foreign keys: `foreignKey`
 * points at the owner, `otherKey` at the related model.
 *
 * Related rows are selected together with both join table keys, which end up
 * in each related model's `pivot` record.
 */
export class BelongsToMany<R extends Model> extends Relation<R> {
  /** Related columns chosen with select(); the pivot keys are always added */
  private selected: string[] = [];

  constructor(
    query: QueryBuilder<R>,
    parent: Model,
    protected table: string,
    protected foreignKey: string,
    protected otherKey: string,
  ) {
    super(query, parent);
    this.addConstraints();
  }

  addConstraints(): void {
    this.query.join(
      this.table,
      this.related.getQualifiedKeyName(),
      '=',
      `${this.table}.${this.otherKey}`,
    );
    this.constrain(`${this.table}.${this.foreignKey}`, this.parent.getKey());
  }

  addEagerConstraints(models: Model[]): void {
    this.constrainEagerly(
      `${this.table}.${this.foreignKey}`,
      uniqueKeys(models.map((model) => model.getKey())),
    );
  }

  getResults(): R[] {
    return this.get();
  }

  getEager(): R[] {
    return this.get();
  }

  initRelation(models: Model[], name: string): Model[] {
    for (const model of models) {
      model.setRelation(name, []);
    }
    return models;
  }

  match(models: Model[], results: R[], name: string): Model[] {
    const dictionary = buildDictionary(
      results,
      (result) => result.pivot?.[this.foreignKey] ?? null,
    );

    for (const model of models) {
      const key = model.getKey();
      const group = key === null ? undefined : dictionary.get(dictionaryKey(key));
      if (group) {
        model.setRelation(name, group);
      }
    }
    return models;
  }

  select(...columns: string[]): this {
    this.selected = columns.filter((column) => column !== '*');
    return this;
  }

  get(columns: string[] = ['*']): R[] {
    this.query.select(...this.getSelectColumns(columns));
    const models = this.query.get();
    for (const model of models) {
      this.hydratePivot(model);
    }
    return models;
  }

  first(columns: string[] = ['*']): R | null {
    this.query.select(...this.getSelectColumns(columns));
    const model = this.query.first();
    if (model) this.hydratePivot(model);
    return model;
  }

  find(id: Key, columns: string[] = ['*']): R | null {
    this.query.select(...this.getSelectColumns(columns));
    const model = this.query.find(id);
    if (model) this.hydratePivot(model);
    return model;
  }

  getTable(): string {
    return this.table;
  }

  getForeignKey(): string {
    return this.foreignKey;
  }

  getOtherKey(): string {
    return this.otherKey;
  }

  /**
   * Insert join rows linking the owner to each id.
   *
   * @param extra - Additional join table columns written on every row
   * @returns Number of inserted rows
   */
  attach(ids: Key | Key[], extra: Attributes = {}): number {
    const connection = this.query.getConnection();
    const grammar = connection.getQueryGrammar();
    let inserted = 0;

    for (const id of Array.isArray(ids) ? ids : [ids]) {
      const row: Attributes = {
        ...extra,
        [this.foreignKey]: this.parent.getKey(),
        [this.otherKey]: id,
      };
      inserted += connection.run(grammar.compileInsert(this.table, row)).changes;
    }
    return inserted;
  }

  /**
   * Delete join rows of the owner, only those pointing at `ids` when given.
   *
   * @returns Number of deleted rows
   */
  detach(ids?: Key | Key[]): number {
    const connection = this.query.getConnection();
    const wheres: WhereClause[] = [
      { type: 'basic', column: this.foreignKey, operator: '=', value: this.parent.getKey() },
    ];
    if (ids !== undefined) {
      wheres.push({ type: 'in', column: this.otherKey, values: Array.isArray(ids) ? ids : [ids] });
    }

    const query: QueryDescriptor = {
      table: this.table,
      columns: [],
      wheres,
      joins: [],
      orders: [],
      eagerLoad: [],
    };
    return connection.run(connection.getQueryGrammar().compileDelete(query)).changes;
  }

  private getSelectColumns(columns: string[]): string[] {
    const relatedTable = this.related.getTable();
    const requested = columns.length === 0 || columns.includes('*') ? this.selected : columns;
    const selected =
      requested.length === 0
        ? [`${relatedTable}.*`]
        : requested.map((column) => (column.includes('.') ? column : `${relatedTable}.${column}`));

    return [
      ...selected,
      `${this.table}.${this.foreignKey} as ${PIVOT_PREFIX}${this.foreignKey}`,
      `${this.table}.${this.otherKey} as ${PIVOT_PREFIX}${this.otherKey}`,
    ];
  }

  /**
   * Move the pivot_* attributes of a related model into its pivot record.
   */
  private hydratePivot(model: R): void {
    const pivot: Attributes = {};
    for (const [key, value] of Object.entries(model.getAttributes())) {
      if (key.startsWith(PIVOT_PREFIX)) {
        pivot[key.slice(PIVOT_PREFIX.length)] = value;
        model.remove(key);
      }
    }
    model.pivot = pivot;
  }
}
