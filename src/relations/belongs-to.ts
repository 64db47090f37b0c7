import type { Model } from '../model';
import type { QueryBuilder } from '../query-builder';
import { Relation, buildDictionary, dictionaryKey, uniqueKeys } from './relation';

/**
 * Inverse of HasOne/HasMany: the owner holds the foreign key, the related
 * row is found by its primary key.
 */
export class BelongsTo<R extends Model> extends Relation<R> {
  constructor(
    query: QueryBuilder<R>,
    parent: Model,
    protected foreignKey: string,
  ) {
    super(query, parent);
    this.addConstraints();
  }

  addConstraints(): void {
    this.constrain(this.related.getQualifiedKeyName(), this.parent.get(this.foreignKey));
  }

  addEagerConstraints(models: Model[]): void {
    this.constrainEagerly(
      this.related.getQualifiedKeyName(),
      uniqueKeys(models.map((model) => model.get(this.foreignKey))),
    );
  }

  getResults(): R | null {
    return this.query.first();
  }

  initRelation(models: Model[], name: string): Model[] {
    for (const model of models) {
      model.setRelation(name, null);
    }
    return models;
  }

  match(models: Model[], results: R[], name: string): Model[] {
    const dictionary = buildDictionary(results, (result) => result.getKey());

    for (const model of models) {
      const key = model.get(this.foreignKey);
      const owner = key === null ? undefined : dictionary.get(dictionaryKey(key));
      if (owner) {
        model.setRelation(name, owner[0]);
      }
    }
    return models;
  }

  getForeignKey(): string {
    return this.foreignKey;
  }

  /**
   * Point the owner at a related model.
   */
  associate(model: R): Model {
    this.parent.set(this.foreignKey, model.getKey());
    return this.parent;
  }

  /**
   * Clear the owner's foreign key.
   */
  dissociate(): Model {
    this.parent.set(this.foreignKey, null);
    return this.parent;
  }
}
