import type { Model } from '../model';
import type { QueryBuilder } from '../query-builder';
import type { Attributes } from '../types';
import { Relation, buildDictionary, dictionaryKey, uniqueKeys } from './relation';

/**
 * Shared behaviour of HasOne and HasMany: the related table holds a
 * foreign key pointing at the owner's primary key.
 */
export abstract class HasOneOrMany<R extends Model> extends Relation<R> {
  constructor(
    query: QueryBuilder<R>,
    parent: Model,
    protected foreignKey: string,
  ) {
    super(query, parent);
    this.addConstraints();
  }

  addConstraints(): void {
    this.constrain(this.foreignKey, this.parent.getKey());
  }

  addEagerConstraints(models: Model[]): void {
    this.constrainEagerly(this.foreignKey, uniqueKeys(models.map((model) => model.getKey())));
  }

  getForeignKey(): string {
    return this.foreignKey;
  }

  /**
   * Point a related model at the owner and save it.
   */
  save(model: R): R {
    model.set(this.foreignKey, this.parent.getKey());
    model.save();
    return model;
  }

  /**
   * Create a related model pointing at the owner.
   */
  create(attributes: Attributes): R {
    const model = this.related.newInstance(attributes);
    return this.save(model);
  }

  protected matchOneOrMany(
    models: Model[],
    results: R[],
    name: string,
    type: 'one' | 'many',
  ): Model[] {
    const dictionary = buildDictionary(results, (result) => result.get(this.foreignKey));

    for (const model of models) {
      const key = model.getKey();
      const group = key === null ? undefined : dictionary.get(dictionaryKey(key));
      if (group) {
        model.setRelation(name, type === 'one' ? group[0] : group);
      }
    }
    return models;
  }
}
