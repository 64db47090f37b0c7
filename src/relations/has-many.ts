import type { Model } from '../model';
import { HasOneOrMany } from './has-one-or-many';

/**
 * One-to-many: any number of related rows carry the owner's key.
 */
export class HasMany<R extends Model> extends HasOneOrMany<R> {
  getResults(): R[] {
    return this.query.get();
  }

  initRelation(models: Model[], name: string): Model[] {
    for (const model of models) {
      model.setRelation(name, []);
    }
    return models;
  }

  match(models: Model[], results: R[], name: string): Model[] {
    return this.matchOneOrMany(models, results, name, 'many');
  }
}
