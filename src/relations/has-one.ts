import type { Model } from '../model';
import { HasOneOrMany } from './has-one-or-many';

/**
 * One-to-one: at most one related row carries the owner's key.
 */
export class HasOne<R extends Model> extends HasOneOrMany<R> {
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
    return this.matchOneOrMany(models, results, name, 'one');
  }
}
