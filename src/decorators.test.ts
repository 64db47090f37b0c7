import { ConnectionRegistry } from './connection-registry';
import {
  Accessor,
  Column,
  Entity,
  Mutator,
  Relationship,
  bindEntity,
  definitionFor,
  getColumnMetadata,
  getPrimaryKey,
  getTableName,
  registryFor,
} from './decorators';
import { Model } from './model';
import type { AttributeValue } from './types';

class Article extends Model {
  @Column()
  title!: string;

  @Mutator()
  setFullTitle(value: AttributeValue): AttributeValue {
    return value;
  }
}

@Entity('featured_articles', { primaryKey: 'slug' })
class FeaturedArticle extends Article {
  @Column('body_text')
  body!: string;

  @Column()
  pinned!: boolean;

  @Accessor('headline')
  shout(value: AttributeValue): AttributeValue {
    return typeof value === 'string' ? value.toUpperCase() : value;
  }
}

describe('decorators', () => {
  it('records declared columns with their design types', () => {
    expect(getColumnMetadata(FeaturedArticle)).toEqual([
      { property: 'title', column: 'title', type: 'String', isPrimary: false },
      { property: 'body', column: 'body_text', type: 'String', isPrimary: false },
      { property: 'pinned', column: 'pinned', type: 'Boolean', isPrimary: false },
    ]);
  });

  it('keeps subclass declarations out of the base type', () => {
    expect(getColumnMetadata(Article)).toEqual([
      { property: 'title', column: 'title', type: 'String', isPrimary: false },
    ]);
    expect(definitionFor(Article).accessors.has('headline')).toBe(false);
  });

  it('derives table names unless @Entity sets one', () => {
    expect(getTableName(Article)).toBe('article');
    expect(getTableName(FeaturedArticle)).toBe('featured_articles');
  });

  it('applies @Entity options to the subclass only', () => {
    expect(getPrimaryKey(FeaturedArticle)).toBe('slug');
    expect(getPrimaryKey(Article)).toBe('id');
  });

  it('derives hook keys from method names', () => {
    expect([...definitionFor(Article).mutators.keys()]).toEqual(['full_title']);
    expect([...definitionFor(FeaturedArticle).mutators.keys()]).toEqual(['full_title']);
    expect([...definitionFor(FeaturedArticle).accessors.keys()]).toEqual(['headline']);
  });

  it('runs accessors with the model bound', () => {
    const article = new FeaturedArticle({ headline: 'breaking' });

    expect(article.get('headline')).toBe('BREAKING');
    expect(article.getAttributes()).toEqual({ headline: 'breaking' });
  });

  it('finds the registry of the nearest bound ancestor', () => {
    const base = new ConnectionRegistry();
    const featured = new ConnectionRegistry();

    bindEntity(Article, base);
    expect(registryFor(FeaturedArticle)).toBe(base);

    bindEntity(FeaturedArticle, featured);
    expect(registryFor(FeaturedArticle)).toBe(featured);
    expect(registryFor(Article)).toBe(base);

    bindEntity(Article, undefined);
    bindEntity(FeaturedArticle, undefined);
    expect(registryFor(FeaturedArticle)).toBeUndefined();
  });

  it('only decorates methods with @Relationship', () => {
    expect(() => Relationship()(Article.prototype, 'title', { value: 'not a method' })).toThrow(
      '@Relationship can only decorate methods, not title.',
    );
  });
});
