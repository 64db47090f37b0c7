import { Entity, Relationship } from '../decorators';
import { UnknownRelationError } from '../errors';
import type { Model } from '../model';
import { Comment, Post, Profile, Role, TestModel, User, closeTestDatabase, createTestDatabase } from '../test-utils';
import type { TestDatabase } from '../test-utils';
import { BelongsTo } from './belongs-to';
import type { HasMany } from './has-many';

class Ghost extends TestModel {}

@Entity('post')
class HauntedPost extends Post {
  @Relationship()
  ghosts(): HasMany<Ghost> {
    return this.hasMany(Ghost, 'post_id');
  }

  @Relationship()
  broken(): number {
    return 42;
  }
}

function names(value: ReturnType<Model['getRelation']>): string[] {
  const models: Model[] = Array.isArray(value) ? value : value ? [value] : [];
  return models.map((model) => String(model.get('name') ?? model.get('title'))).sort();
}

describe('relations', () => {
  let db: TestDatabase;
  let alice: User;
  let bob: User;
  let carol: User;

  beforeEach(() => {
    db = createTestDatabase();

    alice = User.create({ name: 'alice', email: 'alice@example.test' });
    bob = User.create({ name: 'bob', email: 'bob@example.test' });
    carol = User.create({ name: 'carol', email: 'carol@example.test' });

    const a1 = alice.posts().create({ title: 'a1' });
    alice.posts().create({ title: 'a2' });
    const b1 = bob.posts().create({ title: 'b1' });
    a1.comments().create({ body: 'first' });
    b1.comments().create({ body: 'second' });

    alice.profile().create({ bio: 'hello' });

    Role.create({ name: 'admin' });
    Role.create({ name: 'editor' });
    alice.roles().attach([1, 2]);
    bob.roles().attach(2);
  });

  afterEach(() => {
    closeTestDatabase(db);
  });

  describe('HasMany', () => {
    it('constrains the related query to the owner key only', () => {
      expect(alice.posts().toDescriptor().wheres).toEqual([
        { type: 'basic', column: 'user_id', operator: '=', value: 1 },
      ]);
      expect(alice.posts().getForeignKey()).toBe('user_id');
    });

    it('returns every related model', () => {
      expect(names(alice.posts().getResults())).toEqual(['a1', 'a2']);
      expect(carol.posts().getResults()).toEqual([]);
      expect(alice.posts().count()).toBe(2);
    });

    it('exposes its query, owner and related model', () => {
      const relation = alice.posts();

      expect(relation.getParent()).toBe(alice);
      expect(relation.getRelated()).toBeInstanceOf(Post);
      expect(relation.getQuery().getModel()).toBe(relation.getRelated());
    });

    it('delegates further constraints', () => {
      expect(alice.posts().where('title', 'a2').first()?.title).toBe('a2');
      expect(alice.posts().find(3)).toBeNull();
    });

    it('saves a model against the owner', () => {
      const post = bob.posts().save(new Post({ title: 'b2' }));

      expect(post.userId).toBe(2);
      expect(post.exists).toBe(true);
      expect(names(bob.posts().get())).toEqual(['b1', 'b2']);
    });
  });

  describe('HasOne', () => {
    it('returns the related model or null', () => {
      expect(alice.profile().getResults()?.bio).toBe('hello');
      expect(bob.profile().getResults()).toBeNull();
    });
  });

  describe('BelongsTo', () => {
    it('infers the foreign key from the relation name', () => {
      const post = Post.find(3);
      const relation = post?.user();

      expect(relation?.getForeignKey()).toBe('user_id');
      expect(relation?.toDescriptor().wheres).toEqual([
        { type: 'basic', column: 'user.id', operator: '=', value: 2 },
      ]);
      expect(relation?.getResults()?.name).toBe('bob');
    });

    it('needs a foreign key outside a relation method', () => {
      expect(() => new Post().belongsTo(User)).toThrow(
        'Post.belongsTo() needs a foreign key when it is not called from a @Relationship() method.',
      );
      expect(new Post().belongsTo(User, 'user_id').getForeignKey()).toBe('user_id');
    });

    it('associates and dissociates the owner', () => {
      const post = new Post({ title: 'draft' });

      post.user().associate(carol);
      expect(post.get('user_id')).toBe(3);

      post.user().dissociate();
      expect(post.get('user_id')).toBeNull();
    });
  });

  describe('BelongsToMany', () => {
    it('joins through the pivot table', () => {
      const descriptor = alice.roles().toDescriptor();

      expect(descriptor.table).toBe('roles');
      expect(descriptor.joins).toEqual([
        { table: 'role_user', first: 'roles.id', operator: '=', second: 'role_user.role_id' },
      ]);
      expect(descriptor.wheres).toEqual([
        { type: 'basic', column: 'role_user.user_id', operator: '=', value: 1 },
      ]);
    });

    it('hydrates the pivot keys', () => {
      const [admin, editor] = alice.roles().orderBy('roles.name').get();

      expect(admin.getAttributes()).toEqual({ id: 1, name: 'admin' });
      expect(admin.pivot).toEqual({ user_id: 1, role_id: 1 });
      expect(editor.pivot).toEqual({ user_id: 1, role_id: 2 });
    });

    it('resolves the inverse side', () => {
      const editor = Role.find(2);
      const relation = editor?.users();

      expect(relation?.getTable()).toBe('role_user');
      expect(relation?.getForeignKey()).toBe('role_id');
      expect(relation?.getOtherKey()).toBe('user_id');
      expect(names(relation?.getResults() ?? null)).toEqual(['alice', 'bob']);
    });

    it('finds and picks related models', () => {
      expect(alice.roles().find(2)?.pivot).toEqual({ user_id: 1, role_id: 2 });
      expect(bob.roles().find(1)).toBeNull();
      expect(bob.roles().first()?.name).toBe('editor');
    });

    it('keeps the selected columns next to the pivot keys', () => {
      const [admin] = alice.roles().select('name').orderBy('roles.name').get();

      expect(admin.getAttributes()).toEqual({ name: 'admin' });
      expect(admin.pivot).toEqual({ user_id: 1, role_id: 1 });
      expect(alice.roles().select('roles.id').find(2)?.getAttributes()).toEqual({ id: 2 });
      expect(alice.roles().orderBy('roles.name').get(['name']).map((role) => role.getAttributes())).toEqual([
        { name: 'admin' },
        { name: 'editor' },
      ]);
    });

    it('attaches with extra pivot columns', () => {
      expect(carol.roles().attach(1, { level: 'owner' })).toBe(1);
      expect(
        db.connection.select({ sql: 'SELECT * FROM "role_user" WHERE "user_id" = ?', bindings: [3] }),
      ).toEqual([{ user_id: 3, role_id: 1, level: 'owner' }]);
    });

    it('detaches some or all related models', () => {
      expect(alice.roles().detach(1)).toBe(1);
      expect(names(alice.roles().get())).toEqual(['editor']);
      expect(alice.roles().detach()).toBe(1);
      expect(alice.roles().get()).toEqual([]);
      expect(names(bob.roles().get())).toEqual(['editor']);
    });
  });

  describe('eager loading', () => {
    it('loads a has-many relation with one query over the owner keys', () => {
      const select = jest.spyOn(db.connection, 'select');
      const users = User.with('posts').orderBy('id').get();

      expect(select.mock.calls.map(([query]) => query)).toEqual([
        { sql: 'SELECT * FROM "user" ORDER BY "id" ASC', bindings: [] },
        { sql: 'SELECT * FROM "post" WHERE "user_id" IN (?, ?, ?)', bindings: [1, 2, 3] },
      ]);
      expect(names(users[0].getRelation('posts'))).toEqual(['a1', 'a2']);
      expect(names(users[1].getRelation('posts'))).toEqual(['b1']);
      expect(users[2].relationLoaded('posts')).toBe(true);
      expect(users[2].getRelation('posts')).toEqual([]);
    });

    it('loads a has-one relation with null for owners without a match', () => {
      const users = User.with('profile').orderBy('id').get();

      expect(users[0].getRelation('profile')).toBeInstanceOf(Profile);
      expect(users[1].getRelation('profile')).toBeNull();
      expect(users[2].getRelation('profile')).toBeNull();
    });

    it('loads a belongs-to relation over the distinct foreign keys', () => {
      Post.create({ title: 'orphan' });
      const select = jest.spyOn(db.connection, 'select');
      const posts = Post.with('user').orderBy('id').get();

      expect(select.mock.calls[1][0]).toEqual({
        sql: 'SELECT * FROM "user" WHERE "user"."id" IN (?, ?)',
        bindings: [1, 2],
      });
      expect(posts.map((post) => names(post.getRelation('user')))).toEqual([
        ['alice'],
        ['alice'],
        ['bob'],
        [],
      ]);
      expect(posts[3].getRelation('user')).toBeNull();
    });

    it('loads a many-to-many relation with pivots', () => {
      const select = jest.spyOn(db.connection, 'select');
      const users = User.with('roles').orderBy('id').get();

      expect(select.mock.calls[1][0]).toEqual({
        sql:
          'SELECT "roles".*, "role_user"."user_id" AS "pivot_user_id", "role_user"."role_id" AS "pivot_role_id" ' +
          'FROM "roles" INNER JOIN "role_user" ON "roles"."id" = "role_user"."role_id" ' +
          'WHERE "role_user"."user_id" IN (?, ?, ?)',
        bindings: [1, 2, 3],
      });
      expect(names(users[0].getRelation('roles'))).toEqual(['admin', 'editor']);
      expect(names(users[1].getRelation('roles'))).toEqual(['editor']);
      expect(users[2].getRelation('roles')).toEqual([]);
    });

    it('loads nested relations', () => {
      const select = jest.spyOn(db.connection, 'select');
      const users = User.with('posts.comments').orderBy('id').get();

      expect(select).toHaveBeenCalledTimes(3);
      expect(select.mock.calls[2][0]).toEqual({
        sql: 'SELECT * FROM "comment" WHERE "post_id" IN (?, ?, ?)',
        bindings: [1, 2, 3],
      });

      const posts = users[0].getRelation('posts');
      const a1 = Array.isArray(posts) ? posts.find((post) => post.get('title') === 'a1') : undefined;
      expect(a1?.getRelation('comments')).toEqual([expect.any(Comment)]);
      expect(Array.isArray(posts) ? posts.map((post) => post.getRelation('comments')) : []).toContainEqual([]);
    });

    it('loads several relations at once', () => {
      const [first] = User.with('posts', 'profile').orderBy('id').limit(1).get();

      expect(first.relationLoaded('posts')).toBe(true);
      expect(first.relationLoaded('profile')).toBe(true);
    });

    it('loads relations registered under another name', () => {
      const [post] = Post.with('writer').orderBy('id').get();

      expect(names(post.getRelation('writer'))).toEqual(['alice']);
      expect(post.getRelationship('writer')).toBeInstanceOf(BelongsTo);
      expect(() => post.getRelationship('author')).toThrow(UnknownRelationError);
    });

    it('loads onto an existing model', () => {
      alice.load('posts');

      expect(names(alice.getRelation('posts'))).toEqual(['a1', 'a2']);
    });

    it('issues no relation query for an empty batch', () => {
      const select = jest.spyOn(db.connection, 'select');

      expect(User.with('posts').where('name', 'nobody').get()).toEqual([]);
      expect(select).toHaveBeenCalledTimes(1);
    });

    it('rejects unknown relation names', () => {
      expect(() => User.with('nope').get()).toThrow(
        'User.nope is not a registered relation. Decorate the method with @Relationship().',
      );
    });

    it('rejects relation methods that return something else', () => {
      expect(() => HauntedPost.with('broken').get()).toThrow(
        'HauntedPost.broken did not return a relation.',
      );
    });

    it('aborts when a relation query fails', () => {
      expect(() => HauntedPost.with('ghosts').get()).toThrow('no such table: ghost');
    });
  });
});
