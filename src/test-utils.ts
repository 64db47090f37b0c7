/**
 * Fixture models and an in-memory database shared by the tests.
 */

import { ConnectionRegistry } from './connection-registry';
import { SqliteConnection } from './connection';
import { Accessor, Column, Entity, Mutator, Relationship, bindEntity } from './decorators';
import { Model } from './model';
import type { BelongsTo } from './relations/belongs-to';
import type { BelongsToMany } from './relations/belongs-to-many';
import type { HasMany } from './relations/has-many';
import type { HasOne } from './relations/has-one';
import type { AttributeValue } from './types';

/**
 * Base type of every fixture; the registry is bound here once per test.
 */
export abstract class TestModel extends Model {}

export class User extends TestModel {
  @Column()
  name!: string;

  @Column()
  email!: string;

  @Column()
  active!: boolean;

  @Mutator()
  setEmail(value: AttributeValue): AttributeValue {
    return typeof value === 'string' ? value.trim().toLowerCase() : value;
  }

  @Accessor()
  getDisplayName(): AttributeValue {
    return `${String(this.get('name'))} <${String(this.get('email'))}>`;
  }

  @Relationship()
  posts(): HasMany<Post> {
    return this.hasMany(Post);
  }

  @Relationship()
  profile(): HasOne<Profile> {
    return this.hasOne(Profile);
  }

  @Relationship()
  roles(): BelongsToMany<Role> {
    return this.belongsToMany(Role);
  }
}

export class Post extends TestModel {
  @Column()
  title!: string;

  @Column()
  published!: boolean;

  @Column('user_id')
  userId!: number;

  @Relationship()
  user(): BelongsTo<User> {
    return this.belongsTo(User);
  }

  @Relationship('writer')
  author(): BelongsTo<User> {
    return this.belongsTo(User, 'user_id');
  }

  @Relationship()
  comments(): HasMany<Comment> {
    return this.hasMany(Comment);
  }
}

export class Comment extends TestModel {
  @Column()
  body!: string;

  @Relationship()
  post(): BelongsTo<Post> {
    return this.belongsTo(Post);
  }
}

@Entity('profiles', { timestamps: false })
export class Profile extends TestModel {
  @Column()
  bio!: string;

  @Column('born_on')
  bornOn!: Date;

  @Relationship()
  user(): BelongsTo<User> {
    return this.belongsTo(User);
  }
}

@Entity('roles', { timestamps: false })
export class Role extends TestModel {
  @Column()
  name!: string;

  @Relationship()
  users(): BelongsToMany<User> {
    return this.belongsToMany(User);
  }
}

export const SCHEMA = `
  CREATE TABLE "user" (
    "id" INTEGER PRIMARY KEY AUTOINCREMENT,
    "name" TEXT,
    "email" TEXT,
    "active" INTEGER,
    "created_at" TEXT,
    "updated_at" TEXT
  );
  CREATE TABLE "post" (
    "id" INTEGER PRIMARY KEY AUTOINCREMENT,
    "user_id" INTEGER,
    "title" TEXT,
    "published" INTEGER,
    "created_at" TEXT,
    "updated_at" TEXT
  );
  CREATE TABLE "comment" (
    "id" INTEGER PRIMARY KEY AUTOINCREMENT,
    "post_id" INTEGER,
    "body" TEXT,
    "created_at" TEXT,
    "updated_at" TEXT
  );
  CREATE TABLE "profiles" (
    "id" INTEGER PRIMARY KEY AUTOINCREMENT,
    "user_id" INTEGER,
    "bio" TEXT,
    "born_on" TEXT
  );
  CREATE TABLE "roles" (
    "id" INTEGER PRIMARY KEY AUTOINCREMENT,
    "name" TEXT
  );
  CREATE TABLE "role_user" (
    "user_id" INTEGER,
    "role_id" INTEGER,
    "level" TEXT
  );
`;

export interface TestDatabase {
  registry: ConnectionRegistry;
  connection: SqliteConnection;
}

/**
 * Open an in-memory database with the fixture schema and bind the
 * fixture models to it.
 */
export function createTestDatabase(): TestDatabase {
  const connection = new SqliteConnection('main', { filename: ':memory:' });
  connection.exec(SCHEMA);

  const registry = new ConnectionRegistry();
  registry.register('main', connection);
  TestModel.useRegistry(registry);

  return { registry, connection };
}

/**
 * Close the database and unbind the fixture models.
 */
export function closeTestDatabase({ registry, connection }: TestDatabase): void {
  connection.close();
  registry.clear();
  bindEntity(TestModel, undefined);
}
