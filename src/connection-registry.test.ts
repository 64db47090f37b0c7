import { ConnectionRegistry } from './connection-registry';
import { NoDefaultConnectionError, UnknownConnectionError } from './errors';
import { SqliteConnection } from './connection';

describe('ConnectionRegistry', () => {
  let a: SqliteConnection;
  let b: SqliteConnection;

  beforeEach(() => {
    a = new SqliteConnection('a', { filename: ':memory:' });
    b = new SqliteConnection('b', { filename: ':memory:' });
  });

  afterEach(() => {
    a.close();
    b.close();
  });

  it('makes the first registration the default', () => {
    const registry = new ConnectionRegistry();
    registry.register('A', a);
    registry.register('B', b);

    expect(registry.getDefault()).toBe(a);
    expect(registry.getDefaultName()).toBe('A');
    expect(registry.names()).toEqual(['A', 'B']);
  });

  it('switches the default by name', () => {
    const registry = new ConnectionRegistry();
    registry.register('A', a);
    registry.register('B', b);
    registry.setDefaultName('B');

    expect(registry.getDefault()).toBe(b);
  });

  it('forgets every connection on clear()', () => {
    const registry = new ConnectionRegistry();
    registry.register('A', a);
    registry.register('B', b);
    registry.clear();

    expect(() => registry.resolve('A')).toThrow(UnknownConnectionError);
    expect(() => registry.resolve('B')).toThrow(UnknownConnectionError);
    expect(() => registry.getDefault()).toThrow(NoDefaultConnectionError);
    expect(registry.has('A')).toBe(false);
  });

  it('registers a new default after clear()', () => {
    const registry = new ConnectionRegistry();
    registry.register('A', a);
    registry.clear();
    registry.register('B', b);

    expect(registry.getDefaultName()).toBe('B');
  });

  it('fails on unknown names', () => {
    const registry = new ConnectionRegistry();

    expect(() => registry.resolve('nope')).toThrow('Connection "nope" is not registered.');
    expect(() => registry.setDefaultName('nope')).toThrow(UnknownConnectionError);
    expect(() => registry.getDefault()).toThrow(NoDefaultConnectionError);
  });

  it('resolves by name', () => {
    const registry = new ConnectionRegistry();
    registry.register('A', a);
    registry.register('B', b);

    expect(registry.resolve('B')).toBe(b);
    expect(registry.all()).toEqual([a, b]);
  });
});
