import { AttributeStore } from './attributes';
import type { AttributeHook } from './attributes';

describe('AttributeStore', () => {
  it('reads back what was written', () => {
    const store = new AttributeStore();
    store.set('name', 'alice');
    store.set('age', 30);

    expect(store.get('name')).toBe('alice');
    expect(store.get('age')).toBe(30);
  });

  it('reads a missing key as null', () => {
    const store = new AttributeStore();
    expect(store.get('missing')).toBeNull();
    expect(store.all()).toEqual({});
  });

  it('stores the mutated value and reads it back unchanged', () => {
    const upper: AttributeHook = (value) => (typeof value === 'string' ? value.toUpperCase() : value);
    const store = new AttributeStore({
      accessor: () => undefined,
      mutator: (key) => (key === 'code' ? upper : undefined),
    });

    store.set('code', 'abc');
    store.set('other', 'abc');

    expect(store.getRaw('code')).toBe('ABC');
    expect(store.get('code')).toBe('ABC');
    expect(store.get('other')).toBe('abc');
  });

  it('passes reads through the accessor', () => {
    const store = new AttributeStore({
      accessor: (key) => (key === 'price' ? (value) => (typeof value === 'number' ? value / 100 : value) : undefined),
      mutator: () => undefined,
    });

    store.setRaw('price', 1250);

    expect(store.get('price')).toBe(12.5);
    expect(store.getRaw('price')).toBe(1250);
  });

  it('treats null values as absent for has()', () => {
    const store = new AttributeStore();
    store.set('present', 0);
    store.set('empty', null);

    expect(store.has('present')).toBe(true);
    expect(store.has('empty')).toBe(false);
    expect(store.has('missing')).toBe(false);
    expect(store.keys()).toEqual(['present', 'empty']);
  });

  it('removes keys', () => {
    const store = new AttributeStore();
    store.set('a', 1);
    store.set('b', 2);
    store.remove('a');

    expect(store.all()).toEqual({ b: 2 });
  });

  it('returns a copy from all()', () => {
    const store = new AttributeStore();
    store.set('a', 1);
    const copy = store.all();
    copy.a = 2;

    expect(store.get('a')).toBe(1);
  });

  it('replaces every value without running mutators', () => {
    const store = new AttributeStore({
      accessor: () => undefined,
      mutator: () => () => 'mutated',
    });
    store.set('a', 1);
    store.replace({ b: 'raw' });

    expect(store.all()).toEqual({ b: 'raw' });
  });
});
