import type { AttributeValue, Attributes } from './types';

/**
 * Hook intercepting a read (accessor) or a write (mutator) of one attribute.
 */
export type AttributeHook = (value: AttributeValue) => AttributeValue;

/**
 * Looks up the hooks registered for an attribute.
 */
export interface AttributeHooks {
  accessor(key: string): AttributeHook | undefined;
  mutator(key: string): AttributeHook | undefined;
}

/**
 * Schema-less column/value storage for one model instance.
 *
 * Columns are discovered from whatever keys are set; a key that was never
 * set reads as `null`.
 */
export class AttributeStore {
  private values = new Map<string, AttributeValue>();

  constructor(private readonly hooks?: AttributeHooks) {}

  get(key: string): AttributeValue {
    const accessor = this.hooks?.accessor(key);
    const value = this.getRaw(key);
    return accessor ? accessor(value) : value;
  }

  set(key: string, value: AttributeValue): void {
    const mutator = this.hooks?.mutator(key);
    this.values.set(key, mutator ? mutator(value) : value);
  }

  getRaw(key: string): AttributeValue {
    return this.values.get(key) ?? null;
  }

  setRaw(key: string, value: AttributeValue): void {
    this.values.set(key, value);
  }

  /**
   * True when the key is present with a non-null value.
   */
  has(key: string): boolean {
    return this.getRaw(key) !== null;
  }

  remove(key: string): void {
    this.values.delete(key);
  }

  keys(): string[] {
    return [...this.values.keys()];
  }

  all(): Attributes {
    return Object.fromEntries(this.values);
  }

  /**
   * Replace every stored value without running mutators.
   */
  replace(attributes: Attributes): void {
    this.values = new Map(Object.entries(attributes));
  }
}
