import type { AttributeValue, Attributes } from './types';

/**
 * Runtime check for a single attribute value.
 * Covers what better-sqlite3 returns plus the in-memory Date and boolean.
 */
export function isAttributeValue(value: unknown): value is AttributeValue {
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'bigint':
    case 'boolean':
      return true;
    case 'object':
      return value === null || value instanceof Date || value instanceof Uint8Array;
    default:
      return false;
  }
}

/**
 * Type predicate for a raw database row.
 * Ensures safe deserialization at the driver boundary.
 * @example
 *   if (isRow(raw)) { // TS proves raw is Attributes }
 */
export function isRow(data: unknown): data is Attributes {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    return false;
  }
  return Object.values(data).every(isAttributeValue);
}

/**
 * Assert data is a row or throw.
 */
export function assertRow(data: unknown, label: string): asserts data is Attributes {
  if (!isRow(data)) {
    throw new Error(`${label}: Invalid row shape from database`);
  }
}
