/**
 * Naming conventions that derive table, foreign key and join table names
 * from type names.
 */

/**
 * Convert a CamelCase string to snake case.
 * No separator is inserted before a leading capital:
 * `UserProfile` becomes `user_profile`, not `_user_profile`.
 */
export function snakeCase(value: string): string {
  return value.replace(
    /[A-Z]/g,
    (match, offset: number) => `${offset === 0 ? '' : '_'}${match.toLowerCase()}`,
  );
}

/**
 * Convert a snake case string to CamelCase (`user_name` -> `UserName`).
 */
export function camelCase(value: string): string {
  return value
    .replace(/_/g, ' ')
    .replace(/(^|\s)([a-z])/g, (_match, space: string, letter: string) => space + letter.toUpperCase())
    .replace(/\s/g, '');
}

/**
 * Get the trailing simple name of a type, an instance or a qualified name.
 *
 * @example
 * ```typescript
 * baseName(User)               // "User"
 * baseName(new User())         // "User"
 * baseName('App.Models.User')  // "User"
 * ```
 */
export function baseName(subject: string | Function | object): string {
  if (typeof subject === 'function') {
    return subject.name;
  }
  if (typeof subject === 'object') {
    return subject.constructor.name;
  }
  const segments = subject.split(/[./\\]/);
  return segments[segments.length - 1] ?? subject;
}

/**
 * Default foreign key column for a type: `BlogPost` -> `blog_post_id`.
 */
export function foreignKey(subject: string | Function | object): string {
  return `${snakeCase(baseName(subject))}_id`;
}

/**
 * Join table for a many-to-many relation: both snake cased base names,
 * sorted alphabetically and joined with an underscore.
 */
export function joiningTable(
  first: string | Function | object,
  second: string | Function | object,
): string {
  const models = [snakeCase(baseName(first)), snakeCase(baseName(second))];
  models.sort();
  return models.join('_').toLowerCase();
}
