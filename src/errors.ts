/**
 * Errors raised by the model layer.
 *
 * Driver errors (constraint violations, a closed database) are not wrapped:
 * they reach the caller exactly as better-sqlite3 throws them.
 */

export class OrmError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnknownConnectionError extends OrmError {
  constructor(readonly connection: string) {
    super(`Connection "${connection}" is not registered.`);
  }
}

export class NoDefaultConnectionError extends OrmError {
  constructor() {
    super(
      'No default connection. Register a connection first, e.g. ' +
        'registry.register("main", connection).',
    );
  }
}

export class UnknownRelationError extends OrmError {
  constructor(
    readonly entity: string,
    readonly relation: string,
    reason = 'is not a registered relation',
  ) {
    super(`${entity}.${relation} ${reason}. Decorate the method with @Relationship().`);
  }
}

export class InvalidRelatedTypeError extends OrmError {
  constructor(related: unknown, options?: ErrorOptions) {
    super(`${describe(related)} is not a constructible model type.`, options);
  }
}

export class EntityNotBoundError extends OrmError {
  constructor(readonly entity: string) {
    super(
      `Entity ${entity} is not bound to a connection registry. ` +
        'Initialize a DataSource listing it, or call Model.useRegistry(registry).',
    );
  }
}

function describe(value: unknown): string {
  if (typeof value === 'function') {
    return value.name ? `Type ${value.name}` : 'Anonymous function';
  }
  return `Value ${String(value)}`;
}
