/**
 * Error types for factmap operations
 *
 * Invariants:
 * - All errors name the offending key, field or option in the message
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

import type { AttrName, IndexKey } from "./types.js";

/**
 * Base class for all factmap errors
 */
export abstract class FactMapError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown by `fetchOrThrow` when the view has no entry for a key
 */
export class EntityNotFoundError extends FactMapError {
  readonly code = "E_NOT_FOUND";

  constructor(
    public readonly indexKey: IndexKey,
    options?: ErrorOptions
  ) {
    super(`No entity found for key: ${String(indexKey)}`, options);
  }
}

/**
 * An index key that does not resolve to an entity id in raw data
 */
export class UnresolvedIndexKeyError extends FactMapError {
  readonly code = "E_INDEX_KEY";

  constructor(
    public readonly indexKey: IndexKey,
    options?: ErrorOptions
  ) {
    super(`Unable to find entity ID for index key ${String(indexKey)}`, options);
  }
}

/**
 * An aggregate field that does not resolve to a writable raw attribute
 */
export class UnresolvedAttributeError extends FactMapError {
  readonly code = "E_ATTRIBUTE";

  constructor(
    public readonly field: string,
    options?: ErrorOptions
  ) {
    super(`Unable to determine raw attribute key for aggregate attribute ${field}`, options);
  }
}

/**
 * Thrown when a record's primary-key field is not a usable entity id
 */
export class MissingPrimaryKeyError extends FactMapError {
  readonly code = "E_PRIMARY_KEY";

  constructor(
    public readonly primaryKey: AttrName,
    options?: ErrorOptions
  ) {
    super(`Record has no string or number value for primary key "${primaryKey}"`, options);
  }
}

/**
 * Thrown when entity map options have the wrong shape
 */
export class InvalidOptionsError extends FactMapError {
  readonly code = "E_OPTIONS";

  constructor(
    public readonly issues: string[],
    options?: ErrorOptions
  ) {
    super(`Invalid entity map options: ${issues.join("; ")}`, options);
  }
}
