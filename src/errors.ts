/**
 * Error types raised by the ORM.
 *
 * Every error extends OrmError and carries a code, so callers can tell
 * "the database rejected my statement" apart from "my value does not
 * serialize" without matching on messages.
 */

export type OrmErrorCode =
  | "DECLARATION_ERROR"
  | "SCHEMA_SYNC_ERROR"
  | "EXECUTION_ERROR"
  | "SERIALIZATION_ERROR"
  | "NOT_REGISTERED"
  | "CONFIGURATION_ERROR"
  | "CONNECTION_ERROR";

export class OrmError extends Error {
  readonly code: OrmErrorCode;

  constructor(code: OrmErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "OrmError";
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when an entity or repository declaration is unusable, e.g. two
 * primary keys, an invalid identifier, or a query method without SQL.
 */
export class DeclarationError extends OrmError {
  readonly target?: string;

  constructor(message: string, target?: string, options?: ErrorOptions) {
    super("DECLARATION_ERROR", message, options);
    this.name = "DeclarationError";
    this.target = target;
  }
}

/**
 * Thrown when a DDL statement fails while synchronizing a table.
 */
export class SchemaSyncError extends OrmError {
  readonly table: string;
  readonly statement?: string;

  constructor(
    message: string,
    details: { table: string; statement?: string },
    options?: ErrorOptions
  ) {
    super("SCHEMA_SYNC_ERROR", message, options);
    this.name = "SchemaSyncError";
    this.table = details.table;
    this.statement = details.statement;
  }
}

/**
 * Thrown when a repository statement fails at call time. The driver's
 * message is kept as is and the driver error is the cause.
 */
export class ExecutionError extends OrmError {
  readonly sql: string;

  constructor(message: string, sql: string, options?: ErrorOptions) {
    super("EXECUTION_ERROR", message, options);
    this.name = "ExecutionError";
    this.sql = sql;
  }
}

/**
 * Thrown when a value cannot be converted to or from its stored form.
 */
export class SerializationError extends OrmError {
  readonly kind: string;

  constructor(message: string, kind: string, options?: ErrorOptions) {
    super("SERIALIZATION_ERROR", message, options);
    this.name = "SerializationError";
    this.kind = kind;
  }
}

export class NotRegisteredError extends OrmError {
  readonly repository: string;

  constructor(repository: string) {
    super("NOT_REGISTERED", `Repository ${repository} is not registered.`);
    this.name = "NotRegisteredError";
    this.repository = repository;
  }
}

export class ConfigurationError extends OrmError {
  constructor(message: string, options?: ErrorOptions) {
    super("CONFIGURATION_ERROR", message, options);
    this.name = "ConfigurationError";
  }
}

export class ConnectionError extends OrmError {
  constructor(message: string, options?: ErrorOptions) {
    super("CONNECTION_ERROR", message, options);
    this.name = "ConnectionError";
  }
}

export function isOrmError(error: unknown): error is OrmError {
  return error instanceof OrmError;
}

export function hasErrorCode(
  error: unknown,
  code: OrmErrorCode
): error is OrmError {
  return isOrmError(error) && error.code === code;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
