/**
 * Error classes carrying an HTTP status.
 * Services throw these; the error handler middleware turns them into responses.
 */

export interface CustomError extends Error {
  readonly statusCode: number;
}

/**
 * Request body or params failed validation.
 *
 * @example
 * throw new ValidationError("Duplicate product in order items", { productId: 4 });
 */
export class ValidationError extends Error implements CustomError {
  readonly name = "ValidationError" as const;
  readonly statusCode = 400 as const;
  readonly details: unknown;

  constructor(message: string, details: unknown = null) {
    super(message);
    this.details = details;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * A join, filter or ordering references a relation or field that does not
 * exist on the entity it is resolved against.
 */
export class InvalidPathError extends Error implements CustomError {
  readonly name = "InvalidPathError" as const;
  readonly statusCode = 400 as const;
  readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.path = path;
    Object.setPrototypeOf(this, InvalidPathError.prototype);
  }
}

/**
 * The database rejected a composed related query, usually a filter value the
 * column type cannot take.
 */
export class QueryError extends Error implements CustomError {
  readonly name = "QueryError" as const;
  readonly statusCode = 400 as const;

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, QueryError.prototype);
  }
}

export class NotFoundError extends Error implements CustomError {
  readonly name = "NotFoundError" as const;
  readonly statusCode = 404 as const;
  readonly resourceType: string | null;
  readonly resourceId: string | number | null;

  constructor(
    message: string = "Resource not found",
    resourceType: string | null = null,
    resourceId: string | number | null = null
  ) {
    super(message);
    this.resourceType = resourceType;
    this.resourceId = resourceId;
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/**
 * Unique constraint or similar state conflict.
 */
export class ConflictError extends Error implements CustomError {
  readonly name = "ConflictError" as const;
  readonly statusCode = 409 as const;
  readonly conflictType: string | null;

  constructor(message: string = "Conflict", conflictType: string | null = null) {
    super(message);
    this.conflictType = conflictType;
    Object.setPrototypeOf(this, ConflictError.prototype);
  }
}

/**
 * A delete would orphan rows behind a restrict relationship.
 *
 * @example
 * throw new ReferentialIntegrityError("Brand 3 still has active products", "brand", 3);
 */
export class ReferentialIntegrityError extends Error implements CustomError {
  readonly name = "ReferentialIntegrityError" as const;
  readonly statusCode = 409 as const;
  readonly resourceType: string | null;
  readonly resourceId: number | null;

  constructor(
    message: string,
    resourceType: string | null = null,
    resourceId: number | null = null
  ) {
    super(message);
    this.resourceType = resourceType;
    this.resourceId = resourceId;
    Object.setPrototypeOf(this, ReferentialIntegrityError.prototype);
  }
}

export class InvalidStateTransitionError extends Error implements CustomError {
  readonly name = "InvalidStateTransitionError" as const;
  readonly statusCode = 409 as const;
  readonly from: string;
  readonly to: string;

  constructor(message: string, from: string, to: string) {
    super(message);
    this.from = from;
    this.to = to;
    Object.setPrototypeOf(this, InvalidStateTransitionError.prototype);
  }
}

/**
 * Confirmation could not reserve the full quantity of an order item.
 */
export class InsufficientStockError extends Error implements CustomError {
  readonly name = "InsufficientStockError" as const;
  readonly statusCode = 409 as const;
  readonly productId: number;
  readonly productName: string;
  readonly shortfall: number;

  constructor(productId: number, productName: string, shortfall: number) {
    super(`Insufficient stock for ${productName}. Missing: ${shortfall}`);
    this.productId = productId;
    this.productName = productName;
    this.shortfall = shortfall;
    Object.setPrototypeOf(this, InsufficientStockError.prototype);
  }
}

/**
 * A guarded reservation update matched no row: another transaction took the
 * units between our read and our write.
 */
export class StockConflictError extends Error implements CustomError {
  readonly name = "StockConflictError" as const;
  readonly statusCode = 409 as const;
  readonly stockId: number;

  constructor(stockId: number, requested: number) {
    super(`Stock ${stockId} changed while reserving ${requested} units, retry the confirmation`);
    this.stockId = stockId;
    Object.setPrototypeOf(this, StockConflictError.prototype);
  }
}

export function isCustomError(error: unknown): error is CustomError {
  return (
    error instanceof Error &&
    "statusCode" in error &&
    typeof error.statusCode === "number"
  );
}

/** SQLSTATE codes we translate into client errors */
export const PG_FOREIGN_KEY_VIOLATION = "23503";
export const PG_UNIQUE_VIOLATION = "23505";
export const PG_CHECK_VIOLATION = "23514";
export const PG_SERIALIZATION_FAILURE = "40001";
export const PG_DEADLOCK_DETECTED = "40P01";

export function pgErrorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/**
 * Maps constraint violations and aborted transactions raised by PostgreSQL to
 * the matching error class, leaving anything else untouched.
 */
export function translateDatabaseError(error: unknown): unknown {
  const message = error instanceof Error ? error.message : String(error);
  switch (pgErrorCode(error)) {
    case PG_FOREIGN_KEY_VIOLATION:
      return new ReferentialIntegrityError(message);
    case PG_UNIQUE_VIOLATION:
      return new ConflictError(message, "unique");
    case PG_CHECK_VIOLATION:
      return new ConflictError(message, "check");
    case PG_SERIALIZATION_FAILURE:
    case PG_DEADLOCK_DETECTED:
      return new ConflictError(
        `Transaction aborted by a concurrent update, retry the request: ${message}`,
        "concurrent_update"
      );
    default:
      return error;
  }
}
