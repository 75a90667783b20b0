/**
 * Central error handler. Mounted after every router:
 * app.use(errorHandler);
 *
 * Every error body is `{ error, type, details? }`.
 */
import type { ErrorRequestHandler, NextFunction, Request, Response } from "express";
import { ZodError } from "zod";
import {
  InsufficientStockError,
  InvalidPathError,
  InvalidStateTransitionError,
  NotFoundError,
  ReferentialIntegrityError,
  ValidationError,
  isCustomError,
  translateDatabaseError,
} from "../utils/errors";
import { isProduction } from "../config/env";
import { httpLogger } from "../utils/logger";

interface ErrorBody {
  error: string;
  type: string;
  details?: unknown;
}

function detailsOf(err: Error): unknown {
  if (err instanceof ValidationError) return err.details ?? undefined;
  if (err instanceof InvalidPathError) return { path: err.path };
  if (err instanceof NotFoundError) {
    return { resourceType: err.resourceType, resourceId: err.resourceId };
  }
  if (err instanceof InsufficientStockError) {
    return { productId: err.productId, productName: err.productName, shortfall: err.shortfall };
  }
  if (err instanceof InvalidStateTransitionError) return { from: err.from, to: err.to };
  if (err instanceof ReferentialIntegrityError && err.resourceType) {
    return { resourceType: err.resourceType, resourceId: err.resourceId };
  }
  return undefined;
}

export const errorHandler: ErrorRequestHandler = (
  thrown: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  if (thrown instanceof ZodError) {
    httpLogger.warn({ method: req.method, path: req.path, issues: thrown.issues }, "Validation failed");
    res.status(400).json({
      error: "Validation failed",
      type: "ValidationError",
      details: thrown.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    });
    return;
  }

  // constraint violations that slipped past service checks
  const err = translateDatabaseError(thrown);

  if (isCustomError(err)) {
    httpLogger.warn(
      { method: req.method, path: req.path, type: err.name, error: err.message },
      "Request failed"
    );
    const body: ErrorBody = { error: err.message, type: err.name };
    const details = detailsOf(err);
    if (details !== undefined) body.details = details;
    res.status(err.statusCode).json(body);
    return;
  }

  httpLogger.error({ err, method: req.method, path: req.path }, "Unhandled error");
  const body: ErrorBody = {
    error: isProduction ? "Internal server error" : err instanceof Error ? err.message : String(err),
    type: "InternalError",
  };
  res.status(500).json(body);
};

export default errorHandler;
