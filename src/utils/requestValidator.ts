import type { Request, RequestHandler, Response } from "express";
import type { z } from "zod";
import { asyncHandler } from "../middleware/asyncHandler";
import { ValidationError } from "./errors";
import { ZIdParam } from "../validations/catalog";

export function parseWith<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  message = "Validation failed"
): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(
      message,
      result.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      }))
    );
  }
  return result.data;
}

export function parseId(req: Request): number {
  return parseWith(ZIdParam, req.params.id, "Invalid id");
}

/**
 * Validates the JSON body with `schema` and hands the parsed value to the
 * handler; an invalid body becomes a 400 before the handler runs.
 */
export const requestValidator =
  <T extends z.ZodTypeAny>(
    schema: T,
    handler: (body: z.infer<T>, req: Request, res: Response) => Promise<void>
  ): RequestHandler =>
  asyncHandler(async (req, res) => {
    await handler(parseWith(schema, req.body), req, res);
  });
