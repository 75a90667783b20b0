import type { Request, Response, NextFunction } from "express";
import { httpLogger } from "./logger";

export const requestLogger = (
  req: Request,
  res: Response,
  next: NextFunction
) => {
  const { method, originalUrl, body } = req;
  const startedAt = Date.now();

  const hasBody =
    ["POST", "PUT", "PATCH"].includes(method.toUpperCase()) &&
    typeof body === "object" &&
    body !== null &&
    Object.keys(body).length > 0;

  res.on("finish", () => {
    httpLogger.info(
      {
        method,
        url: originalUrl,
        status: res.statusCode,
        durationMs: Date.now() - startedAt,
        ...(hasBody ? { body } : {}),
      },
      `${method} ${originalUrl} ${res.statusCode}`
    );
  });

  next();
};
