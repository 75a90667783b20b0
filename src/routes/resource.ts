import express, { type Request, type Response, type Router } from "express";
import type { Kysely } from "kysely";
import type { z } from "zod";
import type { DB } from "../types/db";
import type { EntityKind } from "../query/schema";
import { findEntity, getRelated, listEntities } from "../services/related";
import { asyncHandler } from "../middleware/asyncHandler";
import { parseId, parseWith, requestValidator } from "../utils/requestValidator";
import { ZRelatedQuery, parseRelatedParams } from "../validations/related";

export interface ResourceRouterOptions<T extends z.ZodTypeAny> {
  kind: EntityKind;
  create?: {
    schema: T;
    /** Returns the id of the created row */
    handler: (body: z.infer<T>, db: Kysely<DB>) => Promise<number>;
  };
  remove?: (id: number, db: Kysely<DB>) => Promise<void>;
  /** Collection actions, registered ahead of `/:id` so their paths win */
  extend?: (router: Router, db: Kysely<DB>) => void;
}

/**
 * List, get_related, retrieve, create and delete for one collection.
 */
export function createResourceRouter<T extends z.ZodTypeAny>(
  db: Kysely<DB>,
  options: ResourceRouterOptions<T>
): Router {
  const { kind, create, remove, extend } = options;
  const router = express.Router();

  router.get(
    "/",
    asyncHandler(async (_req: Request, res: Response) => {
      res.status(200).json(await listEntities(kind, db));
    })
  );

  router.get(
    "/get_related",
    asyncHandler(async (req: Request, res: Response) => {
      const query = parseWith(ZRelatedQuery, req.query, "Invalid query parameters");
      res.status(200).json(await getRelated(kind, parseRelatedParams(query), db));
    })
  );

  extend?.(router, db);

  router.get(
    "/:id",
    asyncHandler(async (req: Request, res: Response) => {
      res.status(200).json(await findEntity(kind, parseId(req), db));
    })
  );

  if (create) {
    router.post(
      "/",
      requestValidator(create.schema, async (body, _req, res) => {
        const id = await create.handler(body, db);
        res.status(201).json(await findEntity(kind, id, db));
      })
    );
  }

  if (remove) {
    router.delete(
      "/:id",
      asyncHandler(async (req: Request, res: Response) => {
        await remove(parseId(req), db);
        res.status(204).end();
      })
    );
  }

  return router;
}
