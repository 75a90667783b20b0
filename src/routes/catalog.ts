import type { Request, Response, Router } from "express";
import type { Kysely } from "kysely";
import { z } from "zod";
import type { DB } from "../types/db";
import { createResourceRouter } from "./resource";
import { listWhere } from "../services/related";
import {
  availableStockIds,
  createBrand,
  createCategory,
  createCustomer,
  createProduct,
  createStock,
  createWarehouse,
  deleteBrand,
  deleteCategory,
  deleteCustomer,
  deleteProduct,
  deleteStock,
  deleteWarehouse,
  lowStockProductIds,
} from "../services/catalog";
import { asyncHandler } from "../middleware/asyncHandler";
import { parseId, parseWith } from "../utils/requestValidator";
import {
  ZBrandSchema,
  ZCategorySchema,
  ZCustomerSchema,
  ZProductSchema,
  ZStockSchema,
  ZWarehouseSchema,
} from "../validations/catalog";

const ZLowStockQuery = z.object({
  threshold: z.coerce.number().int().nonnegative().default(10),
});

const idIn = (ids: readonly number[]) => `id__in=${ids.join("|")}`;

export const brandRouter = (db: Kysely<DB>): Router =>
  createResourceRouter(db, {
    kind: "brand",
    create: {
      schema: ZBrandSchema,
      handler: async (body, db) => (await createBrand(body, db)).id,
    },
    remove: deleteBrand,
    extend: (router, db) => {
      router.get(
        "/:id/products",
        asyncHandler(async (req: Request, res: Response) => {
          const id = parseId(req);
          res.status(200).json(await listWhere("product", `brand=${id},is_active=true`, db));
        })
      );
    },
  });

export const categoryRouter = (db: Kysely<DB>): Router =>
  createResourceRouter(db, {
    kind: "category",
    create: {
      schema: ZCategorySchema,
      handler: async (body, db) => (await createCategory(body, db)).id,
    },
    remove: deleteCategory,
    extend: (router, db) => {
      router.get(
        "/:id/products",
        asyncHandler(async (req: Request, res: Response) => {
          const id = parseId(req);
          res.status(200).json(await listWhere("product", `category=${id},is_active=true`, db));
        })
      );
    },
  });

export const productRouter = (db: Kysely<DB>): Router =>
  createResourceRouter(db, {
    kind: "product",
    create: {
      schema: ZProductSchema,
      handler: async (body, db) => (await createProduct(body, db)).id,
    },
    remove: deleteProduct,
    extend: (router, db) => {
      router.get(
        "/low_stock",
        asyncHandler(async (req: Request, res: Response) => {
          const { threshold } = parseWith(ZLowStockQuery, req.query, "Invalid threshold");
          const ids = await lowStockProductIds(threshold, db);
          res.status(200).json(ids.length > 0 ? await listWhere("product", idIn(ids), db) : []);
        })
      );
      router.get(
        "/:id/stock",
        asyncHandler(async (req: Request, res: Response) => {
          res.status(200).json(await listWhere("stock", `product=${parseId(req)}`, db));
        })
      );
    },
  });

export const warehouseRouter = (db: Kysely<DB>): Router =>
  createResourceRouter(db, {
    kind: "warehouse",
    create: {
      schema: ZWarehouseSchema,
      handler: async (body, db) => (await createWarehouse(body, db)).id,
    },
    remove: deleteWarehouse,
    extend: (router, db) => {
      router.get(
        "/:id/stock",
        asyncHandler(async (req: Request, res: Response) => {
          res.status(200).json(await listWhere("stock", `warehouse=${parseId(req)}`, db));
        })
      );
    },
  });

export const stockRouter = (db: Kysely<DB>): Router =>
  createResourceRouter(db, {
    kind: "stock",
    create: {
      schema: ZStockSchema,
      handler: async (body, db) => (await createStock(body, db)).id,
    },
    remove: deleteStock,
    extend: (router, db) => {
      router.get(
        "/available",
        asyncHandler(async (_req: Request, res: Response) => {
          const ids = await availableStockIds(db);
          res.status(200).json(ids.length > 0 ? await listWhere("stock", idIn(ids), db) : []);
        })
      );
    },
  });

export const customerRouter = (db: Kysely<DB>): Router =>
  createResourceRouter(db, {
    kind: "customer",
    create: {
      schema: ZCustomerSchema,
      handler: async (body, db) => (await createCustomer(body, db)).id,
    },
    remove: deleteCustomer,
    extend: (router, db) => {
      router.get(
        "/:id/orders",
        asyncHandler(async (req: Request, res: Response) => {
          res.status(200).json(await listWhere("order", `customer=${parseId(req)}`, db));
        })
      );
    },
  });
