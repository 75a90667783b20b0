import type { Request, Response, Router } from "express";
import type { Kysely } from "kysely";
import type { DB } from "../types/db";
import { createResourceRouter } from "./resource";
import { findEntity } from "../services/related";
import { addOrderItem, createOrder, deleteOrder, deleteOrderItem } from "../services/order";
import { cancelOrder, confirmOrder } from "../services/reservations";
import { confirmPayment, createPayment, failPayment } from "../services/payments";
import { deletePayment } from "../services/catalog";
import { asyncHandler } from "../middleware/asyncHandler";
import { parseId } from "../utils/requestValidator";
import { ZAddOrderItemSchema, ZOrderSchema, ZPaymentSchema } from "../validations/order";

export const orderRouter = (db: Kysely<DB>): Router =>
  createResourceRouter(db, {
    kind: "order",
    create: {
      schema: ZOrderSchema,
      handler: (body, db) => createOrder(body, db),
    },
    remove: deleteOrder,
    extend: (router, db) => {
      router.post(
        "/:id/confirm",
        asyncHandler(async (req: Request, res: Response) => {
          const order = await confirmOrder(parseId(req), db);
          res.status(200).json(await findEntity("order", order.id, db));
        })
      );
      router.post(
        "/:id/cancel",
        asyncHandler(async (req: Request, res: Response) => {
          const order = await cancelOrder(parseId(req), db);
          res.status(200).json(await findEntity("order", order.id, db));
        })
      );
    },
  });

export const orderItemRouter = (db: Kysely<DB>): Router =>
  createResourceRouter(db, {
    kind: "orderitem",
    create: {
      schema: ZAddOrderItemSchema,
      handler: async (body, db) => (await addOrderItem(body, db)).id,
    },
    remove: deleteOrderItem,
  });

export const paymentRouter = (db: Kysely<DB>): Router =>
  createResourceRouter(db, {
    kind: "payment",
    create: {
      schema: ZPaymentSchema,
      handler: async (body, db) => (await createPayment(body, db)).id,
    },
    remove: deletePayment,
    extend: (router, db) => {
      router.post(
        "/:id/confirm",
        asyncHandler(async (req: Request, res: Response) => {
          const payment = await confirmPayment(parseId(req), db);
          res.status(200).json(await findEntity("payment", payment.id, db));
        })
      );
      router.post(
        "/:id/fail",
        asyncHandler(async (req: Request, res: Response) => {
          const payment = await failPayment(parseId(req), db);
          res.status(200).json(await findEntity("payment", payment.id, db));
        })
      );
    },
  });
