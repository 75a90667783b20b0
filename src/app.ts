import express from "express";
import type { Kysely } from "kysely";
import type { DB } from "./types/db";
import { getSQLClient } from "./db";
import {
  brandRouter,
  categoryRouter,
  customerRouter,
  productRouter,
  stockRouter,
  warehouseRouter,
} from "./routes/catalog";
import { orderItemRouter, orderRouter, paymentRouter } from "./routes/order";
import { errorHandler } from "./middleware/errorHandler";
import { requestLogger } from "./utils/requestLogger";
import { NotFoundError } from "./utils/errors";

export function createApp(db: Kysely<DB> = getSQLClient()) {
  const app = express();
  app.use(express.json());
  app.use(requestLogger);

  app.use("/api/brands", brandRouter(db));
  app.use("/api/categories", categoryRouter(db));
  app.use("/api/products", productRouter(db));
  app.use("/api/warehouses", warehouseRouter(db));
  app.use("/api/stocks", stockRouter(db));
  app.use("/api/customers", customerRouter(db));
  app.use("/api/orders", orderRouter(db));
  app.use("/api/order-items", orderItemRouter(db));
  app.use("/api/payments", paymentRouter(db));

  app.use((req, _res, next) => {
    next(new NotFoundError(`No route for ${req.method} ${req.path}`, "route"));
  });
  app.use(errorHandler);

  return app;
}
