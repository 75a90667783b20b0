import type { Kysely } from "kysely";
import { getSQLClient } from "../db";
import type { DB, NewOrderItem, OrderItem } from "../types/db";
import type {
  AddOrderItemRequest,
  OrderItemRequest,
  OrderRequest,
} from "../validations/order";
import { orderFSM } from "../domain/fsm";
import {
  ConflictError,
  NotFoundError,
  ValidationError,
  translateDatabaseError,
} from "../utils/errors";
import { orderLogger } from "../utils/logger";

interface ItemProblem {
  error: string;
  productId: number;
  details?: Record<string, number>;
}

/**
 * Checks every requested product exists, appears once, and has enough
 * unreserved stock across all warehouses for the requested quantity.
 */
export async function validateOrderItems(db: Kysely<DB>, items: readonly OrderItemRequest[]) {
  const productIds = items.map((item) => item.product_id);
  const problems: ItemProblem[] = [];

  const seen = new Set<number>();
  for (const productId of productIds) {
    if (seen.has(productId)) {
      problems.push({ error: "Product listed more than once", productId });
    }
    seen.add(productId);
  }

  const products = await db
    .selectFrom("products")
    .select(["id", "name", "price"])
    .where("id", "in", productIds)
    .execute();
  const productsById = new Map(products.map((product) => [product.id, product]));

  const availability = await db
    .selectFrom("stocks")
    .select(["product_id", "qty", "reserved"])
    .where("product_id", "in", productIds)
    .execute();
  const availableById = new Map<number, number>();
  for (const stock of availability) {
    availableById.set(
      stock.product_id,
      (availableById.get(stock.product_id) ?? 0) + stock.qty - stock.reserved
    );
  }

  for (const item of items) {
    if (!productsById.has(item.product_id)) {
      problems.push({ error: "Product not found", productId: item.product_id });
      continue;
    }
    const available = availableById.get(item.product_id) ?? 0;
    if (item.qty > available) {
      problems.push({
        error: "Not enough stock",
        productId: item.product_id,
        details: { requested: item.qty, available },
      });
    }
  }

  return { problems, productsById };
}

/**
 * Creates a PENDING order with its items. Item prices default to the
 * product's price at the time of ordering.
 */
export async function createOrder(
  orderRequest: OrderRequest,
  db: Kysely<DB> = getSQLClient()
): Promise<number> {
  const { customer_id, items } = orderRequest;

  const customer = await db
    .selectFrom("customers")
    .select("id")
    .where("id", "=", customer_id)
    .executeTakeFirst();
  if (!customer) {
    throw new ValidationError(`Customer ${customer_id} does not exist`, {
      customer_id,
    });
  }

  const { problems, productsById } = await validateOrderItems(db, items);
  if (problems.length > 0) {
    throw new ValidationError("Order validation failed", problems);
  }

  try {
    return await db.transaction().execute(async (trx) => {
      const order = await trx
        .insertInto("orders")
        .values({ customer_id, status: orderFSM.initial })
        .returning("id")
        .executeTakeFirstOrThrow();

      const orderItems: NewOrderItem[] = items.map((item) => ({
        order_id: order.id,
        product_id: item.product_id,
        qty: item.qty,
        unit_price: item.unit_price ?? productsById.get(item.product_id)?.price ?? 0,
      }));
      await trx.insertInto("order_items").values(orderItems).execute();

      orderLogger.info(
        { orderId: order.id, items: orderItems.length },
        "Order created"
      );
      return order.id;
    });
  } catch (err) {
    throw translateDatabaseError(err);
  }
}

/**
 * Deletes an order with its items and payment. A CONFIRMED order still holds
 * reserved stock and has to be canceled first.
 */
export async function deleteOrder(
  orderId: number,
  db: Kysely<DB> = getSQLClient()
): Promise<void> {
  const order = await db
    .selectFrom("orders")
    .select(["id", "status"])
    .where("id", "=", orderId)
    .executeTakeFirst();
  if (!order) {
    throw new NotFoundError(`order ${orderId} not found`, "order", orderId);
  }
  if (order.status === "CONFIRMED") {
    throw new ConflictError(
      `order ${orderId} is CONFIRMED and holds reserved stock, cancel it first`,
      "reserved_stock"
    );
  }

  await db.deleteFrom("orders").where("id", "=", orderId).execute();
  orderLogger.info({ orderId }, "Order deleted");
}

async function pendingOrder(db: Kysely<DB>, orderId: number) {
  const order = await db
    .selectFrom("orders")
    .select(["id", "status"])
    .where("id", "=", orderId)
    .executeTakeFirst();
  if (!order) {
    throw new ValidationError(`Order ${orderId} does not exist`, { order_id: orderId });
  }
  if (order.status !== "PENDING") {
    throw new ConflictError(
      `order ${orderId} is ${order.status}, items can only change while PENDING`,
      "order_status"
    );
  }
  return order;
}

export async function addOrderItem(
  request: AddOrderItemRequest,
  db: Kysely<DB> = getSQLClient()
): Promise<OrderItem> {
  await pendingOrder(db, request.order_id);

  const { problems, productsById } = await validateOrderItems(db, [request]);
  if (problems.length > 0) {
    throw new ValidationError("Order item validation failed", problems);
  }

  try {
    return await db
      .insertInto("order_items")
      .values({
        order_id: request.order_id,
        product_id: request.product_id,
        qty: request.qty,
        unit_price: request.unit_price ?? productsById.get(request.product_id)?.price ?? 0,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
  } catch (err) {
    throw translateDatabaseError(err);
  }
}

export async function deleteOrderItem(
  itemId: number,
  db: Kysely<DB> = getSQLClient()
): Promise<void> {
  const item = await db
    .selectFrom("order_items")
    .select(["id", "order_id"])
    .where("id", "=", itemId)
    .executeTakeFirst();
  if (!item) {
    throw new NotFoundError(`orderitem ${itemId} not found`, "orderitem", itemId);
  }
  await pendingOrder(db, item.order_id);
  await db.deleteFrom("order_items").where("id", "=", itemId).execute();
}
