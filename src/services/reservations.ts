import { type Kysely, type Transaction, sql } from "kysely";
import { getSQLClient } from "../db";
import type { DB, Order } from "../types/db";
import { orderFSM } from "../domain/fsm";
import { publishOrderEvent } from "../queue/producer";
import {
  InsufficientStockError,
  InvalidStateTransitionError,
  NotFoundError,
  StockConflictError,
} from "../utils/errors";
import { orderLogger } from "../utils/logger";

export interface StockCandidate {
  id: number;
  qty: number;
  reserved: number;
}

export interface Allocation {
  stockId: number;
  qty: number;
}

export interface AllocationPlan {
  allocations: Allocation[];
  /** Units that could not be placed; 0 when the request is covered */
  shortfall: number;
}

/**
 * Greedy allocation over candidates in the order given (largest quantity
 * first when read through `reservableStock`).
 */
export function allocateStock(
  candidates: readonly StockCandidate[],
  requested: number
): AllocationPlan {
  const allocations: Allocation[] = [];
  let remaining = requested;

  for (const stock of candidates) {
    if (remaining <= 0) break;
    const available = stock.qty - stock.reserved;
    if (available <= 0) continue;
    const take = Math.min(available, remaining);
    allocations.push({ stockId: stock.id, qty: take });
    remaining -= take;
  }

  return { allocations, shortfall: Math.max(remaining, 0) };
}

async function findOrder(trx: Transaction<DB>, orderId: number): Promise<Order> {
  const order = await trx
    .selectFrom("orders")
    .selectAll()
    .where("id", "=", orderId)
    .executeTakeFirst();
  if (!order) {
    throw new NotFoundError(`order ${orderId} not found`, "order", orderId);
  }
  return order;
}

function reservableStock(trx: Transaction<DB>, productId: number) {
  return trx
    .selectFrom("stocks")
    .select(["id", "qty", "reserved"])
    .where("product_id", "=", productId)
    .whereRef("qty", ">", "reserved")
    .orderBy("qty", "desc")
    .orderBy("id", "asc")
    .execute();
}

async function reserve(trx: Transaction<DB>, allocation: Allocation) {
  // the guard re-checks availability after UPDATE takes the row lock
  const updated = await trx
    .updateTable("stocks")
    .set((eb) => ({
      reserved: eb("reserved", "+", allocation.qty),
      updated_at: sql<Date>`now()`,
    }))
    .where("id", "=", allocation.stockId)
    .where((eb) => eb(eb("qty", "-", eb.ref("reserved")), ">=", allocation.qty))
    .returning("id")
    .executeTakeFirst();
  if (!updated) {
    throw new StockConflictError(allocation.stockId, allocation.qty);
  }
}

async function release(trx: Transaction<DB>, stockId: number, qty: number) {
  const updated = await trx
    .updateTable("stocks")
    .set((eb) => ({
      reserved: eb("reserved", "-", qty),
      updated_at: sql<Date>`now()`,
    }))
    .where("id", "=", stockId)
    .where("reserved", ">=", qty)
    .returning("id")
    .executeTakeFirst();
  if (!updated) {
    throw new StockConflictError(stockId, qty);
  }
}

async function moveOrder(
  trx: Transaction<DB>,
  order: Order,
  to: Order["status"]
): Promise<Order> {
  const updated = await trx
    .updateTable("orders")
    .set({ status: to })
    .where("id", "=", order.id)
    .where("status", "=", order.status)
    .returningAll()
    .executeTakeFirst();
  if (!updated) {
    throw new InvalidStateTransitionError(
      `order ${order.id} changed status while moving to ${to}`,
      order.status,
      to
    );
  }
  return updated;
}

/**
 * Reserves stock for every item of a PENDING order and marks it CONFIRMED.
 * Everything happens in one transaction: a shortfall on any item undoes the
 * reservations already made for earlier items.
 */
export async function confirmOrder(
  orderId: number,
  db: Kysely<DB> = getSQLClient()
): Promise<Order> {
  const confirmed = await db.transaction().execute(async (trx) => {
    const order = await findOrder(trx, orderId);
    orderFSM.assertTransition(order.status, "CONFIRMED");

    const items = await trx
      .selectFrom("order_items")
      .innerJoin("products", "products.id", "order_items.product_id")
      .select([
        "order_items.id",
        "order_items.product_id",
        "order_items.qty",
        "products.name as product_name",
      ])
      .where("order_items.order_id", "=", orderId)
      // stock row locks are always taken in product order
      .orderBy("order_items.product_id")
      .execute();

    for (const item of items) {
      const candidates = await reservableStock(trx, item.product_id);
      const plan = allocateStock(candidates, item.qty);
      if (plan.shortfall > 0) {
        throw new InsufficientStockError(item.product_id, item.product_name, plan.shortfall);
      }

      for (const allocation of plan.allocations) {
        await reserve(trx, allocation);
      }
      await trx
        .insertInto("stock_reservations")
        .values(
          plan.allocations.map((allocation) => ({
            order_id: orderId,
            stock_id: allocation.stockId,
            qty: allocation.qty,
          }))
        )
        .execute();
    }

    return moveOrder(trx, order, "CONFIRMED");
  });

  orderLogger.info({ orderId }, "Order confirmed");
  await publishOrderEvent({ type: "order.confirmed", orderId });
  return confirmed;
}

/**
 * Cancels a PENDING or CONFIRMED order. A confirmed order gives back exactly
 * the units its confirmation reserved.
 */
export async function cancelOrder(
  orderId: number,
  db: Kysely<DB> = getSQLClient()
): Promise<Order> {
  const canceled = await db.transaction().execute(async (trx) => {
    const order = await findOrder(trx, orderId);
    orderFSM.assertTransition(order.status, "CANCELED");

    if (order.status === "CONFIRMED") {
      const reservations = await trx
        .selectFrom("stock_reservations")
        .select(["id", "stock_id", "qty"])
        .where("order_id", "=", orderId)
        .where("status", "=", "reserved")
        .orderBy("id")
        .execute();

      for (const reservation of reservations) {
        await release(trx, reservation.stock_id, reservation.qty);
      }
      if (reservations.length > 0) {
        await trx
          .updateTable("stock_reservations")
          .set({ status: "released" })
          .where(
            "id",
            "in",
            reservations.map((reservation) => reservation.id)
          )
          .execute();
      }
    }

    return moveOrder(trx, order, "CANCELED");
  });

  orderLogger.info({ orderId }, "Order canceled");
  await publishOrderEvent({ type: "order.canceled", orderId });
  return canceled;
}
