import type { Kysely } from "kysely";
import { getSQLClient } from "../db";
import type { DB, Payment, PaymentStatus } from "../types/db";
import type { PaymentRequest } from "../validations/order";
import { paymentFSM } from "../domain/fsm";
import { roundMoney } from "../query/projection";
import { publishOrderEvent } from "../queue/producer";
import {
  ConflictError,
  InvalidStateTransitionError,
  NotFoundError,
  ValidationError,
  translateDatabaseError,
} from "../utils/errors";
import { orderLogger } from "../utils/logger";

export async function orderTotal(
  orderId: number,
  db: Kysely<DB> = getSQLClient()
): Promise<number> {
  const items = await db
    .selectFrom("order_items")
    .select(["qty", "unit_price"])
    .where("order_id", "=", orderId)
    .execute();
  return roundMoney(
    items.reduce((sum, item) => sum + roundMoney(item.qty * item.unit_price), 0)
  );
}

/**
 * Records the single payment of an order. The amount has to match the order
 * total to the cent.
 */
export async function createPayment(
  request: PaymentRequest,
  db: Kysely<DB> = getSQLClient()
): Promise<Payment> {
  const order = await db
    .selectFrom("orders")
    .select(["id", "status"])
    .where("id", "=", request.order_id)
    .executeTakeFirst();
  if (!order) {
    throw new ValidationError(`Order ${request.order_id} does not exist`, {
      order_id: request.order_id,
    });
  }

  const total = await orderTotal(order.id, db);
  if (roundMoney(request.amount) !== total) {
    throw new ValidationError(
      `Payment amount (${request.amount}) does not match the order total (${total})`,
      { amount: request.amount, total }
    );
  }

  const existing = await db
    .selectFrom("payments")
    .select("id")
    .where("order_id", "=", order.id)
    .executeTakeFirst();
  if (existing) {
    throw new ConflictError(`Order ${order.id} already has a payment`, "payment_exists");
  }

  try {
    const payment = await db
      .insertInto("payments")
      .values({
        order_id: order.id,
        method: request.method,
        amount: roundMoney(request.amount),
        status: paymentFSM.initial,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
    orderLogger.info({ paymentId: payment.id, orderId: order.id }, "Payment created");
    return payment;
  } catch (err) {
    throw translateDatabaseError(err);
  }
}

async function settlePayment(
  paymentId: number,
  to: Exclude<PaymentStatus, "PENDING">,
  db: Kysely<DB>
): Promise<Payment> {
  const payment = await db
    .selectFrom("payments")
    .selectAll()
    .where("id", "=", paymentId)
    .executeTakeFirst();
  if (!payment) {
    throw new NotFoundError(`payment ${paymentId} not found`, "payment", paymentId);
  }
  paymentFSM.assertTransition(payment.status, to);

  const updated = await db
    .updateTable("payments")
    .set({ status: to })
    .where("id", "=", paymentId)
    .where("status", "=", payment.status)
    .returningAll()
    .executeTakeFirst();
  if (!updated) {
    throw new InvalidStateTransitionError(
      `payment ${paymentId} changed status while moving to ${to}`,
      payment.status,
      to
    );
  }

  orderLogger.info({ paymentId, status: to }, "Payment settled");
  await publishOrderEvent({
    type: to === "CONFIRMED" ? "payment.confirmed" : "payment.failed",
    orderId: updated.order_id,
    paymentId,
  });
  return updated;
}

export function confirmPayment(paymentId: number, db: Kysely<DB> = getSQLClient()) {
  return settlePayment(paymentId, "CONFIRMED", db);
}

export function failPayment(paymentId: number, db: Kysely<DB> = getSQLClient()) {
  return settlePayment(paymentId, "FAILED", db);
}
