import amqp from "amqplib";
import { env } from "../config/env";
import { eventLogger } from "../utils/logger";

export type OrderEventType =
  | "order.confirmed"
  | "order.canceled"
  | "payment.confirmed"
  | "payment.failed";

export interface OrderEvent {
  type: OrderEventType;
  orderId: number;
  paymentId?: number;
}

async function sendToQueue(url: string, event: OrderEvent) {
  const conn = await amqp.connect(url);
  try {
    const ch = await conn.createChannel();
    await ch.assertQueue(env.ORDER_EVENTS_QUEUE, { durable: true });

    const message = JSON.stringify({ ...event, occurredAt: new Date().toISOString() });
    ch.sendToQueue(env.ORDER_EVENTS_QUEUE, Buffer.from(message), {
      persistent: true,
      contentType: "application/json",
      type: event.type,
    });

    await ch.close();
  } finally {
    await conn.close();
  }
}

/**
 * Publishes an event once the change it describes has committed. Without a
 * broker configured this only logs; a failed publish is logged, not thrown.
 */
export async function publishOrderEvent(event: OrderEvent): Promise<void> {
  const url = env.RABBITMQ_URL;
  if (!url) {
    eventLogger.debug({ event }, "No broker configured, event not published");
    return;
  }

  try {
    await sendToQueue(url, event);
    eventLogger.info({ event }, "Order event published");
  } catch (err) {
    eventLogger.error({ err, event }, "Failed to publish order event");
  }
}
