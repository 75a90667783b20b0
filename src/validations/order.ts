import { z } from "zod";

export const ZOrderItemRequest = z.object({
  product_id: z.number().int().positive(),
  qty: z.number().int().positive(),
  /** Defaults to the product's current price */
  unit_price: z.number().positive().optional(),
});

export const ZOrderSchema = z.object({
  customer_id: z.number().int().positive(),
  items: ZOrderItemRequest.array().min(1),
});

export const ZAddOrderItemSchema = ZOrderItemRequest.extend({
  order_id: z.number().int().positive(),
});

export const ZPaymentSchema = z.object({
  order_id: z.number().int().positive(),
  method: z.enum(["CARD", "TRANSFER", "COD"]),
  amount: z.number().positive(),
});

export type OrderRequest = z.infer<typeof ZOrderSchema>;
export type OrderItemRequest = z.infer<typeof ZOrderItemRequest>;
export type AddOrderItemRequest = z.infer<typeof ZAddOrderItemSchema>;
export type PaymentRequest = z.infer<typeof ZPaymentSchema>;
