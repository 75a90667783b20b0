import { z } from "zod";

const ZName = z.string().trim().min(1).max(100);

export const ZBrandSchema = z.object({
  name: ZName,
  is_active: z.boolean().optional(),
});

export const ZCategorySchema = ZBrandSchema;

export const ZProductSchema = z.object({
  name: z.string().trim().min(1).max(200),
  sku: z.string().trim().min(1).max(50),
  price: z.number().positive(),
  is_active: z.boolean().optional(),
  brand_id: z.number().int().positive(),
  category_id: z.number().int().positive(),
});

export const ZWarehouseSchema = z.object({
  name: ZName,
  city: ZName,
});

export const ZStockSchema = z
  .object({
    product_id: z.number().int().positive(),
    warehouse_id: z.number().int().positive(),
    qty: z.number().int().nonnegative(),
    reserved: z.number().int().nonnegative().default(0),
  })
  .refine((stock) => stock.reserved <= stock.qty, {
    message: "reserved cannot exceed qty",
    path: ["reserved"],
  });

export const ZCustomerSchema = z.object({
  full_name: z.string().trim().min(1).max(200),
  email: z.string().trim().toLowerCase().email(),
});

export const ZIdParam = z.coerce.number().int().positive();

export type BrandRequest = z.infer<typeof ZBrandSchema>;
export type CategoryRequest = z.infer<typeof ZCategorySchema>;
export type ProductRequest = z.infer<typeof ZProductSchema>;
export type WarehouseRequest = z.infer<typeof ZWarehouseSchema>;
export type StockRequest = z.infer<typeof ZStockSchema>;
export type CustomerRequest = z.infer<typeof ZCustomerSchema>;
