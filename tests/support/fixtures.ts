import type { Kysely } from "kysely";
import type { DB, OrderStatus } from "../../src/types/db";

export async function insertBrand(db: Kysely<DB>, name: string, isActive = true) {
  const { id } = await db
    .insertInto("brands")
    .values({ name, is_active: isActive })
    .returning("id")
    .executeTakeFirstOrThrow();
  return id;
}

export async function insertCategory(db: Kysely<DB>, name: string) {
  const { id } = await db
    .insertInto("categories")
    .values({ name })
    .returning("id")
    .executeTakeFirstOrThrow();
  return id;
}

export async function insertProduct(
  db: Kysely<DB>,
  values: { name: string; sku: string; price: number; brandId: number; categoryId: number; isActive?: boolean }
) {
  const { id } = await db
    .insertInto("products")
    .values({
      name: values.name,
      sku: values.sku,
      price: values.price,
      brand_id: values.brandId,
      category_id: values.categoryId,
      is_active: values.isActive ?? true,
    })
    .returning("id")
    .executeTakeFirstOrThrow();
  return id;
}

export async function insertWarehouse(db: Kysely<DB>, name: string, city: string) {
  const { id } = await db
    .insertInto("warehouses")
    .values({ name, city })
    .returning("id")
    .executeTakeFirstOrThrow();
  return id;
}

export async function insertStock(
  db: Kysely<DB>,
  productId: number,
  warehouseId: number,
  qty: number,
  reserved = 0
) {
  const { id } = await db
    .insertInto("stocks")
    .values({ product_id: productId, warehouse_id: warehouseId, qty, reserved })
    .returning("id")
    .executeTakeFirstOrThrow();
  return id;
}

export async function insertCustomer(db: Kysely<DB>, fullName: string, email: string) {
  const { id } = await db
    .insertInto("customers")
    .values({ full_name: fullName, email })
    .returning("id")
    .executeTakeFirstOrThrow();
  return id;
}

export async function insertOrder(
  db: Kysely<DB>,
  customerId: number,
  items: { productId: number; qty: number; unitPrice: number }[],
  options: { status?: OrderStatus; createdAt?: Date } = {}
) {
  const { id } = await db
    .insertInto("orders")
    .values({
      customer_id: customerId,
      status: options.status ?? "PENDING",
      ...(options.createdAt ? { created_at: options.createdAt.toISOString() } : {}),
    })
    .returning("id")
    .executeTakeFirstOrThrow();

  if (items.length > 0) {
    await db
      .insertInto("order_items")
      .values(
        items.map((item) => ({
          order_id: id,
          product_id: item.productId,
          qty: item.qty,
          unit_price: item.unitPrice,
        }))
      )
      .execute();
  }
  return id;
}

export async function stockRow(db: Kysely<DB>, stockId: number) {
  return db
    .selectFrom("stocks")
    .select(["id", "qty", "reserved"])
    .where("id", "=", stockId)
    .executeTakeFirstOrThrow();
}
