import type { Kysely } from "kysely";
import { getSQLClient } from "../db";
import type { Brand, Category, Customer, DB, Product, Stock, Warehouse } from "../types/db";
import type {
  BrandRequest,
  CategoryRequest,
  CustomerRequest,
  ProductRequest,
  StockRequest,
  WarehouseRequest,
} from "../validations/catalog";
import {
  NotFoundError,
  ReferentialIntegrityError,
  ValidationError,
  translateDatabaseError,
} from "../utils/errors";

type Table = keyof DB;

async function insertReturning<T>(run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (err) {
    throw translateDatabaseError(err);
  }
}

async function assertExists(db: Kysely<DB>, table: Table, id: number, field: string) {
  const row = await db
    .selectFrom(table)
    .select("id")
    .where("id", "=", id)
    .executeTakeFirst();
  if (!row) {
    throw new ValidationError(`${field} ${id} does not exist`, { [field]: id });
  }
}

async function countWhere(
  db: Kysely<DB>,
  table: "products" | "orders" | "order_items",
  column: "brand_id" | "category_id" | "customer_id" | "product_id",
  id: number
): Promise<number> {
  const { count } = await db
    .selectFrom(table)
    .select((eb) => eb.fn.countAll<number>().as("count"))
    .where(column, "=", id)
    .executeTakeFirstOrThrow();
  return Number(count);
}

async function deleteById(db: Kysely<DB>, table: Table, kind: string, id: number) {
  try {
    const result = await db.deleteFrom(table).where("id", "=", id).executeTakeFirst();
    if (Number(result.numDeletedRows) === 0) {
      throw new NotFoundError(`${kind} ${id} not found`, kind, id);
    }
  } catch (err) {
    throw translateDatabaseError(err);
  }
}

export function createBrand(
  request: BrandRequest,
  db: Kysely<DB> = getSQLClient()
): Promise<Brand> {
  return insertReturning(() =>
    db.insertInto("brands").values(request).returningAll().executeTakeFirstOrThrow()
  );
}

export function createCategory(
  request: CategoryRequest,
  db: Kysely<DB> = getSQLClient()
): Promise<Category> {
  return insertReturning(() =>
    db.insertInto("categories").values(request).returningAll().executeTakeFirstOrThrow()
  );
}

export async function createProduct(
  request: ProductRequest,
  db: Kysely<DB> = getSQLClient()
): Promise<Product> {
  await assertExists(db, "brands", request.brand_id, "brand_id");
  await assertExists(db, "categories", request.category_id, "category_id");
  return insertReturning(() =>
    db.insertInto("products").values(request).returningAll().executeTakeFirstOrThrow()
  );
}

export function createWarehouse(
  request: WarehouseRequest,
  db: Kysely<DB> = getSQLClient()
): Promise<Warehouse> {
  return insertReturning(() =>
    db.insertInto("warehouses").values(request).returningAll().executeTakeFirstOrThrow()
  );
}

export async function createStock(
  request: StockRequest,
  db: Kysely<DB> = getSQLClient()
): Promise<Stock> {
  await assertExists(db, "products", request.product_id, "product_id");
  await assertExists(db, "warehouses", request.warehouse_id, "warehouse_id");
  return insertReturning(() =>
    db.insertInto("stocks").values(request).returningAll().executeTakeFirstOrThrow()
  );
}

export function createCustomer(
  request: CustomerRequest,
  db: Kysely<DB> = getSQLClient()
): Promise<Customer> {
  return insertReturning(() =>
    db.insertInto("customers").values(request).returningAll().executeTakeFirstOrThrow()
  );
}

export async function deleteBrand(id: number, db: Kysely<DB> = getSQLClient()) {
  const products = await countWhere(db, "products", "brand_id", id);
  if (products > 0) {
    throw new ReferentialIntegrityError(
      `brand ${id} still has ${products} products`,
      "brand",
      id
    );
  }
  await deleteById(db, "brands", "brand", id);
}

export async function deleteCategory(id: number, db: Kysely<DB> = getSQLClient()) {
  const products = await countWhere(db, "products", "category_id", id);
  if (products > 0) {
    throw new ReferentialIntegrityError(
      `category ${id} still has ${products} products`,
      "category",
      id
    );
  }
  await deleteById(db, "categories", "category", id);
}

/** Stock rows go with the product; order items referencing it block the delete */
export async function deleteProduct(id: number, db: Kysely<DB> = getSQLClient()) {
  const items = await countWhere(db, "order_items", "product_id", id);
  if (items > 0) {
    throw new ReferentialIntegrityError(
      `product ${id} is referenced by ${items} order items`,
      "product",
      id
    );
  }
  await deleteById(db, "products", "product", id);
}

export async function deleteCustomer(id: number, db: Kysely<DB> = getSQLClient()) {
  const orders = await countWhere(db, "orders", "customer_id", id);
  if (orders > 0) {
    throw new ReferentialIntegrityError(
      `customer ${id} still has ${orders} orders`,
      "customer",
      id
    );
  }
  await deleteById(db, "customers", "customer", id);
}

export function deleteWarehouse(id: number, db: Kysely<DB> = getSQLClient()) {
  return deleteById(db, "warehouses", "warehouse", id);
}

export function deleteStock(id: number, db: Kysely<DB> = getSQLClient()) {
  return deleteById(db, "stocks", "stock", id);
}

export function deletePayment(id: number, db: Kysely<DB> = getSQLClient()) {
  return deleteById(db, "payments", "payment", id);
}

/**
 * Ids of active products whose stock across warehouses sums below
 * `threshold`. Products without any stock row are not listed.
 */
export async function lowStockProductIds(
  threshold: number,
  db: Kysely<DB> = getSQLClient()
): Promise<number[]> {
  const rows = await db
    .selectFrom("products")
    .innerJoin("stocks", "stocks.product_id", "products.id")
    .select("products.id")
    .where("products.is_active", "=", true)
    .groupBy("products.id")
    .having((eb) => eb.fn.sum<number>("stocks.qty"), "<", threshold)
    .execute();
  return rows.map((row) => row.id);
}

export async function availableStockIds(db: Kysely<DB> = getSQLClient()): Promise<number[]> {
  const rows = await db
    .selectFrom("stocks")
    .select("id")
    .whereRef("qty", ">", "reserved")
    .execute();
  return rows.map((row) => row.id);
}
