import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createTestDb, type TestDatabase } from "../support/testDb";
import { type SeededCatalog, seedCatalog } from "../support/seed";
import { insertBrand } from "../support/fixtures";
import {
  addOrderItem,
  createOrder,
  deleteOrder,
  deleteOrderItem,
} from "../../src/services/order";
import { confirmOrder } from "../../src/services/reservations";
import { findEntity } from "../../src/services/related";
import {
  confirmPayment,
  createPayment,
  failPayment,
  orderTotal,
} from "../../src/services/payments";
import {
  availableStockIds,
  createProduct,
  deleteBrand,
  deleteCustomer,
  deleteProduct,
  deleteWarehouse,
  lowStockProductIds,
} from "../../src/services/catalog";
import {
  ConflictError,
  InvalidStateTransitionError,
  NotFoundError,
  ReferentialIntegrityError,
  ValidationError,
} from "../../src/utils/errors";

describe("orders, payments and catalog", () => {
  let testDb: TestDatabase;
  let seeded: SeededCatalog;

  beforeEach(async () => {
    testDb = createTestDb();
    seeded = await seedCatalog(testDb.db);
  });

  afterEach(async () => {
    await testDb.close();
  });

  const itemsOf = (orderId: number) =>
    testDb.db
      .selectFrom("order_items")
      .select(["product_id", "qty", "unit_price"])
      .where("order_id", "=", orderId)
      .orderBy("id")
      .execute();

  describe("createOrder", () => {
    it("creates a PENDING order priced from the catalog", async () => {
      const orderId = await createOrder(
        {
          customer_id: seeded.customers.ann,
          items: [
            { product_id: seeded.products.hammer, qty: 3 },
            { product_id: seeded.products.gadget, qty: 1, unit_price: 25 },
          ],
        },
        testDb.db
      );

      const order = await testDb.db
        .selectFrom("orders")
        .select("status")
        .where("id", "=", orderId)
        .executeTakeFirstOrThrow();
      expect(order.status).toBe("PENDING");

      const items = await itemsOf(orderId);
      expect(items.map((item) => [item.product_id, item.qty, Number(item.unit_price)])).toEqual([
        [seeded.products.hammer, 3, 10],
        [seeded.products.gadget, 1, 25],
      ]);
      expect(await orderTotal(orderId, testDb.db)).toBe(55);
    });

    it("rejects an unknown customer", async () => {
      await expect(
        createOrder(
          { customer_id: 999, items: [{ product_id: seeded.products.hammer, qty: 1 }] },
          testDb.db
        )
      ).rejects.toThrow("Customer 999 does not exist");
    });

    it("lists every problem with the items", async () => {
      const error = await createOrder(
        {
          customer_id: seeded.customers.ann,
          items: [
            { product_id: seeded.products.hammer, qty: 16 },
            { product_id: seeded.products.gadget, qty: 1 },
            { product_id: seeded.products.gadget, qty: 1 },
            { product_id: 999, qty: 1 },
          ],
        },
        testDb.db
      ).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({
        details: [
          { error: "Product listed more than once", productId: seeded.products.gadget },
          {
            error: "Not enough stock",
            productId: seeded.products.hammer,
            details: { requested: 16, available: 15 },
          },
          { error: "Product not found", productId: 999 },
        ],
      });
    });

    it("counts reserved units as unavailable", async () => {
      await confirmOrder(seeded.orders.annOrder, testDb.db);

      await expect(
        createOrder(
          {
            customer_id: seeded.customers.bob,
            items: [{ product_id: seeded.products.hammer, qty: 14 }],
          },
          testDb.db
        )
      ).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe("order items", () => {
    it("adds and removes items while the order is pending", async () => {
      const item = await addOrderItem(
        { order_id: seeded.orders.annOrder, product_id: seeded.products.gadget, qty: 1 },
        testDb.db
      );
      expect(Number(item.unit_price)).toBe(30);
      expect(await orderTotal(seeded.orders.annOrder, testDb.db)).toBe(50);

      await deleteOrderItem(item.id, testDb.db);
      expect(await itemsOf(seeded.orders.annOrder)).toHaveLength(1);
    });

    it("refuses changes once the order is confirmed", async () => {
      await confirmOrder(seeded.orders.annOrder, testDb.db);

      await expect(
        addOrderItem(
          { order_id: seeded.orders.annOrder, product_id: seeded.products.gadget, qty: 1 },
          testDb.db
        )
      ).rejects.toBeInstanceOf(ConflictError);
    });

    it("refuses a product without available stock", async () => {
      await expect(
        addOrderItem(
          { order_id: seeded.orders.annOrder, product_id: seeded.products.wrench, qty: 1 },
          testDb.db
        )
      ).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe("deleteOrder", () => {
    it("deletes a pending order with its items", async () => {
      await deleteOrder(seeded.orders.annOrder, testDb.db);
      expect(await itemsOf(seeded.orders.annOrder)).toEqual([]);
    });

    it("refuses a confirmed order", async () => {
      await confirmOrder(seeded.orders.annOrder, testDb.db);
      await expect(deleteOrder(seeded.orders.annOrder, testDb.db)).rejects.toBeInstanceOf(
        ConflictError
      );
    });

    it("raises NotFound for a missing order", async () => {
      await expect(deleteOrder(999, testDb.db)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("payments", () => {
    it("requires the amount to match the order total", async () => {
      await expect(
        createPayment({ order_id: seeded.orders.annOrder, method: "CARD", amount: 15 }, testDb.db)
      ).rejects.toThrow("Payment amount (15) does not match the order total (20)");
    });

    it("moves a payment through its states once", async () => {
      const payment = await createPayment(
        { order_id: seeded.orders.annOrder, method: "CARD", amount: 20 },
        testDb.db
      );
      expect(payment.status).toBe("PENDING");

      await expect(
        createPayment({ order_id: seeded.orders.annOrder, method: "COD", amount: 20 }, testDb.db)
      ).rejects.toBeInstanceOf(ConflictError);

      const confirmed = await confirmPayment(payment.id, testDb.db);
      expect(confirmed.status).toBe("CONFIRMED");
      await expect(failPayment(payment.id, testDb.db)).rejects.toBeInstanceOf(
        InvalidStateTransitionError
      );
    });

    it("adds confirmed payments to the customer's total spent", async () => {
      const payment = await createPayment(
        { order_id: seeded.orders.annOrder, method: "TRANSFER", amount: 20 },
        testDb.db
      );
      const pending = await findEntity("customer", seeded.customers.ann, testDb.db);
      expect(pending.total_spent).toBe(0);

      await confirmPayment(payment.id, testDb.db);
      const ann = await findEntity("customer", seeded.customers.ann, testDb.db);
      expect(ann.total_spent).toBe(20);
      expect(ann.orders).toEqual([expect.not.objectContaining({ payment: expect.anything() })]);

      const bobPayment = await createPayment(
        { order_id: seeded.orders.bobOrder, method: "CARD", amount: 40 },
        testDb.db
      );
      await failPayment(bobPayment.id, testDb.db);
      const bob = await findEntity("customer", seeded.customers.bob, testDb.db);
      expect(bob.total_spent).toBe(0);
    });

    it("raises NotFound for a missing payment", async () => {
      await expect(confirmPayment(999, testDb.db)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("catalog", () => {
    it("refuses to delete a brand that still has products", async () => {
      await expect(deleteBrand(seeded.brands.acme, testDb.db)).rejects.toThrow(
        `brand ${seeded.brands.acme} still has 2 products`
      );
    });

    it("deletes a brand without products", async () => {
      const empty = await insertBrand(testDb.db, "Initech");
      await deleteBrand(empty, testDb.db);
      await expect(deleteBrand(empty, testDb.db)).rejects.toBeInstanceOf(NotFoundError);
    });

    it("refuses to delete a customer with orders", async () => {
      await expect(deleteCustomer(seeded.customers.ann, testDb.db)).rejects.toBeInstanceOf(
        ReferentialIntegrityError
      );
    });

    it("refuses to delete an ordered product", async () => {
      await expect(deleteProduct(seeded.products.hammer, testDb.db)).rejects.toBeInstanceOf(
        ReferentialIntegrityError
      );
    });

    it("removes the stock rows of a deleted warehouse", async () => {
      await deleteWarehouse(seeded.warehouses.north, testDb.db);

      const stocks = await testDb.db.selectFrom("stocks").select("id").orderBy("id").execute();
      expect(stocks.map((stock) => stock.id)).toEqual([
        seeded.stocks.hammerSouth,
        seeded.stocks.gadgetSouth,
      ]);
    });

    it("rejects a product pointing at a missing brand", async () => {
      await expect(
        createProduct(
          {
            name: "Sprocket",
            sku: "S-1",
            price: 5,
            brand_id: 999,
            category_id: seeded.categories.tools,
          },
          testDb.db
        )
      ).rejects.toThrow("brand_id 999 does not exist");
    });

    it("lists active products whose total stock is under the threshold", async () => {
      expect(await lowStockProductIds(6, testDb.db)).toEqual([seeded.products.wrench]);
      const underTen = await lowStockProductIds(10, testDb.db);
      expect([...underTen].sort((a, b) => a - b)).toEqual([
        seeded.products.wrench,
        seeded.products.gadget,
      ]);
    });

    it("lists stock rows with unreserved units", async () => {
      const ids = await availableStockIds(testDb.db);
      expect([...ids].sort((a, b) => a - b)).toEqual([
        seeded.stocks.hammerNorth,
        seeded.stocks.hammerSouth,
        seeded.stocks.gadgetSouth,
      ]);
    });
  });
});
