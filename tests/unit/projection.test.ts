import { describe, it, expect } from "vitest";
import type { EntityNode } from "../../src/query/executor";
import {
  defaultRepresentation,
  derivedFields,
  pickFields,
  projectNode,
} from "../../src/query/projection";

const node = (
  kind: EntityNode["kind"],
  values: Record<string, unknown>,
  relations: EntityNode["relations"] = {}
): EntityNode => ({ kind, values, relations });

const brand = node("brand", { id: 1, name: "Acme", is_active: true });
const item = (id: number, qty: number, unitPrice: number) =>
  node("orderitem", { id, qty, unit_price: unitPrice });

describe("derivedFields", () => {
  it("computes stock availability", () => {
    expect(derivedFields(node("stock", { id: 1, qty: 10, reserved: 3 }))).toEqual({
      available_qty: 7,
    });
  });

  it("computes order totals only when items are loaded", () => {
    const order = node("order", { id: 1 }, { items: [item(1, 2, 10.25), item(2, 1, 4.5)] });
    expect(derivedFields(order)).toEqual({ total_amount: 25, total_items: 3 });
    expect(derivedFields(node("order", { id: 2 }))).toEqual({});
  });

  it("counts only active products", () => {
    const withProducts = node("brand", { id: 1 }, {
      products: [
        node("product", { id: 1, is_active: true }),
        node("product", { id: 2, is_active: false }),
      ],
    });
    expect(derivedFields(withProducts)).toEqual({ products_count: 1 });
  });

  it("counts warehouse stock rows with quantity", () => {
    const warehouse = node("warehouse", { id: 1 }, {
      stocks: [node("stock", { id: 1, qty: 0 }), node("stock", { id: 2, qty: 4 })],
    });
    expect(derivedFields(warehouse)).toEqual({ total_products: 1 });
  });

  it("sums confirmed payments once every order has its payment loaded", () => {
    const payment = (id: number, status: string, amount: string) =>
      node("payment", { id, status, amount });
    const customer = node("customer", { id: 1 }, {
      orders: [
        node("order", { id: 1 }, { payment: payment(1, "CONFIRMED", "19.99") }),
        node("order", { id: 2 }, { payment: payment(2, "FAILED", "5.00") }),
        node("order", { id: 3 }, { payment: null }),
      ],
    });
    expect(derivedFields(customer)).toEqual({ orders_count: 3, total_spent: 19.99 });

    const unloaded = node("customer", { id: 2 }, { orders: [node("order", { id: 4 })] });
    expect(derivedFields(unloaded)).toEqual({ orders_count: 1 });
  });
});

describe("defaultRepresentation hidden paths", () => {
  it("leaves hidden relation paths out at any depth", () => {
    const customer = node("customer", { id: 1 }, {
      orders: [node("order", { id: 1 }, { payment: null, items: [] })],
    });
    expect(defaultRepresentation(customer, new Set(["orders__payment"]))).toEqual({
      id: 1,
      orders_count: 1,
      total_spent: 0,
      orders: [{ id: 1, total_amount: 0, total_items: 0, items: [] }],
    });
  });
});

describe("defaultRepresentation", () => {
  it("nests loaded relations with their derived fields", () => {
    const product = node("product", { id: 3, name: "Widget" }, {
      brand,
      stocks: [node("stock", { id: 9, qty: 5, reserved: 1 })],
    });
    expect(defaultRepresentation(product)).toEqual({
      id: 3,
      name: "Widget",
      total_stock: 5,
      brand: { id: 1, name: "Acme", is_active: true },
      stocks: [{ id: 9, qty: 5, reserved: 1, available_qty: 4 }],
    });
  });

  it("renders a missing to-one relation as null", () => {
    expect(defaultRepresentation(node("order", { id: 1 }, { payment: null }))).toEqual({
      id: 1,
      payment: null,
    });
  });
});

describe("pickFields", () => {
  it("keeps requested columns and derived fields in order and skips unknown names", () => {
    expect(pickFields(node("stock", { id: 1, qty: 8, reserved: 2 }), ["available_qty", "bogus", "qty"])).toEqual({
      available_qty: 6,
      qty: 8,
    });
  });
});

describe("projectNode", () => {
  const product = node("product", { id: 3, name: "Widget", sku: "W-1", price: 9.5 }, {
    brand,
    order_items: [
      node("orderitem", { id: 1 }, { order: node("order", { id: 10, status: "PENDING" }) }),
      node("orderitem", { id: 2 }, { order: node("order", { id: 10, status: "PENDING" }) }),
    ],
  });

  it("projects the root and related entities from their whitelists", () => {
    const whitelist = new Map([
      ["product", ["name", "sku"]],
      ["brand", ["name"]],
    ]);
    expect(projectNode("product", product, whitelist)).toEqual({
      name: "Widget",
      sku: "W-1",
      brand: { name: "Acme" },
    });
  });

  it("deduplicates to-many entities by id", () => {
    const whitelist = new Map([
      ["product", ["id"]],
      ["order", ["id", "status"]],
    ]);
    expect(projectNode("product", product, whitelist)).toEqual({
      id: 3,
      order: [{ id: 10, status: "PENDING" }],
    });
  });

  it("omits entities that were not loaded or do not resolve", () => {
    const whitelist = new Map([
      ["product", ["id"]],
      ["warehouse", ["name"]],
      ["vendor", ["name"]],
    ]);
    expect(projectNode("product", product, whitelist)).toEqual({ id: 3 });
  });

  it("adds related whitelists to the default representation", () => {
    const plain = node("product", { id: 4 }, { brand });
    expect(projectNode("product", plain, new Map([["brand", ["name"]]]))).toEqual({
      id: 4,
      brand: { name: "Acme" },
    });
  });
});
