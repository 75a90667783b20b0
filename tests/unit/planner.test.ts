import { describe, it, expect } from "vitest";
import { parseRelationPath, planJoins, splitList } from "../../src/query/planner";
import { InvalidPathError } from "../../src/utils/errors";

describe("splitList", () => {
  it("trims items and drops empty ones", () => {
    expect(splitList(" brand, ,category ,")).toEqual(["brand", "category"]);
    expect(splitList(undefined)).toEqual([]);
  });
});

describe("parseRelationPath", () => {
  it("keys paths by relation names", () => {
    const path = parseRelationPath("orderitem", "order.customer");
    expect(path.key).toBe("order__customer");
    expect(path.target).toBe("customer");
  });

  it("rejects unknown segments", () => {
    expect(() => parseRelationPath("product", "brand__owner")).toThrow(InvalidPathError);
  });

  it("rejects malformed paths", () => {
    expect(() => parseRelationPath("product", "brand..name")).toThrow(
      'Malformed relation path "brand..name"'
    );
  });
});

describe("planJoins", () => {
  it("joins to-one chains eagerly with every prefix once", () => {
    const plan = planJoins("orderitem", ["order__customer", "order", "product__brand"]);
    expect(plan.eager.map((path) => path.key)).toEqual([
      "order",
      "order__customer",
      "product",
      "product__brand",
    ]);
    expect(plan.batched).toEqual([]);
  });

  it("batches paths with a to-many hop", () => {
    const plan = planJoins("customer", ["orders"]);
    expect(plan.eager).toEqual([]);
    expect(plan.batched).toHaveLength(1);
    expect(plan.batched[0].owner.key).toBe("");
    expect(plan.batched[0].hops.map((hop) => hop.name)).toEqual(["orders"]);
  });

  it("joins the owner prefix eagerly and batches from the first to-many hop", () => {
    const plan = planJoins("orderitem", ["order__items__product"]);
    expect(plan.eager.map((path) => path.key)).toEqual(["order"]);
    expect(plan.batched[0].owner.key).toBe("order");
    expect(plan.batched[0].hops.map((hop) => hop.name)).toEqual(["items", "product"]);
  });

  it("treats a has-one relation as an eager join", () => {
    const plan = planJoins("order", ["payment"]);
    expect(plan.eager.map((path) => path.key)).toEqual(["payment"]);
    expect(plan.batched).toEqual([]);
  });

  it("keeps one batched load per distinct path", () => {
    const plan = planJoins("brand", ["products", "products", "products.stocks"]);
    expect(plan.batched.map((load) => load.path.key)).toEqual([
      "products",
      "products__stocks",
    ]);
  });
});
