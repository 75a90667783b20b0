import { describe, it, expect } from "vitest";
import { allocateStock } from "../../src/services/reservations";

describe("allocateStock", () => {
  it("takes from the first candidates until the request is covered", () => {
    const plan = allocateStock(
      [
        { id: 1, qty: 10, reserved: 4 },
        { id: 2, qty: 5, reserved: 0 },
        { id: 3, qty: 5, reserved: 0 },
      ],
      9
    );
    expect(plan).toEqual({
      allocations: [
        { stockId: 1, qty: 6 },
        { stockId: 2, qty: 3 },
      ],
      shortfall: 0,
    });
  });

  it("reports the shortfall when stock runs out", () => {
    const plan = allocateStock([{ id: 1, qty: 3, reserved: 1 }], 5);
    expect(plan.allocations).toEqual([{ stockId: 1, qty: 2 }]);
    expect(plan.shortfall).toBe(3);
  });

  it("skips rows with nothing available", () => {
    const plan = allocateStock(
      [
        { id: 1, qty: 4, reserved: 4 },
        { id: 2, qty: 2, reserved: 0 },
      ],
      2
    );
    expect(plan.allocations).toEqual([{ stockId: 2, qty: 2 }]);
  });

  it("never allocates more than a row has free", () => {
    const candidates = [
      { id: 1, qty: 7, reserved: 2 },
      { id: 2, qty: 3, reserved: 1 },
    ];
    const plan = allocateStock(candidates, 100);
    for (const allocation of plan.allocations) {
      const stock = candidates.find((candidate) => candidate.id === allocation.stockId);
      expect(stock && allocation.qty <= stock.qty - stock.reserved).toBe(true);
    }
    expect(plan.shortfall).toBe(93);
  });
});
