import { beforeEach, describe, expect, it } from "vitest";
import { createTestContext, type TestContext } from "../testing/context";
import { ConflictError, ValidationError } from "../utils/errors";

describe("BudgetService", () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  it("normalizes the month to its first day", () => {
    expect(ctx.services.budgets.create({ month: "2025-07", amount: 200000 }).month).toBe(
      "2025-07-01"
    );
    expect(
      ctx.services.budgets.create({ month: "2025-08-19", amount: 200000 }).month
    ).toBe("2025-08-01");
  });

  it("rejects an invalid month", () => {
    expect(() => ctx.services.budgets.create({ month: "July", amount: 1 })).toThrow(
      ValidationError
    );
  });

  it("allows one budget per month and category", () => {
    const food = ctx.services.categories.create("Food");
    ctx.services.budgets.create({ month: "2025-07", categoryId: food.id, amount: 40000 });
    ctx.services.budgets.create({ month: "2025-07", amount: 200000 });

    expect(() =>
      ctx.services.budgets.create({ month: "2025-07-10", categoryId: food.id, amount: 1 })
    ).toThrow(new ConflictError("A budget for 2025-07 (Food) already exists"));
    expect(() => ctx.services.budgets.create({ month: "2025-07", amount: 1 })).toThrow(
      new ConflictError("A budget for 2025-07 (overall) already exists")
    );
    // Another month is fine
    ctx.services.budgets.create({ month: "2025-08", categoryId: food.id, amount: 40000 });
  });

  it("lets a budget be saved onto its own month and category", () => {
    const budget = ctx.services.budgets.create({ month: "2025-07", amount: 200000 });
    expect(
      ctx.services.budgets.update(budget.id, { month: "2025-07", amount: 180000 }).amount
    ).toBe(180000);
  });

  it("lists a month with the overall budget first", () => {
    const transport = ctx.services.categories.create("Transport");
    const food = ctx.services.categories.create("Food");
    ctx.services.budgets.create({ month: "2025-07", categoryId: transport.id, amount: 15000 });
    ctx.services.budgets.create({ month: "2025-07", categoryId: food.id, amount: 40000 });
    ctx.services.budgets.create({ month: "2025-07", amount: 200000 });
    ctx.services.budgets.create({ month: "2025-06", amount: 190000 });

    const { month, items } = ctx.services.budgets.listForMonth("2025-07");
    expect(month).toBe("2025-07");
    expect(items.map((b) => b.categoryName)).toEqual([null, "Food", "Transport"]);
  });

  it("returns the month a deleted budget belonged to", () => {
    const budget = ctx.services.budgets.create({ month: "2025-07", amount: 200000 });
    expect(ctx.services.budgets.delete(budget.id)).toEqual({ month: "2025-07" });
    expect(ctx.services.budgets.listForMonth("2025-07").items).toEqual([]);
  });
});
