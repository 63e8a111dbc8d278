import { beforeEach, describe, expect, it } from "vitest";
import { createTestContext, type TestContext } from "../testing/context";
import { NotFoundError } from "../utils/errors";

describe("SummaryService", () => {
  let ctx: TestContext;
  let foodId: number;
  let transportId: number;

  beforeEach(() => {
    ctx = createTestContext();
    foodId = ctx.services.categories.create("Food").id;
    transportId = ctx.services.categories.create("Transport").id;
    const { expenses, incomes } = ctx.services;

    expenses.create({ date: "2025-05-10", item: "Groceries", amount: 3000, categoryId: foodId });
    expenses.create({ date: "2025-07-01", item: "Groceries", amount: 4000, categoryId: foodId });
    expenses.create({ date: "2025-07-05", item: "Train pass", amount: 10000, categoryId: transportId });
    expenses.create({ date: "2025-07-20", item: "Umbrella", amount: 1200 });
    incomes.create({ date: "2025-07-25", source: "Salary", amount: 250000 });
    incomes.create({ date: "2025-06-25", source: "Salary", amount: 250000 });
  });

  describe("monthly", () => {
    it("groups expenses by month, newest first, with income alongside", () => {
      expect(ctx.services.summary.monthly({})).toEqual({
        rows: [
          { month: "2025-07", total: 15200, count: 3, incomeTotal: 250000, net: 234800 },
          { month: "2025-05", total: 3000, count: 1, incomeTotal: 0, net: -3000 },
        ],
        grandTotal: 18200,
        page: 1,
        totalPages: 1,
      });
    });

    it("applies the keyword and date filters", () => {
      const summary = ctx.services.summary.monthly({ q: "groceries", startDate: "2025-06-01" });
      expect(summary.rows).toEqual([
        { month: "2025-07", total: 4000, count: 1, incomeTotal: 250000, net: 246000 },
      ]);
      expect(summary.grandTotal).toBe(4000);
    });

    it("pages twelve months at a time", () => {
      for (let m = 1; m <= 12; m++) {
        const month = m.toString().padStart(2, "0");
        ctx.services.expenses.create({ date: `2024-${month}-01`, item: "Rent", amount: 80000 });
      }
      const first = ctx.services.summary.monthly({});
      const second = ctx.services.summary.monthly({ page: 2 });

      // 2025-07, 2025-05 and all of 2024
      expect(first.totalPages).toBe(2);
      expect(first.rows).toHaveLength(12);
      expect(second.rows.map((r) => r.month)).toEqual(["2024-02", "2024-01"]);
      expect(() => ctx.services.summary.monthly({ page: 3 })).toThrow(NotFoundError);
    });
  });

  describe("month", () => {
    it("totals one month of expenses and income", () => {
      const summary = ctx.services.summary.month("2025-07");

      expect(summary.expenseTotal).toBe(15200);
      expect(summary.incomeTotal).toBe(250000);
      expect(summary.net).toBe(234800);
      expect(summary.prevMonth).toBe("2025-06");
      expect(summary.nextMonth).toBe("2025-08");
      expect(summary.byCategory).toEqual([
        { categoryId: transportId, name: "Transport", total: 10000 },
        { categoryId: foodId, name: "Food", total: 4000 },
        { categoryId: null, name: "Uncategorized", total: 1200 },
      ]);
    });

    it("compares spending with the month's budgets", () => {
      const social = ctx.services.categories.create("Social");
      ctx.services.budgets.create({ month: "2025-07", amount: 200000 });
      ctx.services.budgets.create({ month: "2025-07", categoryId: foodId, amount: 30000 });
      ctx.services.budgets.create({ month: "2025-07", categoryId: social.id, amount: 10000 });

      const summary = ctx.services.summary.month("2025-07");
      expect(summary.overallBudget).toBe(200000);
      expect(summary.budgetProgress).toEqual([
        { categoryId: foodId, name: "Food", spent: 4000, budget: 30000, remaining: 26000 },
        { categoryId: social.id, name: "Social", spent: 0, budget: 10000, remaining: 10000 },
        { categoryId: transportId, name: "Transport", spent: 10000, budget: null, remaining: null },
        { categoryId: null, name: "Uncategorized", spent: 1200, budget: null, remaining: null },
      ]);
    });

    it("is all zeros for an empty month", () => {
      const summary = ctx.services.summary.month("2025-01");
      expect(summary).toMatchObject({
        month: "2025-01",
        expenseTotal: 0,
        incomeTotal: 0,
        net: 0,
        overallBudget: null,
        byCategory: [],
        budgetProgress: [],
      });
    });
  });
});
