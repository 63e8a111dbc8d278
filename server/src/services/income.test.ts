import { beforeEach, describe, expect, it } from "vitest";
import { createTestContext, type TestContext } from "../testing/context";
import { NotFoundError } from "../utils/errors";

describe("IncomeService", () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  it("trims the source and note", () => {
    const income = ctx.services.incomes.create({
      date: "2025-07-25",
      source: " Salary ",
      amount: 250000,
      note: " July ",
    });
    expect(income).toEqual({
      id: income.id,
      date: "2025-07-25",
      source: "Salary",
      amount: 250000,
      note: "July",
    });
  });

  it("lists newest first, optionally for one month", () => {
    const june = ctx.services.incomes.create({ date: "2025-06-25", source: "Salary", amount: 250000 });
    const bonus = ctx.services.incomes.create({ date: "2025-07-10", source: "Bonus", amount: 300000 });
    const july = ctx.services.incomes.create({ date: "2025-07-25", source: "Salary", amount: 250000 });

    expect(ctx.services.incomes.list({}).items.map((i) => i.id)).toEqual([july.id, bonus.id, june.id]);
    expect(ctx.services.incomes.list({ month: "2025-07" }).items.map((i) => i.id)).toEqual([
      july.id,
      bonus.id,
    ]);
  });

  it("pages ten at a time", () => {
    for (let day = 1; day <= 11; day++) {
      const date = `2025-07-${day.toString().padStart(2, "0")}`;
      ctx.services.incomes.create({ date, source: "Side job", amount: 1000 });
    }
    const second = ctx.services.incomes.list({ page: 2 });

    expect(second.totalPages).toBe(2);
    expect(second.items.map((i) => i.date)).toEqual(["2025-07-01"]);
    expect(() => ctx.services.incomes.list({ page: 3 })).toThrow(NotFoundError);
  });

  it("updates and deletes", () => {
    const income = ctx.services.incomes.create({ date: "2025-07-25", source: "Salary", amount: 250000 });

    expect(
      ctx.services.incomes.update(income.id, { date: "2025-07-24", source: "Salary", amount: 260000 })
        .amount
    ).toBe(260000);

    ctx.services.incomes.delete(income.id);
    expect(() => ctx.services.incomes.get(income.id)).toThrow(NotFoundError);
    expect(() => ctx.services.incomes.delete(income.id)).toThrow(NotFoundError);
  });
});
