import { beforeEach, describe, expect, it } from "vitest";
import { createTestContext, type TestContext } from "../testing/context";
import { ConflictError, NotFoundError, ValidationError } from "../utils/errors";
import { CategoryService } from "./category";

describe("CategoryService", () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  it("rejects duplicate names", () => {
    ctx.services.categories.create("Food");
    expect(() => ctx.services.categories.create(" Food ")).toThrow(ConflictError);
  });

  it("renames a category", () => {
    const food = ctx.services.categories.create("Food");
    expect(ctx.services.categories.rename(food.id, "Groceries")).toEqual({
      id: food.id,
      name: "Groceries",
    });
    expect(ctx.services.categories.list().map((c) => c.name)).toEqual(["Groceries"]);
  });

  it("leaves expenses uncategorized when their category is deleted", () => {
    const food = ctx.services.categories.create("Food");
    const expense = ctx.services.expenses.create({
      date: "2025-07-01",
      item: "Groceries",
      amount: 3200,
      categoryId: food.id,
    });

    ctx.services.categories.delete(food.id);

    expect(ctx.services.expenses.get(expense.id).categoryId).toBeNull();
    expect(() => ctx.services.categories.delete(food.id)).toThrow(NotFoundError);
  });

  it("refuses rules for unknown categories", () => {
    expect(() => ctx.services.categories.createRule("train", 99)).toThrow(ValidationError);
  });

  describe("guess", () => {
    it("keeps the user's choice", () => {
      const food = ctx.services.categories.create("Food");
      const transport = ctx.services.categories.create("Transport");
      ctx.services.categories.createRule("lunch", food.id);

      expect(ctx.services.categories.guess("lunch", "", transport)).toEqual(transport);
    });

    it("prefers the longest matching rule", () => {
      const transport = ctx.services.categories.create("Transport");
      const utilities = ctx.services.categories.create("Utilities");
      ctx.services.categories.createRule("gas", utilities.id);
      ctx.services.categories.createRule("gas station", transport.id);

      expect(ctx.services.categories.guess("Gas Station Route 9")).toEqual(transport);
      expect(ctx.services.categories.guess("gas bill")).toEqual(utilities);
    });

    it("matches rules on NFKC-normalized lower-cased text", () => {
      const food = ctx.services.categories.create("Food");
      ctx.services.categories.createRule("ＣＡＦＥ", food.id);

      expect(ctx.services.categories.guess("Corner cafe")?.id).toBe(food.id);
    });

    it("looks at the memo too", () => {
      const medical = ctx.services.categories.create("Medical");
      ctx.services.categories.createRule("dentist", medical.id);

      expect(ctx.services.categories.guess("Checkup", "dentist visit")?.id).toBe(medical.id);
    });

    it("falls back to the dictionary for categories that exist", () => {
      const transport = ctx.services.categories.create("Transport");

      expect(ctx.services.categories.guess("Taxi to the airport")).toEqual(transport);
      // "Food" has dictionary words but no such category
      expect(ctx.services.categories.guess("Team lunch")).toBeNull();
    });

    it("uses an injected dictionary", () => {
      const pets = ctx.repos.categories.create("Pets");
      const service = new CategoryService(ctx.repos, { Pets: ["kibble"] });

      expect(service.guess("Kibble 2kg")).toEqual(pets);
      expect(service.guess("Taxi")).toBeNull();
    });

    it("returns null when nothing matches", () => {
      ctx.services.categories.create("Food");
      expect(ctx.services.categories.guess("Mystery purchase")).toBeNull();
    });
  });
});
