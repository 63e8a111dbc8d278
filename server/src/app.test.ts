import { beforeEach, describe, expect, it } from "vitest";
import { createApp } from "./app";
import { createTestContext, receiptImage, type TestContext } from "./testing/context";

const json = (method: string, body: unknown): RequestInit => ({
  method,
  headers: { "content-type": "application/json" },
  body: JSON.stringify(body),
});

const receiptForm = (fields: Record<string, string>, image: File = receiptImage()) => {
  const form = new FormData();
  for (const [key, value] of Object.entries(fields)) {
    form.append(key, value);
  }
  form.append("image", image);
  return form;
};

describe("app", () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  it("answers the health check", async () => {
    const res = await ctx.app.request("/healthz");
    expect(res.status).toBe(200);
    expect(await res.text()).toBe("OK");
  });

  it("answers unknown paths with a JSON 404", async () => {
    const res = await ctx.app.request("/api/nothing-here");
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Not found" });
  });

  describe("/api/expenses", () => {
    it("creates, lists and deletes an expense", async () => {
      const created = await ctx.app.request(
        "/api/expenses",
        json("POST", { date: "2025-07-03", item: "Lunch", amount: 900 })
      );
      expect(created.status).toBe(201);
      const expense = await created.json();
      expect(expense).toMatchObject({ date: "2025-07-03", item: "Lunch", amount: 900 });

      const listed = await ctx.app.request("/api/expenses?month=2025-07");
      expect(listed.status).toBe(200);
      expect(await listed.json()).toMatchObject({
        items: [expense],
        page: 1,
        totalCount: 1,
        month: "2025-07",
        prevMonth: "2025-06",
        nextMonth: "2025-08",
        isAll: false,
      });

      const deleted = await ctx.app.request(`/api/expenses/${expense.id}`, { method: "DELETE" });
      expect(await deleted.json()).toEqual({ month: "2025-07" });

      const after = await ctx.app.request("/api/expenses?month=2025-07");
      expect((await after.json()).items).toEqual([]);
    });

    it("validates the body", async () => {
      const res = await ctx.app.request(
        "/api/expenses",
        json("POST", { date: "2025-02-30", item: "Lunch", amount: 0 })
      );
      expect(res.status).toBe(400);
    });

    it("rejects an unknown category", async () => {
      const res = await ctx.app.request(
        "/api/expenses",
        json("POST", { date: "2025-07-03", item: "Lunch", amount: 900, categoryId: 42 })
      );
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Unknown category 42" });
    });

    it("answers 404 for a missing expense and an out of range page", async () => {
      expect((await ctx.app.request("/api/expenses/99")).status).toBe(404);
      expect((await ctx.app.request("/api/expenses?page=5")).status).toBe(404);
    });

    it("clamps per_page to 1..500 and ignores junk", async () => {
      for (const day of ["01", "02", "03"]) {
        ctx.services.expenses.create({ date: `2025-07-${day}`, item: "Tea", amount: 150 });
      }
      const perPage = async (value: string) => {
        const res = await ctx.app.request(`/api/expenses?month=2025-07&per_page=${value}`);
        const body = await res.json();
        return { perPage: body.perPage, items: body.items.length, totalPages: body.totalPages };
      };

      expect(await perPage("0")).toEqual({ perPage: 1, items: 1, totalPages: 3 });
      expect(await perPage("9999")).toEqual({ perPage: 500, items: 3, totalPages: 1 });
      expect(await perPage("abc")).toEqual({ perPage: 10, items: 3, totalPages: 1 });
    });

    it("sorts by category descending through the query string", async () => {
      const food = ctx.services.categories.create("Food");
      const transport = ctx.services.categories.create("Transport");
      ctx.services.expenses.create({ date: "2025-07-01", item: "Groceries", amount: 4000, categoryId: food.id });
      ctx.services.expenses.create({ date: "2025-07-02", item: "Coffee beans", amount: 1500, categoryId: food.id });
      ctx.services.expenses.create({ date: "2025-07-01", item: "Bus ticket", amount: 220, categoryId: transport.id });

      const res = await ctx.app.request("/api/expenses?month=2025-07&sort=-category");
      const body = await res.json();
      expect(body.items.map((e: { item: string }) => e.item)).toEqual([
        "Bus ticket",
        "Coffee beans",
        "Groceries",
      ]);
    });

    it("deletes in bulk", async () => {
      const a = ctx.services.expenses.create({ date: "2025-07-01", item: "Tea", amount: 150 });
      const b = ctx.services.expenses.create({ date: "2025-07-02", item: "Tea", amount: 150 });

      const res = await ctx.app.request(
        "/api/expenses/bulk-delete",
        json("POST", { ids: [a.id, b.id, 999] })
      );
      expect(await res.json()).toEqual({ deleted: 2 });
    });
  });

  describe("/api/incomes", () => {
    it("rejects months outside 01..12", async () => {
      ctx.services.incomes.create({ date: "2026-01-20", source: "Salary", amount: 250000 });

      expect((await ctx.app.request("/api/incomes?month=2025-13")).status).toBe(400);
      expect((await ctx.app.request("/api/incomes?month=2025-00")).status).toBe(400);

      const december = await ctx.app.request("/api/incomes?month=2025-12");
      expect((await december.json()).items).toEqual([]);
    });
  });

  describe("/api/budgets", () => {
    it("answers 409 for a second budget on the same month and category", async () => {
      const first = await ctx.app.request(
        "/api/budgets",
        json("POST", { month: "2025-07", amount: 200000 })
      );
      expect(first.status).toBe(201);

      const second = await ctx.app.request(
        "/api/budgets",
        json("POST", { month: "2025-07-01", amount: 180000 })
      );
      expect(second.status).toBe(409);
      expect(await second.json()).toEqual({
        error: "A budget for 2025-07 (overall) already exists",
      });
    });
  });

  describe("/api/categories", () => {
    it("guesses a category, ignoring a stale choice", async () => {
      const food = ctx.services.categories.create("Food");

      const res = await ctx.app.request(
        "/api/categories/guess",
        json("POST", { item: "Supermarket run", categoryId: 999 })
      );
      expect(await res.json()).toEqual({
        ok: true,
        suggestedId: food.id,
        suggestedName: "Food",
      });
    });

    it("answers 409 for a duplicate name", async () => {
      ctx.services.categories.create("Food");
      const res = await ctx.app.request("/api/categories", json("POST", { name: "Food" }));
      expect(res.status).toBe(409);
    });
  });

  describe("/api/receipts", () => {
    const lineItems = JSON.stringify([
      { item: "Rice", amount: "1,980" },
      { item: "Eggs", amount: 300 },
    ]);

    it("registers a receipt whose line items add up", async () => {
      const res = await ctx.app.request("/api/receipts", {
        method: "POST",
        body: receiptForm({ date: "2025-07-12", storeName: "Corner Market", total: "２,２８０", lineItems }),
      });
      expect(res.status).toBe(201);
      const receipt = await res.json();
      expect(receipt).toMatchObject({ total: 2280, storeName: "Corner Market" });
      expect(receipt.lineItems).toHaveLength(2);

      const image = await ctx.app.request(`/api/receipts/${receipt.id}/image`);
      expect(image.headers.get("content-type")).toBe("image/jpeg");
      expect([...new Uint8Array(await image.arrayBuffer())]).toEqual([0xff, 0xd8, 0xff, 0xe0, 1, 2, 3]);
    });

    it("answers 422 with the totals when the line items do not add up", async () => {
      const res = await ctx.app.request("/api/receipts", {
        method: "POST",
        body: receiptForm({ date: "2025-07-12", total: "2300", lineItems }),
      });
      expect(res.status).toBe(422);
      expect(await res.json()).toEqual({
        error: "Line items add up to 2280 but the receipt total is 2300",
        matches: false,
        declaredTotal: 2300,
        lineItemTotal: 2280,
        difference: 20,
      });
      expect(ctx.storage.files.size).toBe(0);
    });

    it("rejects amounts beyond the largest accepted amount", async () => {
      const res = await ctx.app.request("/api/receipts", {
        method: "POST",
        body: receiptForm({
          date: "2025-07-12",
          total: "9007199254740992",
          lineItems: JSON.stringify([
            { item: "Rice", amount: "9007199254740992" },
            { item: "Eggs", amount: "1" },
          ]),
        }),
      });
      expect(res.status).toBe(400);
      expect(ctx.storage.files.size).toBe(0);
      expect(ctx.services.receipts.list()).toEqual([]);
    });

    it("accepts the largest amount itself", async () => {
      const res = await ctx.app.request(
        "/api/receipts/check",
        json("POST", { total: 1_000_000_000_000, lineItems: [{ item: "Land", amount: 1_000_000_000_000 }] })
      );
      expect(res.status).toBe(200);
      expect((await res.json()).matches).toBe(true);
    });

    it("rejects fractional amounts instead of rounding them", async () => {
      const total = await ctx.app.request(
        "/api/receipts/check",
        json("POST", { total: 300.7, lineItems: [{ item: "Bread", amount: 300 }] })
      );
      expect(total.status).toBe(400);

      const line = await ctx.app.request(
        "/api/receipts/check",
        json("POST", { total: 300, lineItems: [{ item: "Bread", amount: 299.5 }] })
      );
      expect(line.status).toBe(400);
    });

    it("rejects a month outside 01..12 when listing", async () => {
      expect((await ctx.app.request("/api/receipts?month=2025-13")).status).toBe(400);
    });

    it("serves the stored image with its own content type", async () => {
      const receipt = await ctx.services.receipts.register({
        date: "2025-07-12",
        total: 300,
        image: receiptImage("r.png", "image/png"),
        lineItems: [{ item: "Eggs", amount: 300 }],
      });

      const res = await ctx.app.request(`/api/receipts/${receipt.id}/image`);
      expect(res.status).toBe(200);
      expect(res.headers.get("content-type")).toBe("image/png");
    });

    it("answers 404 for the image of a missing receipt", async () => {
      const res = await ctx.app.request("/api/receipts/99/image");
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "Receipt 99 not found" });
    });

    it("rejects a receipt without line items", async () => {
      const res = await ctx.app.request("/api/receipts", {
        method: "POST",
        body: receiptForm({ date: "2025-07-12", total: "100", lineItems: "[]" }),
      });
      expect(res.status).toBe(400);
    });

    it("rejects images of the wrong type or size", async () => {
      const fields = { date: "2025-07-12", total: "2280", lineItems };
      const gif = await ctx.app.request("/api/receipts", {
        method: "POST",
        body: receiptForm(fields, receiptImage("r.gif", "image/gif")),
      });
      expect(gif.status).toBe(400);

      const big = new File([new Uint8Array(1024 * 1024 + 1)], "big.jpg", { type: "image/jpeg" });
      const oversized = await ctx.app.request("/api/receipts", {
        method: "POST",
        body: receiptForm(fields, big),
      });
      expect(oversized.status).toBe(400);
    });

    it("checks totals without storing anything", async () => {
      const res = await ctx.app.request(
        "/api/receipts/check",
        json("POST", { total: 500, lineItems: [{ item: "Bread", amount: "480" }] })
      );
      expect(await res.json()).toEqual({
        matches: false,
        declaredTotal: 500,
        lineItemTotal: 480,
        difference: 20,
      });
      expect(ctx.services.receipts.list()).toEqual([]);
    });

    it("deletes a receipt", async () => {
      const receipt = await ctx.services.receipts.register({
        date: "2025-07-12",
        total: 300,
        image: receiptImage(),
        lineItems: [{ item: "Eggs", amount: 300 }],
      });

      const res = await ctx.app.request(`/api/receipts/${receipt.id}`, { method: "DELETE" });
      expect(await res.json()).toEqual({ success: true });
      expect((await ctx.app.request(`/api/receipts/${receipt.id}`)).status).toBe(404);
    });
  });

  describe("/api/summary", () => {
    it("summarizes a month", async () => {
      ctx.services.expenses.create({ date: "2025-07-03", item: "Lunch", amount: 900 });
      ctx.services.incomes.create({ date: "2025-07-25", source: "Salary", amount: 250000 });

      const res = await ctx.app.request("/api/summary/month?month=2025-07");
      expect(await res.json()).toMatchObject({
        month: "2025-07",
        expenseTotal: 900,
        incomeTotal: 250000,
        net: 249100,
      });
    });

    it("defaults to the current month", async () => {
      const res = await ctx.app.request("/api/summary/month");
      expect((await res.json()).month).toBe("2025-07");
    });
  });

  describe("basic auth", () => {
    const auth = {
      username: "test-user",
      password: "test-secret",
      frontendUrl: "http://localhost:5173",
    };

    it("requires credentials for the API", async () => {
      const app = createApp({ services: ctx.services, maxFileSize: 1024, auth });

      expect((await app.request("/api/categories")).status).toBe(401);

      const authorization = `Basic ${Buffer.from("test-user:test-secret").toString("base64")}`;
      expect((await app.request("/api/categories", { headers: { authorization } })).status).toBe(200);
    });

    it("lets the front-end through", async () => {
      const app = createApp({ services: ctx.services, maxFileSize: 1024, auth });
      const res = await app.request("/api/categories", {
        headers: { origin: "http://localhost:5173" },
      });
      expect(res.status).toBe(200);
    });

    it("leaves the health check open", async () => {
      const app = createApp({ services: ctx.services, maxFileSize: 1024, auth });
      expect((await app.request("/healthz")).status).toBe(200);
    });
  });
});
