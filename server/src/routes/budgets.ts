import { Hono } from "hono";
import { z } from "zod";
import { zValidator } from "@hono/zod-validator";
import type { Services } from "../services";
import { errorResponse } from "./errors";
import { amountSchema, categoryIdSchema, idParamSchema } from "./schemas";

const budgetSchema = z.object({
  // "YYYY-MM" or "YYYY-MM-DD"; normalized to the first day by the service
  month: z.string().min(1),
  categoryId: categoryIdSchema,
  amount: amountSchema,
});

export const budgetRoutes = (services: Services) =>
  new Hono()
    .get("/", zValidator("query", z.object({ month: z.string().optional() })), (c) => {
      try {
        return c.json(services.budgets.listForMonth(c.req.valid("query").month), 200);
      } catch (err) {
        return errorResponse(c, err, "listing budgets");
      }
    })
    .get("/:id", zValidator("param", idParamSchema), (c) => {
      try {
        return c.json(services.budgets.get(c.req.valid("param").id), 200);
      } catch (err) {
        return errorResponse(c, err, "getting budget");
      }
    })
    .post("/", zValidator("json", budgetSchema), (c) => {
      try {
        return c.json(services.budgets.create(c.req.valid("json")), 201);
      } catch (err) {
        return errorResponse(c, err, "creating budget");
      }
    })
    .put(
      "/:id",
      zValidator("param", idParamSchema),
      zValidator("json", budgetSchema),
      (c) => {
        try {
          const budget = services.budgets.update(
            c.req.valid("param").id,
            c.req.valid("json")
          );
          return c.json(budget, 200);
        } catch (err) {
          return errorResponse(c, err, "updating budget");
        }
      }
    )
    .delete("/:id", zValidator("param", idParamSchema), (c) => {
      try {
        return c.json(services.budgets.delete(c.req.valid("param").id), 200);
      } catch (err) {
        return errorResponse(c, err, "deleting budget");
      }
    });
