import { Hono } from "hono";
import { z } from "zod";
import { zValidator } from "@hono/zod-validator";
import type { Services } from "../services";
import { errorResponse } from "./errors";
import {
  amountSchema,
  dateSchema,
  idParamSchema,
  monthSchema,
  optionalQuery,
  pageSchema,
} from "./schemas";

const incomeSchema = z.object({
  date: dateSchema,
  source: z.string().trim().min(1).max(100),
  amount: amountSchema,
  note: z.string().max(200).optional(),
});

const listQuerySchema = z.object({
  month: optionalQuery(monthSchema),
  page: pageSchema,
});

export const incomeRoutes = (services: Services) =>
  new Hono()
    .get("/", zValidator("query", listQuerySchema), (c) => {
      try {
        return c.json(services.incomes.list(c.req.valid("query")), 200);
      } catch (err) {
        return errorResponse(c, err, "listing incomes");
      }
    })
    .get("/:id", zValidator("param", idParamSchema), (c) => {
      try {
        return c.json(services.incomes.get(c.req.valid("param").id), 200);
      } catch (err) {
        return errorResponse(c, err, "getting income");
      }
    })
    .post("/", zValidator("json", incomeSchema), (c) => {
      try {
        return c.json(services.incomes.create(c.req.valid("json")), 201);
      } catch (err) {
        return errorResponse(c, err, "creating income");
      }
    })
    .put(
      "/:id",
      zValidator("param", idParamSchema),
      zValidator("json", incomeSchema),
      (c) => {
        try {
          const income = services.incomes.update(
            c.req.valid("param").id,
            c.req.valid("json")
          );
          return c.json(income, 200);
        } catch (err) {
          return errorResponse(c, err, "updating income");
        }
      }
    )
    .delete("/:id", zValidator("param", idParamSchema), (c) => {
      try {
        services.incomes.delete(c.req.valid("param").id);
        return c.json({ success: true }, 200);
      } catch (err) {
        return errorResponse(c, err, "deleting income");
      }
    });
