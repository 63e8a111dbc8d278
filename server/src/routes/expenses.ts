import { Hono } from "hono";
import { z } from "zod";
import { zValidator } from "@hono/zod-validator";
import type { Services } from "../services";
import { errorResponse } from "./errors";
import {
  amountSchema,
  categoryIdSchema,
  dateSchema,
  idParamSchema,
  optionalQuery,
  pageSchema,
  perPageSchema,
  sortSchema,
} from "./schemas";

const expenseSchema = z.object({
  date: dateSchema,
  item: z.string().trim().min(1).max(100),
  amount: amountSchema,
  categoryId: categoryIdSchema,
});

const listQuerySchema = z.object({
  month: z.string().optional(),
  view: z.string().optional(),
  page: pageSchema,
  per_page: perPageSchema,
  start_date: optionalQuery(dateSchema),
  end_date: optionalQuery(dateSchema),
  q: z.string().optional(),
  category: optionalQuery(z.coerce.number().int().positive()),
  sort: sortSchema,
});

export const expenseRoutes = (services: Services) =>
  new Hono()
    .get("/", zValidator("query", listQuerySchema), (c) => {
      const query = c.req.valid("query");
      try {
        const result = services.expenses.list({
          month: query.month,
          view: query.view,
          page: query.page,
          perPage: query.per_page,
          startDate: query.start_date,
          endDate: query.end_date,
          q: query.q,
          categoryId: query.category,
          sort: query.sort,
        });
        return c.json(result, 200);
      } catch (err) {
        return errorResponse(c, err, "listing expenses");
      }
    })
    .post(
      "/bulk-delete",
      zValidator(
        "json",
        z.object({ ids: z.array(z.number().int().positive()) })
      ),
      (c) => {
        const { ids } = c.req.valid("json");
        try {
          const deleted = services.expenses.bulkDelete(ids);
          return c.json({ deleted }, 200);
        } catch (err) {
          return errorResponse(c, err, "bulk deleting expenses");
        }
      }
    )
    .get("/:id", zValidator("param", idParamSchema), (c) => {
      try {
        return c.json(services.expenses.get(c.req.valid("param").id), 200);
      } catch (err) {
        return errorResponse(c, err, "getting expense");
      }
    })
    .post("/", zValidator("json", expenseSchema), (c) => {
      try {
        const expense = services.expenses.create(c.req.valid("json"));
        return c.json(expense, 201);
      } catch (err) {
        return errorResponse(c, err, "creating expense");
      }
    })
    .put(
      "/:id",
      zValidator("param", idParamSchema),
      zValidator("json", expenseSchema),
      (c) => {
        try {
          const expense = services.expenses.update(
            c.req.valid("param").id,
            c.req.valid("json")
          );
          return c.json(expense, 200);
        } catch (err) {
          return errorResponse(c, err, "updating expense");
        }
      }
    )
    .delete("/:id", zValidator("param", idParamSchema), (c) => {
      try {
        return c.json(services.expenses.delete(c.req.valid("param").id), 200);
      } catch (err) {
        return errorResponse(c, err, "deleting expense");
      }
    });
