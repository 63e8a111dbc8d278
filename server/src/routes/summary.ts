import { Hono } from "hono";
import { z } from "zod";
import { zValidator } from "@hono/zod-validator";
import type { Services } from "../services";
import { errorResponse } from "./errors";
import { dateSchema, optionalQuery, pageSchema } from "./schemas";

export const summaryRoutes = (services: Services) =>
  new Hono()
    .get(
      "/monthly",
      zValidator(
        "query",
        z.object({
          start_date: optionalQuery(dateSchema),
          end_date: optionalQuery(dateSchema),
          q: z.string().optional(),
          page: pageSchema,
        })
      ),
      (c) => {
        const query = c.req.valid("query");
        try {
          const summary = services.summary.monthly({
            startDate: query.start_date,
            endDate: query.end_date,
            q: query.q,
            page: query.page,
          });
          return c.json(summary, 200);
        } catch (err) {
          return errorResponse(c, err, "summarizing months");
        }
      }
    )
    .get("/month", zValidator("query", z.object({ month: z.string().optional() })), (c) => {
      try {
        return c.json(services.summary.month(c.req.valid("query").month), 200);
      } catch (err) {
        return errorResponse(c, err, "summarizing month");
      }
    });
